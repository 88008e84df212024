import type { FileInfo, LoadStatus } from './viewer-types.js';

// ============================================================================
// WebSocket Base
// ============================================================================

export interface WSMessage {
  type: string;
  payload?: unknown;
}

// ============================================================================
// Viewer Messages (Server -> Client)
// ============================================================================

export interface FileOpenedMessage extends WSMessage {
  type: 'file_opened';
  payload: { info: FileInfo; status: LoadStatus };
}

export interface FileLoadProgressMessage extends WSMessage {
  type: 'file_load_progress';
  payload: { path: string; status: LoadStatus };
}

export interface FileLoadCompleteMessage extends WSMessage {
  type: 'file_load_complete';
  payload: { path: string; status: LoadStatus };
}

export interface FileLoadFailedMessage extends WSMessage {
  type: 'file_load_failed';
  payload: { path: string; error: string };
}

export interface FileClosedMessage extends WSMessage {
  type: 'file_closed';
  payload: { closed: boolean };
}

export interface ErrorMessage extends WSMessage {
  type: 'error';
  payload: { message: string };
}

// ============================================================================
// Viewer Messages (Client -> Server)
// ============================================================================

export interface OpenFileMessage extends WSMessage {
  type: 'open_file';
  payload: { path: string };
}

export interface CloseFileMessage extends WSMessage {
  type: 'close_file';
}

export type ServerMessage =
  | FileOpenedMessage
  | FileLoadProgressMessage
  | FileLoadCompleteMessage
  | FileLoadFailedMessage
  | FileClosedMessage
  | ErrorMessage;

export type ClientMessage =
  | OpenFileMessage
  | CloseFileMessage;
