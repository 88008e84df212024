// How a path resolved when the session was opened
export type PathKind = 'missing' | 'directory' | 'symlink' | 'file';

// Session load lifecycle. 'done', 'failed' and 'cancelled' are terminal.
export type LoadState = 'unloaded' | 'sync_loaded' | 'running' | 'done' | 'failed' | 'cancelled';

export interface FileInfo {
  name: string;
  path: string;
  kind: PathKind;
  size: number;             // Bytes on disk, 0 when missing
  encoding: string | null;  // Unset until detection ran
  confidence: number | null; // Detector confidence in [0, 1]
}

// Pollable snapshot of a session's progress
export interface LoadStatus {
  state: LoadState;
  lineCount: number;
  bytesRead: number;
  totalBytes: number;
  skippedChunks: number;    // Chunks dropped because they did not decode
  error?: string;
}

export interface LineWindow {
  start: number;
  lines: string[];
  lineCount: number;
}
