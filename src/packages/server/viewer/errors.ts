export type FileViewerErrorCode =
  | 'NOT_FOUND'
  | 'DIRECTORY_READ_ERROR'
  | 'IO_ERROR'
  | 'CHUNK_DECODE_ERROR'
  | 'BACKGROUND_LOAD_ERROR'
  | 'SUPERSEDED';

export class FileViewerError extends Error {
  readonly code: FileViewerErrorCode;

  constructor(code: FileViewerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileViewerError';
    this.code = code;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
