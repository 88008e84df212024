/**
 * File Viewer
 * One viewing session bound to one path: classifies it, loads it (in one
 * pass or in the background), and serves lines, content and metadata.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { FileInfo, LoadState, LoadStatus, PathKind } from '../../shared/types.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_HEX_BYTES_PER_LINE } from '../config/viewer-config.js';
import { logger } from '../utils/logger.js';
import { ChunkedLoader, type LoaderProgress } from './chunked-loader.js';
import { assembleContent } from './content-assembler.js';
import { DIRECTORY_ENCODING, readDirectoryContent } from './directory-adapter.js';
import { detectEncoding } from './encoding-detector.js';
import { FileViewerError, describeError } from './errors.js';
import { LineCache } from './line-cache.js';
import { splitLines } from './line-splitter.js';
import { classifyPath } from './path-classifier.js';

const log = logger.viewer;

export interface FileViewerOptions {
  chunkSize?: number;
  syncThreshold?: number;      // Defaults to twice the chunk size
  confidenceThreshold?: number;
  hexBytesPerLine?: number;
}

// Background loads only; load() itself reports how a one-pass load went
export interface FileViewerCallbacks {
  onProgress?: (status: LoadStatus) => void;
  onSettled?: (status: LoadStatus) => void;
}

export class FileViewer {
  readonly filePath: string;
  readonly kind: PathKind;
  readonly chunkSize: number;

  private readonly syncThreshold: number;
  private readonly confidenceThreshold: number;
  private readonly hexBytesPerLine: number;
  private readonly callbacks: FileViewerCallbacks;

  private readonly cache = new LineCache();
  private readonly abortController = new AbortController();
  private loader: ChunkedLoader | null = null;

  private content: Buffer | null = null;
  private sample: Buffer | null = null;
  private encoding: string | null = null;
  private confidence: number | null = null;

  private state: LoadState = 'unloaded';
  private error: FileViewerError | null = null;

  constructor(filePath: string, options: FileViewerOptions = {}, callbacks: FileViewerCallbacks = {}) {
    this.filePath = path.resolve(filePath);
    this.kind = classifyPath(this.filePath);
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.syncThreshold = options.syncThreshold ?? this.chunkSize * 2;
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.hexBytesPerLine = options.hexBytesPerLine ?? DEFAULT_HEX_BYTES_PER_LINE;
    this.callbacks = callbacks;
  }

  /**
   * Populate the session. Small files and directories are fully cached when
   * this resolves; larger files resolve as soon as background decoding has
   * started. Only the first call does any work; once the session has
   * failed, every later call rejects with the same error.
   */
  async load(): Promise<void> {
    if (this.state === 'failed' && this.error) throw this.error;
    if (this.state !== 'unloaded') return;

    try {
      if (this.kind === 'missing') {
        throw new FileViewerError('NOT_FOUND', `Failed to load file: no such file or directory: ${this.filePath}`);
      }

      if (this.kind === 'directory') {
        await this.loadDirectory();
        return;
      }

      const stats = await fs.promises.stat(this.filePath);
      if (stats.size > this.syncThreshold) {
        this.startBackgroundLoad();
        return;
      }

      await this.loadWhole();
    } catch (err) {
      this.content = null;
      this.encoding = null;
      this.confidence = null;
      this.error = err instanceof FileViewerError
        ? err
        : new FileViewerError('IO_ERROR', `Failed to load file: ${describeError(err)}`, { cause: err });
      this.settle('failed');
      throw this.error;
    }
  }

  private async loadDirectory(): Promise<void> {
    this.content = await readDirectoryContent(this.filePath);
    this.encoding = DIRECTORY_ENCODING;
    this.cache.appendAll(splitLines(this.content.toString(DIRECTORY_ENCODING)));
    this.settle('sync_loaded');
  }

  private async loadWhole(): Promise<void> {
    const content = await fs.promises.readFile(this.filePath);
    const detection = detectEncoding(content, this.confidenceThreshold);

    this.content = content;
    this.encoding = detection.encoding;
    this.confidence = detection.confidence;

    try {
      const text = new TextDecoder(detection.encoding, { fatal: true }).decode(content);
      this.cache.appendAll(splitLines(text));
    } catch (err) {
      // Left uncached: getContent() falls back to the hex view
      log.debug(`${this.filePath} does not decode as ${detection.encoding}: ${describeError(err)}`);
    }

    this.settle('sync_loaded');
  }

  private startBackgroundLoad(): void {
    if (this.loader) return;

    this.state = 'running';
    this.loader = new ChunkedLoader({
      filePath: this.filePath,
      cache: this.cache,
      chunkSize: this.chunkSize,
      confidenceThreshold: this.confidenceThreshold,
      signal: this.abortController.signal,
      callbacks: {
        onEncoding: (detection, sample) => {
          this.encoding = detection.encoding;
          this.confidence = detection.confidence;
          this.sample = sample;
        },
        onProgress: (progress) => {
          if (progress.state === 'running') {
            this.callbacks.onProgress?.(this.getStatus());
          }
        },
      },
    });

    this.loader
      .start()
      .then((progress) => this.finishBackgroundLoad(progress))
      .catch((err: unknown) => {
        log.error(`Settling background load of ${this.filePath} failed:`, err);
      });
  }

  private finishBackgroundLoad(progress: LoaderProgress): void {
    if (progress.state === 'failed') {
      this.error = progress.error;
      this.settle('failed');
    } else if (progress.state === 'cancelled') {
      this.settle('cancelled');
    } else {
      this.settle('done');
    }
    this.callbacks.onSettled?.(this.getStatus());
  }

  private settle(state: LoadState): void {
    this.state = state;
    if (state === 'failed') {
      log.warn(`Load of ${this.filePath} failed: ${this.error?.message ?? 'unknown error'}`);
    }
  }

  /** Line `index`, or undefined while it is not available. */
  getLine(index: number): string | undefined {
    return this.cache.getLine(index);
  }

  getLineCount(): number {
    return this.cache.getLineCount();
  }

  getLines(start: number, end: number): string[] {
    return this.cache.getLines(start, end);
  }

  getContent(): string | null {
    return assembleContent({
      lines: this.cache.snapshot(),
      raw: this.content,
      encoding: this.encoding,
      sample: this.sample,
      bytesPerLine: this.hexBytesPerLine,
    });
  }

  get fileInfo(): FileInfo {
    const stats = this.kind === 'missing' ? undefined : fs.statSync(this.filePath, { throwIfNoEntry: false });
    return {
      name: path.basename(this.filePath),
      path: this.filePath,
      kind: this.kind,
      size: stats?.size ?? 0,
      encoding: this.encoding,
      confidence: this.confidence,
    };
  }

  getStatus(): LoadStatus {
    const progress = this.loader?.getProgress();
    const totalBytes = progress?.totalBytes ?? this.content?.length ?? 0;

    const status: LoadStatus = {
      state: this.state,
      lineCount: this.cache.getLineCount(),
      bytesRead: progress?.bytesRead ?? totalBytes,
      totalBytes,
      skippedChunks: progress?.skippedChunks ?? 0,
    };
    if (this.error) {
      status.error = this.error.message;
    }
    return status;
  }

  /** Resolves with the final status once nothing is being decoded anymore. */
  async whenLoaded(): Promise<LoadStatus> {
    if (this.loader) {
      await this.loader.start();
    }
    return this.getStatus();
  }

  /** Stop background decoding and wait for the reader to let go of the file. */
  async close(): Promise<void> {
    this.abortController.abort();
    if (this.loader) {
      await this.loader.start();
    }
  }
}
