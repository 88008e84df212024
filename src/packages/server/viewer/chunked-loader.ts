/**
 * Chunked Loader
 * Decodes a large file in the background, publishing finished lines to a
 * LineCache while readers keep querying it.
 */

import * as fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CONFIDENCE_THRESHOLD } from '../config/viewer-config.js';
import { logger } from '../utils/logger.js';
import { ChunkDecoder } from './chunk-decoder.js';
import { detectEncoding, type EncodingDetection } from './encoding-detector.js';
import { FileViewerError, describeError } from './errors.js';
import type { LineCache } from './line-cache.js';
import { LineSplitter } from './line-splitter.js';

const log = logger.loader;

export type LoaderState = 'idle' | 'running' | 'done' | 'failed' | 'cancelled';

export interface LoaderProgress {
  state: LoaderState;
  lineCount: number;
  bytesRead: number;
  totalBytes: number;
  skippedChunks: number;
  error: FileViewerError | null;
}

export interface ChunkedLoaderCallbacks {
  // Called once, with the first chunk, before any line is published
  onEncoding?: (detection: EncodingDetection, sample: Buffer) => void;
  // Called after every chunk that was read, and once when the loader stops
  onProgress?: (progress: LoaderProgress) => void;
  onChunkSkipped?: (error: FileViewerError) => void;
}

export interface ChunkedLoaderOptions {
  filePath: string;
  cache: LineCache;
  chunkSize?: number;
  confidenceThreshold?: number;
  signal?: AbortSignal;
  callbacks?: ChunkedLoaderCallbacks;
}

export class ChunkedLoader {
  readonly filePath: string;
  readonly chunkSize: number;

  private readonly cache: LineCache;
  private readonly confidenceThreshold: number;
  private readonly signal?: AbortSignal;
  private readonly callbacks: ChunkedLoaderCallbacks;

  private state: LoaderState = 'idle';
  private completion: Promise<LoaderProgress> | null = null;
  private bytesRead = 0;
  private totalBytes = 0;
  private skippedChunks = 0;
  private error: FileViewerError | null = null;

  constructor(options: ChunkedLoaderOptions) {
    this.filePath = options.filePath;
    this.cache = options.cache;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.signal = options.signal;
    this.callbacks = options.callbacks ?? {};
  }

  /**
   * Start decoding. Calling again while running (or after) returns the same
   * completion; the promise never rejects, failures land in the progress.
   */
  start(): Promise<LoaderProgress> {
    if (!this.completion) {
      this.state = 'running';
      this.completion = this.run();
    }
    return this.completion;
  }

  getProgress(): LoaderProgress {
    return {
      state: this.state,
      lineCount: this.cache.getLineCount(),
      bytesRead: this.bytesRead,
      totalBytes: this.totalBytes,
      skippedChunks: this.skippedChunks,
      error: this.error,
    };
  }

  private async run(): Promise<LoaderProgress> {
    let handle: FileHandle | null = null;

    try {
      handle = await fs.promises.open(this.filePath, 'r');
      this.totalBytes = (await handle.stat()).size;
      log.debug(`Background load of ${this.filePath} (${this.totalBytes} bytes, chunk ${this.chunkSize})`);

      await this.readChunks(handle);
    } catch (err) {
      this.state = 'failed';
      this.error = new FileViewerError('BACKGROUND_LOAD_ERROR', `Background load failed: ${describeError(err)}`, {
        cause: err,
      });
      log.error(`Background load of ${this.filePath} failed:`, err);
    } finally {
      if (handle) {
        await handle.close().catch((err: unknown) => {
          log.warn(`Failed to close ${this.filePath}:`, err);
        });
      }
    }

    this.callbacks.onProgress?.(this.getProgress());
    return this.getProgress();
  }

  private async readChunks(handle: FileHandle): Promise<void> {
    const buffer = Buffer.alloc(this.chunkSize);
    const splitter = new LineSplitter();
    let decoder: ChunkDecoder | null = null;
    let offset = 0;

    while (offset < this.totalBytes) {
      if (this.signal?.aborted) {
        this.state = 'cancelled';
        log.debug(`Background load of ${this.filePath} cancelled at byte ${offset}`);
        return;
      }

      const { bytesRead } = await handle.read(buffer, 0, this.chunkSize, offset);
      if (bytesRead === 0) break; // truncated underneath us

      const chunk = buffer.subarray(0, bytesRead);
      if (!decoder) {
        const detection = detectEncoding(chunk, this.confidenceThreshold);
        decoder = new ChunkDecoder(detection.encoding);
        this.callbacks.onEncoding?.(detection, Buffer.from(chunk));
      }

      const text = decoder.decode(chunk);
      if (text === null) {
        this.skipChunk(offset, bytesRead, decoder.encoding);
      } else {
        this.cache.appendAll(splitter.push(text));
      }

      offset += bytesRead;
      this.bytesRead = offset;
      this.callbacks.onProgress?.(this.getProgress());
    }

    if (this.signal?.aborted) {
      this.state = 'cancelled';
      return;
    }

    if (decoder) {
      const carried = decoder.carriedBytes;
      const leftover = decoder.finish();
      if (leftover === null) {
        this.skipChunk(offset - carried, carried, decoder.encoding);
      } else {
        this.cache.appendAll(splitter.push(leftover));
      }
    }
    this.cache.appendAll(splitter.finish());

    this.state = 'done';
    log.debug(`Background load of ${this.filePath} done: ${this.cache.getLineCount()} lines, ${this.skippedChunks} skipped chunks`);
  }

  // Undecodable chunks are dropped whole; the pending tail survives them.
  private skipChunk(offset: number, length: number, encoding: string): void {
    this.skippedChunks += 1;
    const reason = new FileViewerError(
      'CHUNK_DECODE_ERROR',
      `Chunk at byte ${offset} (${length} bytes) does not decode as ${encoding}`
    );
    log.warn(`${this.filePath}: ${reason.message}, skipping it`);
    this.callbacks.onChunkSkipped?.(reason);
  }
}
