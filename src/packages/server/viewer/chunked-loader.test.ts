import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChunkedLoader, type LoaderProgress } from './chunked-loader.js';
import { LineCache } from './line-cache.js';
import { splitLines } from './line-splitter.js';

// Detector confidence never exceeds 1, so this pins every session to UTF-8
const FORCE_UTF8 = 1;

function buildText(lineCount: number): string {
  const lines: string[] = [];
  for (let i = 0; i < lineCount; i++) {
    lines.push(`line ${i} ${'x'.repeat(i % 37)}`);
  }
  return lines.join('\n') + '\n';
}

describe('ChunkedLoader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunked-loader-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string | Buffer): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('produces the same lines as decoding the whole file at once', async () => {
    const text = buildText(300);
    const cache = new LineCache();
    const loader = new ChunkedLoader({
      filePath: writeFile('big.txt', text),
      cache,
      chunkSize: 64,
      confidenceThreshold: FORCE_UTF8,
    });

    const progress = await loader.start();

    expect(progress.state).toBe('done');
    expect(progress.skippedChunks).toBe(0);
    expect(progress.bytesRead).toBe(Buffer.byteLength(text));
    expect(progress.totalBytes).toBe(Buffer.byteLength(text));
    expect(cache.snapshot()).toEqual(splitLines(text));
    expect(cache.getLineCount()).toBe(300);
  });

  it('keeps a line that straddles a chunk boundary in one piece', async () => {
    // "straddle!!" occupies bytes 4090..4099, its break is byte 4100
    const text = `${'a'.repeat(4089)}\nstraddle!!\ntail line\n`;
    const cache = new LineCache();
    const loader = new ChunkedLoader({
      filePath: writeFile('straddle.txt', text),
      cache,
      chunkSize: 4096,
      confidenceThreshold: FORCE_UTF8,
    });

    await loader.start();

    expect(cache.snapshot()).toEqual(['a'.repeat(4089), 'straddle!!', 'tail line']);
  });

  it('keeps a multi-byte character cut by a chunk boundary', async () => {
    const text = 'abcdefgé\nxyz';
    const cache = new LineCache();
    const loader = new ChunkedLoader({
      filePath: writeFile('accent.txt', text),
      cache,
      chunkSize: 8,
      confidenceThreshold: FORCE_UTF8,
    });

    const progress = await loader.start();

    expect(progress.skippedChunks).toBe(0);
    expect(cache.snapshot()).toEqual(['abcdefgé', 'xyz']);
  });

  it('treats a CRLF pair split across chunks as a single break', async () => {
    const cache = new LineCache();
    const loader = new ChunkedLoader({
      filePath: writeFile('crlf.txt', 'abc\r\nde\r\n'),
      cache,
      chunkSize: 4,
      confidenceThreshold: FORCE_UTF8,
    });

    await loader.start();

    expect(cache.snapshot()).toEqual(['abc', 'de']);
  });

  it('skips an undecodable chunk and keeps stitching around it', async () => {
    const content = Buffer.concat([
      Buffer.from('aaaa\nbbb'),
      Buffer.from([0x63, 0x63, 0xff, 0x63, 0x63, 0x0a, 0x64, 0x64]),
      Buffer.from('dd\neeee\n'),
    ]);
    const cache = new LineCache();
    const skipped: string[] = [];
    const loader = new ChunkedLoader({
      filePath: writeFile('broken.txt', content),
      cache,
      chunkSize: 8,
      confidenceThreshold: FORCE_UTF8,
      callbacks: {
        onChunkSkipped: (error) => skipped.push(error.code),
      },
    });

    const progress = await loader.start();

    expect(progress.state).toBe('done');
    expect(progress.skippedChunks).toBe(1);
    expect(skipped).toEqual(['CHUNK_DECODE_ERROR']);
    expect(cache.snapshot()).toEqual(['aaaa', 'bbbdd', 'eeee']);
  });

  it('publishes a line count that never decreases while loading', async () => {
    const text = buildText(200);
    const cache = new LineCache();
    const samples: number[] = [];
    let sawUnwrittenLine = false;

    const loader = new ChunkedLoader({
      filePath: writeFile('grow.txt', text),
      cache,
      chunkSize: 32,
      confidenceThreshold: FORCE_UTF8,
      callbacks: {
        onProgress: (progress) => {
          samples.push(cache.getLineCount());
          if (cache.getLine(progress.lineCount) !== undefined) {
            sawUnwrittenLine = true;
          }
        },
      },
    });

    await loader.start();

    expect(samples.length).toBeGreaterThan(10);
    for (let i = 1; i < samples.length; i++) {
      expect(samples[i]).toBeGreaterThanOrEqual(samples[i - 1]);
    }
    expect(new Set(samples).size).toBeGreaterThan(2);
    expect(samples[samples.length - 1]).toBe(200);
    expect(sawUnwrittenLine).toBe(false);
  });

  it('reports the first chunk as the detection sample', async () => {
    const text = buildText(50);
    let sampleLength = -1;
    let encoding = '';

    const loader = new ChunkedLoader({
      filePath: writeFile('sample.txt', text),
      cache: new LineCache(),
      chunkSize: 128,
      confidenceThreshold: FORCE_UTF8,
      callbacks: {
        onEncoding: (detection, sample) => {
          sampleLength = sample.length;
          encoding = detection.encoding;
        },
      },
    });

    await loader.start();

    expect(sampleLength).toBe(128);
    expect(encoding).toBe('utf-8');
  });

  it('returns the same completion when started twice', async () => {
    const loader = new ChunkedLoader({
      filePath: writeFile('twice.txt', buildText(20)),
      cache: new LineCache(),
      chunkSize: 16,
      confidenceThreshold: FORCE_UTF8,
    });

    const first = loader.start();
    const second = loader.start();

    expect(second).toBe(first);
    await first;
  });

  it('stops between chunks once aborted', async () => {
    const controller = new AbortController();
    const cache = new LineCache();
    const loader = new ChunkedLoader({
      filePath: writeFile('cancel.txt', buildText(200)),
      cache,
      chunkSize: 16,
      confidenceThreshold: FORCE_UTF8,
      signal: controller.signal,
      callbacks: {
        onProgress: () => controller.abort(),
      },
    });

    const progress = await loader.start();

    expect(progress.state).toBe('cancelled');
    expect(progress.bytesRead).toBe(16);
    expect(cache.getLineCount()).toBe(1);
  });

  it('fails without publishing lines when the file cannot be read', async () => {
    const cache = new LineCache();
    const states: LoaderProgress['state'][] = [];
    const loader = new ChunkedLoader({
      filePath: path.join(tempDir, 'missing.txt'),
      cache,
      callbacks: {
        onProgress: (progress) => states.push(progress.state),
      },
    });

    const progress = await loader.start();

    expect(progress.state).toBe('failed');
    expect(progress.error?.code).toBe('BACKGROUND_LOAD_ERROR');
    expect(progress.error?.message).toMatch(/^Background load failed: ENOENT/);
    expect(cache.getLineCount()).toBe(0);
    expect(states).toEqual(['failed']);
  });
});
