import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { LoadStatus } from '../../shared/types.js';
import {
  closeAllSessions,
  closeSession,
  getSession,
  getSessionCount,
  openSession,
  viewerSessionEvents,
} from './viewer-session-service.js';

const SMALL = { confidenceThreshold: 1 };
const CHUNKED = { chunkSize: 16, confidenceThreshold: 1 };

describe('viewer-session-service', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'viewer-session-test-'));
  });

  afterEach(async () => {
    viewerSessionEvents.removeAllListeners();
    await closeAllSessions();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function bigText(lines: number): string {
    return Array.from({ length: lines }, (_, i) => `entry ${i}`).join('\n') + '\n';
  }

  it('opens a session under its key', async () => {
    const viewer = await openSession('client-1', writeFile('a.txt', 'first\n'), SMALL);

    expect(getSession('client-1')).toBe(viewer);
    expect(getSessionCount()).toBe(1);
    expect(viewer.getLine(0)).toBe('first');
  });

  it('closes the previous session when the key switches files', async () => {
    const first = await openSession('client-1', writeFile('big.txt', bigText(2000)), CHUNKED);
    const second = await openSession('client-1', writeFile('b.txt', 'second\n'), SMALL);

    expect(first.getStatus().state).toBe('cancelled');
    expect(getSession('client-1')).toBe(second);
    expect(getSessionCount()).toBe(1);
  });

  it('keeps sessions of different keys apart', async () => {
    await openSession('client-1', writeFile('a.txt', 'a\n'), SMALL);
    await openSession('client-2', writeFile('b.txt', 'b\n'), SMALL);

    expect(getSessionCount()).toBe(2);
    expect(getSession('client-1')?.getLine(0)).toBe('a');
    expect(getSession('client-2')?.getLine(0)).toBe('b');
  });

  it('drops the key when opening fails', async () => {
    await openSession('client-1', writeFile('a.txt', 'a\n'), SMALL);

    await expect(openSession('client-1', path.join(tempDir, 'missing.txt'), SMALL)).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
    expect(getSession('client-1')).toBeUndefined();
    expect(getSessionCount()).toBe(0);
  });

  it('rejects an open that a newer open for the same key replaced', async () => {
    const first = writeFile('first.txt', 'first\n');
    const second = writeFile('second.txt', 'second\n');

    const [older, newer] = await Promise.allSettled([
      openSession('client-1', first, SMALL),
      openSession('client-1', second, SMALL),
    ]);

    expect(older.status).toBe('rejected');
    expect(older.status === 'rejected' ? older.reason : null).toMatchObject({ code: 'SUPERSEDED' });
    expect(newer.status === 'fulfilled' ? newer.value.filePath : null).toBe(second);
    expect(getSession('client-1')?.filePath).toBe(second);
    expect(getSessionCount()).toBe(1);
  });

  it('stops emitting events for a replaced session', async () => {
    const settledPaths: string[] = [];
    viewerSessionEvents.on('settled', (_key: string, settledPath: string) => {
      settledPaths.push(settledPath);
    });

    const first = await openSession('client-1', writeFile('big.txt', bigText(2000)), CHUNKED);
    const second = await openSession('client-1', writeFile('next.txt', bigText(100)), CHUNKED);
    await first.whenLoaded();
    await second.whenLoaded();

    expect(first.getStatus().state).toBe('cancelled');
    expect(settledPaths).toEqual([second.filePath]);
  });

  it('reports whether a session was closed', async () => {
    await openSession('client-1', writeFile('a.txt', 'a\n'), SMALL);

    expect(await closeSession('client-1')).toBe(true);
    expect(await closeSession('client-1')).toBe(false);
    expect(await closeSession('never-opened')).toBe(false);
  });

  it('emits progress and settled events for background loads', async () => {
    const filePath = writeFile('events.txt', bigText(100));
    const progress: number[] = [];
    const settled: Array<{ key: string; path: string; status: LoadStatus }> = [];

    viewerSessionEvents.on('progress', (_key: string, _path: string, status: LoadStatus) => {
      progress.push(status.lineCount);
    });
    viewerSessionEvents.on('settled', (key: string, settledPath: string, status: LoadStatus) => {
      settled.push({ key, path: settledPath, status });
    });

    const viewer = await openSession('client-1', filePath, CHUNKED);
    await viewer.whenLoaded();

    expect(progress.length).toBeGreaterThan(0);
    expect(settled).toHaveLength(1);
    expect(settled[0].key).toBe('client-1');
    expect(settled[0].path).toBe(filePath);
    expect(settled[0].status).toMatchObject({ state: 'done', lineCount: 100 });
  });

  it('closes every session at once', async () => {
    const viewer = await openSession('client-1', writeFile('big.txt', bigText(2000)), CHUNKED);
    await openSession('client-2', writeFile('b.txt', 'b\n'), SMALL);

    await closeAllSessions();

    expect(getSessionCount()).toBe(0);
    expect(viewer.getStatus().state).toBe('cancelled');
  });
});
