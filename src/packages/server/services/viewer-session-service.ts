/**
 * Viewer Session Service
 * Keeps at most one open FileViewer per viewer key (a WebSocket client, or
 * the shared HTTP viewer) and makes sure a replaced session stops decoding
 * before it is dropped.
 */

import { EventEmitter } from 'events';
import type { LoadStatus } from '../../shared/types.js';
import { loadViewerConfig } from '../config/viewer-config.js';
import { logger } from '../utils/logger.js';
import { FileViewerError } from '../viewer/errors.js';
import { FileViewer, type FileViewerOptions } from '../viewer/file-viewer.js';

const log = logger.sessions;

// In-memory store
const sessions = new Map<string, FileViewer>();

// 'progress' and 'settled', both (key: string, path: string, status: LoadStatus)
export const viewerSessionEvents = new EventEmitter();

function defaultViewerOptions(): FileViewerOptions {
  const { chunkSize, syncThreshold, confidenceThreshold, hexBytesPerLine } = loadViewerConfig();
  return { chunkSize, syncThreshold, confidenceThreshold, hexBytesPerLine };
}

function supersededError(key: string, viewer: FileViewer): FileViewerError {
  log.debug(`[${key}] Open of ${viewer.filePath} superseded`);
  return new FileViewerError('SUPERSEDED', `Open of ${viewer.filePath} was superseded by a newer open`);
}

/**
 * Open `filePath` for `key`, closing whatever that key was viewing first.
 * Rejects with the load error; the key then has no session. Rejects with
 * SUPERSEDED when another open for the same key started in the meantime.
 */
export async function openSession(key: string, filePath: string, options?: FileViewerOptions): Promise<FileViewer> {
  const viewer = new FileViewer(filePath, options ?? defaultViewerOptions(), {
    // A replaced viewer no longer speaks for the key
    onProgress: (status: LoadStatus) => {
      if (sessions.get(key) === viewer) {
        viewerSessionEvents.emit('progress', key, viewer.filePath, status);
      }
    },
    onSettled: (status: LoadStatus) => {
      if (sessions.get(key) === viewer) {
        viewerSessionEvents.emit('settled', key, viewer.filePath, status);
      }
    },
  });

  const previous = sessions.get(key);
  sessions.set(key, viewer);
  if (previous) {
    log.log(`[${key}] Switching from ${previous.filePath} to ${viewer.filePath}`);
    await previous.close();
  }

  try {
    await viewer.load();
  } catch (err) {
    if (sessions.get(key) !== viewer) {
      throw supersededError(key, viewer);
    }
    sessions.delete(key);
    throw err;
  }

  if (sessions.get(key) !== viewer) {
    await viewer.close();
    throw supersededError(key, viewer);
  }

  log.log(`[${key}] Opened ${viewer.filePath} (${viewer.kind}, ${viewer.getStatus().state})`);
  return viewer;
}

export function getSession(key: string): FileViewer | undefined {
  return sessions.get(key);
}

export async function closeSession(key: string): Promise<boolean> {
  const viewer = sessions.get(key);
  if (!viewer) return false;

  sessions.delete(key);
  await viewer.close();
  log.log(`[${key}] Closed ${viewer.filePath}`);
  return true;
}

export async function closeAllSessions(): Promise<void> {
  const keys = Array.from(sessions.keys());
  await Promise.all(keys.map((key) => closeSession(key)));
}

export function getSessionCount(): number {
  return sessions.size;
}
