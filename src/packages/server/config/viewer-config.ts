/**
 * Viewer Configuration
 * Reads tuning knobs from the environment (populated by dotenv at startup).
 */

import { logger } from '../utils/logger.js';

const log = logger.config;

export const DEFAULT_CHUNK_SIZE = 4096;
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;
export const DEFAULT_HEX_BYTES_PER_LINE = 16;
export const DEFAULT_PORT = 5180;

export interface ViewerConfig {
  port: number;
  host: string;
  chunkSize: number;
  // Files at or below this size are decoded in one pass during load()
  syncThreshold: number;
  confidenceThreshold: number;
  hexBytesPerLine: number;
  // Empty disables authentication
  authToken: string;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`Ignoring ${key}=${raw}: expected a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readRatio(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    log.warn(`Ignoring ${key}=${raw}: expected a number between 0 and 1, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadViewerConfig(env: Env = process.env): ViewerConfig {
  const chunkSize = readPositiveInt(env, 'VIEWER_CHUNK_SIZE', DEFAULT_CHUNK_SIZE);

  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    host: env.LISTEN_ALL_INTERFACES ? '::' : '127.0.0.1',
    chunkSize,
    syncThreshold: readPositiveInt(env, 'VIEWER_SYNC_THRESHOLD', chunkSize * 2),
    confidenceThreshold: readRatio(env, 'VIEWER_CONFIDENCE_THRESHOLD', DEFAULT_CONFIDENCE_THRESHOLD),
    hexBytesPerLine: readPositiveInt(env, 'VIEWER_HEX_BYTES_PER_LINE', DEFAULT_HEX_BYTES_PER_LINE),
    authToken: env.AUTH_TOKEN ?? '',
  };
}
