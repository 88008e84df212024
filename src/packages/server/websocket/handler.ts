/**
 * WebSocket Handler
 * Each connected client gets its own viewer session and is pushed load
 * progress while its file decodes in the background.
 */

import type { IncomingMessage, Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { WebSocketServer, WebSocket } from 'ws';
import type { ClientMessage, LoadStatus, ServerMessage } from '../../shared/types.js';
import { validateWebSocketAuth } from '../auth/index.js';
import { viewerSessionService } from '../services/index.js';
import { FileViewerError, describeError } from '../viewer/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.ws;

// Minimum gap between two progress messages to the same client
export const PROGRESS_THROTTLE_MS = 100;

export interface ViewerClient {
  id: string;
  send(message: ServerMessage): void;
}

// Connected clients by session key
const clients = new Map<string, ViewerClient>();
const lastProgressAt = new Map<string, number>();

// ============================================================================
// Client Messages
// ============================================================================

function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null;

  if (parsed.type === 'close_file') {
    return { type: 'close_file' };
  }
  if (parsed.type === 'open_file' && 'payload' in parsed) {
    const { payload } = parsed;
    if (typeof payload === 'object' && payload !== null && 'path' in payload && typeof payload.path === 'string') {
      return { type: 'open_file', payload: { path: payload.path } };
    }
  }
  return null;
}

export async function handleClientMessage(client: ViewerClient, message: ClientMessage): Promise<void> {
  switch (message.type) {
    case 'open_file': {
      const filePath = message.payload.path;
      if (!path.isAbsolute(filePath)) {
        client.send({ type: 'file_load_failed', payload: { path: filePath, error: 'Path must be absolute' } });
        break;
      }

      try {
        const viewer = await viewerSessionService.openSession(client.id, filePath);
        client.send({ type: 'file_opened', payload: { info: viewer.fileInfo, status: viewer.getStatus() } });
      } catch (err) {
        // The newer open answers for this client
        if (err instanceof FileViewerError && err.code === 'SUPERSEDED') break;
        client.send({ type: 'file_load_failed', payload: { path: filePath, error: describeError(err) } });
      }
      break;
    }

    case 'close_file': {
      const closed = await viewerSessionService.closeSession(client.id);
      lastProgressAt.delete(client.id);
      client.send({ type: 'file_closed', payload: { closed } });
      break;
    }
  }
}

export async function handleRawMessage(client: ViewerClient, raw: string): Promise<void> {
  const message = parseClientMessage(raw);
  if (!message) {
    log.warn(`Invalid message from ${client.id}:`, raw.substring(0, 200));
    client.send({ type: 'error', payload: { message: 'Invalid message' } });
    return;
  }
  await handleClientMessage(client, message);
}

// ============================================================================
// Session Events
// ============================================================================

function onProgress(key: string, filePath: string, status: LoadStatus): void {
  const client = clients.get(key);
  if (!client) return;

  const now = Date.now();
  const last = lastProgressAt.get(key) ?? 0;
  if (now - last < PROGRESS_THROTTLE_MS) return;
  lastProgressAt.set(key, now);

  client.send({ type: 'file_load_progress', payload: { path: filePath, status } });
}

function onSettled(key: string, filePath: string, status: LoadStatus): void {
  const client = clients.get(key);
  if (!client) return;
  lastProgressAt.delete(key);

  if (status.state === 'done') {
    client.send({ type: 'file_load_complete', payload: { path: filePath, status } });
  } else if (status.state === 'failed') {
    client.send({ type: 'file_load_failed', payload: { path: filePath, error: status.error ?? 'Load failed' } });
  }
}

export function registerClient(client: ViewerClient): () => Promise<void> {
  clients.set(client.id, client);
  return async () => {
    clients.delete(client.id);
    lastProgressAt.delete(client.id);
    await viewerSessionService.closeSession(client.id);
  };
}

let listenersAttached = false;

export function attachSessionListeners(): void {
  if (listenersAttached) return;
  listenersAttached = true;
  viewerSessionService.viewerSessionEvents.on('progress', onProgress);
  viewerSessionService.viewerSessionEvents.on('settled', onSettled);
}

// ============================================================================
// Initialization
// ============================================================================

export function init(server: HttpServer, authToken: string): WebSocketServer {
  const wss = new WebSocketServer({
    server,
    path: '/ws',
    verifyClient: ({ req }: { req: IncomingMessage }) => validateWebSocketAuth(req, authToken),
  });

  attachSessionListeners();

  wss.on('connection', (ws: WebSocket) => {
    const client: ViewerClient = {
      id: randomUUID(),
      send: (message) => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(JSON.stringify(message));
        }
      },
    };
    const unregister = registerClient(client);
    log.log(`Client ${client.id} connected (${clients.size} total)`);

    ws.on('message', (data) => {
      handleRawMessage(client, data.toString()).catch((err: unknown) => {
        log.error(`Failed to handle message from ${client.id}:`, err);
      });
    });

    ws.on('close', () => {
      unregister()
        .then(() => log.log(`Client ${client.id} disconnected (${clients.size} remaining)`))
        .catch((err: unknown) => log.error(`Failed to close session of ${client.id}:`, err));
    });
  });

  log.log(' Handler initialized');
  return wss;
}
