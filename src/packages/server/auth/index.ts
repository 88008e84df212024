/**
 * Authentication Module
 * Token-based authentication for HTTP and WebSocket connections
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'http';
import { logger } from '../utils/logger.js';

const log = logger.server;

/**
 * Shorten a token for display in startup logs
 */
export function getAuthTokenPreview(authToken: string): string {
  if (!authToken) return '(not set)';
  if (authToken.length <= 8) return '***';
  return `${authToken.slice(0, 4)}...${authToken.slice(-4)}`;
}

/**
 * An empty configured token means authentication is disabled
 */
export function validateToken(authToken: string, token: string | null | undefined): boolean {
  if (!authToken) return true;
  return token === authToken;
}

/**
 * Extract token from an HTTP request
 * Checks: Authorization header, X-Auth-Token header, query param
 */
export function extractTokenFromRequest(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }

  const tokenHeader = req.headers['x-auth-token'];
  if (typeof tokenHeader === 'string') {
    return tokenHeader;
  }

  const queryToken = req.query.token;
  if (typeof queryToken === 'string') {
    return queryToken;
  }

  return null;
}

/**
 * Extract token from a WebSocket upgrade request
 * Checks: query param in URL, "auth-<token>" subprotocol
 */
export function extractTokenFromWebSocket(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
  const queryToken = url.searchParams.get('token');
  if (queryToken) {
    return queryToken;
  }

  const protocol = req.headers['sec-websocket-protocol'];
  if (typeof protocol === 'string') {
    const tokenPart = protocol.split(',').map(p => p.trim()).find(p => p.startsWith('auth-'));
    if (tokenPart) {
      return tokenPart.slice(5);
    }
  }

  return null;
}

/**
 * Express middleware; /health stays reachable without a token
 */
export function createAuthMiddleware(authToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === '/health' || !authToken) {
      next();
      return;
    }

    if (!validateToken(authToken, extractTokenFromRequest(req))) {
      log.log(`[AUTH] Unauthorized request to ${req.method} ${req.path}`);
      res.status(401).json({ error: 'Unauthorized', message: 'Invalid or missing auth token' });
      return;
    }

    next();
  };
}

export function validateWebSocketAuth(req: IncomingMessage, authToken: string): boolean {
  const isValid = validateToken(authToken, extractTokenFromWebSocket(req));
  if (!isValid) {
    log.log('[AUTH] Unauthorized WebSocket connection attempt');
  }
  return isValid;
}
