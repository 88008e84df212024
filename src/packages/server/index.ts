/**
 * Viewer Server
 * Entry point for the backend server
 */

import 'dotenv/config';
import { createServer } from 'http';
import { createApp } from './app.js';
import { loadViewerConfig } from './config/viewer-config.js';
import { viewerSessionService } from './services/index.js';
import * as websocket from './websocket/handler.js';
import { logger } from './utils/logger.js';

const config = loadViewerConfig();

// ============================================================================
// Global Error Handlers
// ============================================================================

process.on('uncaughtException', (err) => {
  logger.server.error('Uncaught exception (server will continue):', err);
});

process.on('unhandledRejection', (reason) => {
  logger.server.error('Unhandled promise rejection (server will continue):', reason);
});

async function main(): Promise<void> {
  logger.server.log(
    `Chunk size ${config.chunkSize} bytes, sync threshold ${config.syncThreshold} bytes, ` +
    `encoding confidence > ${config.confidenceThreshold}`
  );

  const app = createApp(config);
  const server = createServer(app);

  websocket.init(server, config.authToken);

  server.listen(config.port, config.host, () => {
    logger.server.log(`Server running on http://${config.host}:${config.port}`);
    logger.server.log(`WebSocket available at ws://${config.host}:${config.port}/ws`);
    logger.server.log(`API available at http://${config.host}:${config.port}/api`);
  });

  // Graceful shutdown
  process.on('SIGINT', () => {
    logger.server.warn('Shutting down...');
    viewerSessionService
      .closeAllSessions()
      .catch((err: unknown) => logger.server.error('Failed to close viewer sessions:', err))
      .finally(() => {
        server.close();
        process.exit(0);
      });
  });
}

main().catch((err: unknown) => {
  logger.server.error('Failed to start server:', err);
  process.exit(1);
});
