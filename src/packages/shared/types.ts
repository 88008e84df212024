export * from './viewer-types.js';
export * from './websocket-messages.js';
