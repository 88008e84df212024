/**
 * Services Module
 * Exports all service modules
 */

export * as viewerSessionService from './viewer-session-service.js';
