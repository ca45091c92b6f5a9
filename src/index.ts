/**
 * genswitch: automated update orchestrator for declarative systems.
 *
 * Public exports for programmatic use. `main.ts` starts the HTTP server.
 */

export { createApp, createAppContext, startupWarnings } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, validateConfig } from './config';
export type { AppConfig, WebhookConfig } from './config';
export * from './logger';
export * from './domain';
export * from './adapters';
export * from './generations';
export * from './engine';
export * from './storage';
export * from './audit';
export * from './reporting';
export * from './notifications';
