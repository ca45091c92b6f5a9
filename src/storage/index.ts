/**
 * Storage exports.
 */

export * from './store';
export * from './memory-store';
export * from './file-generation-backend';
