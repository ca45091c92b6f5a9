/**
 * Domain model exports.
 */

export * from './audit';
export * from './errors';
export * from './generation';
export * from './issue';
export * from './revision';
export * from './session';
