/**
 * Generation store exports.
 */

export * from './generation-store';
export * from './target-lock';
