export * from './interfaces';
export * from './target-registry';
