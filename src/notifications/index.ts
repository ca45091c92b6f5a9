export * from './webhook';
export * from './log-channel';
