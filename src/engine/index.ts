export * from './builder-adapter';
export * from './cancellation';
export * from './issue-detector';
export * from './orchestrator';
export * from './policy';
export * from './remediation';
export * from './remediation-rules';
export * from './state-machine';
