export * from './state-machine';
export * from './step-runner';
export * from './orchestrator';
