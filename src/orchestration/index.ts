export * from './types';
export * from './dependency-graph';
export * from './resource-specs';
export * from './pipeline-tasks';
export * from './reconciler';
export * from './deployment-orchestrator';
export * from './teardown-engine';
