/**
 * Re-exports the workflow-graph execution engine.
 */
export * from './execution/executor';
export * from './execution/node';
export * from './execution/threadLock';
export * from './channels/registry';
export * from './graph/builder';
export * from './graph/router';
export * from './errors';
