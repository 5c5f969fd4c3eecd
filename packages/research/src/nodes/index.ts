export * from './agent';
export * from './approval';
export * from './summarize';
export * from './tools';
export * from './types';
export * from './utils/completeWithRetry';
export * from './utils/executeTools';
