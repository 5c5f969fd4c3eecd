export * from './assistant';
export * from './config';
export * from './graph';
export * from './nodes';
export * from './prompts';
export * from './router';
export * from './state';
export * from './tools';
