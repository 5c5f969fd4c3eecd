export * from './entities/session';
export * from './entities/message';
export * from './contracts/checkpoint';
export * from './contracts/node';
export * from './contracts/tools';
export * from './ports/logger';
export * from './ports/llm';
export * from './utils/message';
export * from './utils/retry';
export * from './utils/timeout';
export * from './config/defaults';
