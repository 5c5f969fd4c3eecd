export * from './checkpoint/memory';
export * from './checkpoint/file';
export * from './logger/pino';
export * from './logger/fake';
export * from './llm/fake';
export * from './openai/llm';
