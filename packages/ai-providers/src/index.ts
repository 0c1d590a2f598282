export * from './base.js';
export * from './errors.js';
export * from './factory.js';
export * from './providers/custom.js';
export * from './providers/mock.js';
export * from './providers/ollama.js';
export * from './providers/openai.js';
