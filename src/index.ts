// src/index.ts
// Entry point
export * from './types';
export * from './errors';
export * from './operators';
export * from './functions';
export * from './lexer';
export * from './parser';
export * from './evaluator';
export * from './store';
export * from './context';
export * from './engine';
export * from './numeric';
export * from './plot';
export * from './format';
export * from './history';
export * from './commands';
export * from './session';
export * from './selftest';
export * from './config';
export * from './logger';
