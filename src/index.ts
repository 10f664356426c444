export * from './types';
export * from './core';
export * as expression from './core/expression';
export { loadConfig, getDefaultConfig, validateConfig } from './config';
export { createApp, createApiRouter, startServer } from './api';
