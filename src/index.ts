/**
 * Main entry point for the settings accessor library
 */
export * from './types';
export * from './errors/config-errors';
export * from './core';
export * from './stores';
export * from './config';
export * from './settings';
export { createLogger } from './utils/logger';
