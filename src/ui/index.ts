/**
 * UI module exports for the cokacenc CLI
 */

export * from './logger.js';
export * from './spinner.js';
