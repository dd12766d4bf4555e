export * from './config.js';
export * from './task.js';
