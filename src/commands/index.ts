export * from './shared.js';
export * from './list.js';
export * from './search.js';
export * from './bulk.js';
export * from './filter.js';
export * from './config.js';
export * from './status.js';
export * from './show.js';
export * from './mutate.js';
export * from './collections.js';
export * from './default-command.js';
