export type { BatchError, BatchResult, BulkAction, ExecuteBulkOptions } from './operations.js';
export { describeAction, executeBulk, parseTagList, planBulk } from './operations.js';
