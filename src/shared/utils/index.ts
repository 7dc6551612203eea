export { createLogger, type Logger } from './debug.js';
export { getErrorMessage, getErrorCode } from './error.js';
export { mapInBatches } from './concurrency.js';
export { formatSchemaIssues } from './validation.js';
