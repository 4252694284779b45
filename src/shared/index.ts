export { McpError, invalidParams, notFound, parseError } from './errors.js';
export type { ErrorCode } from './errors.js';
