import { EndfParseError } from '../endf/errors.js';

export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'INTERNAL_ERROR';

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): McpError {
  return new McpError('NOT_FOUND', message, data);
}

export function parseError(err: EndfParseError): McpError {
  return new McpError('PARSE_ERROR', err.message, {
    kind: err.kind,
    line: err.line,
    expected: err.expected,
  });
}
