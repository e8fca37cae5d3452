/**
 * Docket Error Codes
 *
 * Error codes are structured as DOCKET_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - Q: Query and cursor errors (Q200-Q299)
 * - S: Storage errors (S300-S399)
 * - D: Document lifecycle errors (D400-D499)
 * - I: Index and constraint errors (I600-I699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  DOCKET_V100: {
    code: 'DOCKET_V100',
    message: 'Validation failed',
    suggestion: 'Inspect document.errors for the failing fields.',
  },

  // Query errors (Q200-Q299)
  DOCKET_Q200: {
    code: 'DOCKET_Q200',
    message: 'Query execution failed',
    suggestion: 'Check the filter passed to the store driver.',
  },
  DOCKET_Q204: {
    code: 'DOCKET_Q204',
    message: 'Cursor already started',
    suggestion: 'Apply sort, skip and limit before the first call to next().',
  },
  DOCKET_Q205: {
    code: 'DOCKET_Q205',
    message: 'Invalid pagination parameters',
    suggestion: 'Ensure skip and limit are non-negative integers.',
  },

  // Storage errors (S300-S399)
  DOCKET_S300: {
    code: 'DOCKET_S300',
    message: 'Storage operation failed',
    suggestion: 'Check the store driver configuration and connectivity.',
  },
  DOCKET_S301: {
    code: 'DOCKET_S301',
    message: 'Storage driver not available',
    suggestion: 'The store driver is not supported in this environment.',
  },
  DOCKET_S302: {
    code: 'DOCKET_S302',
    message: 'Invalid storage configuration',
    suggestion: 'Check the connection URI and database name.',
  },
  DOCKET_S303: {
    code: 'DOCKET_S303',
    message: 'Database initialization failed',
    suggestion: 'Check database configuration and permissions.',
  },
  DOCKET_S305: {
    code: 'DOCKET_S305',
    message: 'Database is closed',
    suggestion: 'Create a new Database instance; a closed one cannot be reopened.',
  },

  // Document errors (D400-D499)
  DOCKET_D401: {
    code: 'DOCKET_D401',
    message: 'Document not found',
    suggestion: 'The record backing this document no longer exists in the store.',
  },
  DOCKET_D402: {
    code: 'DOCKET_D402',
    message: 'Document has been removed',
    suggestion: 'Removed documents cannot be written again; construct a new one.',
  },
  DOCKET_D403: {
    code: 'DOCKET_D403',
    message: 'Document has no identity',
    suggestion: 'Insert the document before updating or removing it.',
  },
  DOCKET_D404: {
    code: 'DOCKET_D404',
    message: 'Document is already persisted',
    suggestion: 'Use update() for documents that were inserted or loaded from the store.',
  },
  DOCKET_D405: {
    code: 'DOCKET_D405',
    message: 'Document identity is immutable',
    suggestion: 'The _id of a persisted document cannot be changed.',
  },
  DOCKET_D406: {
    code: 'DOCKET_D406',
    message: 'Document has an insert or remove in progress',
    suggestion: 'Await the pending write before starting another one on the same document.',
  },

  // Index errors (I600-I699)
  DOCKET_I600: {
    code: 'DOCKET_I600',
    message: 'Constraint violation',
    suggestion: 'The store rejected the write. Inspect the cause for details.',
  },
  DOCKET_I603: {
    code: 'DOCKET_I603',
    message: 'Unique constraint violation',
    suggestion: 'A document with the same indexed value already exists.',
  },

  // Internal errors (X900-X999)
  DOCKET_X900: {
    code: 'DOCKET_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
  DOCKET_X902: {
    code: 'DOCKET_X902',
    message: 'Invalid argument',
    suggestion: 'Check the options passed to the call.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'query' | 'storage' | 'document' | 'index' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(7);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'Q':
      return 'query';
    case 'S':
      return 'storage';
    case 'D':
      return 'document';
    case 'I':
      return 'index';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
