/**
 * Tidewatch Error Codes
 *
 * Error codes are structured as TIDEWATCH_[CATEGORY][NUMBER]:
 * - A: Authentication errors (A100-A199)
 * - B: Backend errors (B200-B299)
 * - M: Materialization errors (M300-M399)
 * - C: Configuration errors (C400-C499)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Authentication errors (A100-A199)
  TIDEWATCH_A100: {
    code: 'TIDEWATCH_A100',
    message: 'No signed-in identity; synchronizer is detached',
    suggestion: 'Wait for the identity source to hold a value before writing.',
  },

  // Backend errors (B200-B299)
  TIDEWATCH_B200: {
    code: 'TIDEWATCH_B200',
    message: 'Document is not available in the local cache',
    suggestion: 'Read from the server, or listen to the document first so it gets cached.',
  },
  TIDEWATCH_B201: {
    code: 'TIDEWATCH_B201',
    message: 'Snapshot listener failed',
    suggestion: 'The live stream errored. Call refresh() or change a trigger to re-attach.',
  },
  TIDEWATCH_B202: {
    code: 'TIDEWATCH_B202',
    message: 'Read failed',
    suggestion: 'Check backend connectivity and permissions for the resolved location.',
  },
  TIDEWATCH_B203: {
    code: 'TIDEWATCH_B203',
    message: 'Document not found',
    suggestion: 'Use a merging set instead of update when the document may not exist yet.',
  },
  TIDEWATCH_B204: {
    code: 'TIDEWATCH_B204',
    message: 'Write failed',
    suggestion: 'The backend rejected the write. Inspect the cause for details.',
  },

  // Materialization errors (M300-M399)
  TIDEWATCH_M300: {
    code: 'TIDEWATCH_M300',
    message: 'Could not materialize document',
    suggestion: 'The stored fields do not match what the model fromJson expects.',
  },

  // Configuration errors (C400-C499)
  TIDEWATCH_C400: {
    code: 'TIDEWATCH_C400',
    message: 'Invalid synchronizer option',
    suggestion: 'Check the option values passed to the synchronizer constructor.',
  },

  // Internal errors (X900-X999)
  TIDEWATCH_X900: {
    code: 'TIDEWATCH_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'authentication'
  | 'backend'
  | 'materialization'
  | 'configuration'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(10);
  switch (letter) {
    case 'A':
      return 'authentication';
    case 'B':
      return 'backend';
    case 'M':
      return 'materialization';
    case 'C':
      return 'configuration';
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
