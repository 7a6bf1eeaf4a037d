import { ErrorCode } from '../constants.ts';
import type { CodedError } from '../types.ts';

const errorCodes: readonly string[] = Object.values(ErrorCode);

/**
 * Checks if an error carries one of the robolink error codes. Checks the code
 * rather than the class so errors from another copy of this package match.
 *
 * @param error - The error to check.
 * @returns Whether the error is a coded robolink error.
 */
export function isCodedError(error: unknown): error is CodedError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    errorCodes.includes(error.code)
  );
}
