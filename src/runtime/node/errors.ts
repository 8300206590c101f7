/**
 * Node.js errors implementation
 */

import type { RuntimeErrors } from "../types.ts";

/**
 * Check if an error is a Node.js system error with one of the given codes
 */
function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  const isErrorWithCode = error instanceof Error && "code" in error;
  if (isErrorWithCode) {
    return codes.includes(String(error.code));
  }
  return false;
}

export const nodeErrors: RuntimeErrors = {
  isNotFound(error: unknown): boolean {
    return hasErrorCode(error, "ENOENT");
  },

  isPermissionDenied(error: unknown): boolean {
    return hasErrorCode(error, "EACCES", "EPERM", "EROFS");
  },

  isNoSpace(error: unknown): boolean {
    return hasErrorCode(error, "ENOSPC", "EDQUOT");
  },

  isNotDirectory(error: unknown): boolean {
    return hasErrorCode(error, "ENOTDIR", "EEXIST");
  },
};
