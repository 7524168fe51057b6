/**
 * Standard error codes for Sale Core.
 * Every `sale.*` gateway method answers failures with one of these codes.
 */

/**
 * Stable error codes enum.
 * These codes are part of the public API contract and should never change.
 */
export enum ErrorCode {
  E_INVALID_ARGUMENT = "E_INVALID_ARGUMENT",
  E_AUTH_REQUIRED = "E_AUTH_REQUIRED",
  E_FORBIDDEN = "E_FORBIDDEN",
  E_NOT_FOUND = "E_NOT_FOUND",
  E_CONFLICT = "E_CONFLICT",
  E_QUOTA_EXCEEDED = "E_QUOTA_EXCEEDED",
  E_INSUFFICIENT_FUNDS = "E_INSUFFICIENT_FUNDS",
  E_OVERFLOW = "E_OVERFLOW",
  E_INTERNAL = "E_INTERNAL",
  E_UNAVAILABLE = "E_UNAVAILABLE",
  E_TIMEOUT = "E_TIMEOUT",
}

/**
 * Standard error response structure.
 */
export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export const ERROR_CODE_DESCRIPTIONS: Record<ErrorCode, string> = {
  [ErrorCode.E_INVALID_ARGUMENT]:
    "The request contains invalid or missing parameters. Please check your input and try again.",
  [ErrorCode.E_AUTH_REQUIRED]: "Authentication is required. Provide an actorId or connect a client.",
  [ErrorCode.E_FORBIDDEN]: "You don't have permission to perform this action.",
  [ErrorCode.E_NOT_FOUND]: "The requested sale, purchase or item could not be found.",
  [ErrorCode.E_CONFLICT]: "The operation conflicts with the current sale lifecycle state.",
  [ErrorCode.E_QUOTA_EXCEEDED]: "A purchase, mint or batch limit has been exceeded.",
  [ErrorCode.E_INSUFFICIENT_FUNDS]: "The attached payment does not cover the required amount.",
  [ErrorCode.E_OVERFLOW]: "An amount left the supported 128-bit unsigned range.",
  [ErrorCode.E_INTERNAL]:
    "An internal error occurred. Please try again later. If the problem persists, contact support.",
  [ErrorCode.E_UNAVAILABLE]: "The service is temporarily unavailable. Please try again later.",
  [ErrorCode.E_TIMEOUT]: "The operation timed out. Please try again.",
};

/** Build an `Error` whose message carries a stable code prefix, e.g. `E_CONFLICT: ...`. */
export function saleError(code: ErrorCode, message: string): Error {
  return new Error(`${code}: ${message}`);
}

export const invalidArgument = (message: string) => saleError(ErrorCode.E_INVALID_ARGUMENT, message);
export const forbidden = (message: string) => saleError(ErrorCode.E_FORBIDDEN, message);
export const notFound = (message: string) => saleError(ErrorCode.E_NOT_FOUND, message);
export const conflict = (message: string) => saleError(ErrorCode.E_CONFLICT, message);
export const quotaExceeded = (message: string) => saleError(ErrorCode.E_QUOTA_EXCEEDED, message);
export const insufficientFunds = (message: string) =>
  saleError(ErrorCode.E_INSUFFICIENT_FUNDS, message);
export const overflow = (message: string) => saleError(ErrorCode.E_OVERFLOW, message);
