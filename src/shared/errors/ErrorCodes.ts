/**
 * ErrorCodes - Machine-readable codes carried by structured errors.
 */

/**
 * Client error codes.
 */
export const BAD_REQUEST = 'BAD_REQUEST';
export const UNAUTHORIZED = 'UNAUTHORIZED';
export const FORBIDDEN = 'FORBIDDEN';
export const NOT_FOUND = 'NOT_FOUND';
export const CONFLICT = 'CONFLICT';
export const VALIDATION_ERROR = 'VALIDATION_ERROR';

/**
 * Server error codes.
 */
export const INTERNAL_ERROR = 'INTERNAL_ERROR';
export const SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE';
export const TIMEOUT = 'TIMEOUT';

export type ErrorCode =
    | typeof BAD_REQUEST
    | typeof UNAUTHORIZED
    | typeof FORBIDDEN
    | typeof NOT_FOUND
    | typeof CONFLICT
    | typeof VALIDATION_ERROR
    | typeof INTERNAL_ERROR
    | typeof SERVICE_UNAVAILABLE
    | typeof TIMEOUT;

/**
 * Map error codes to HTTP status codes.
 */
export const ERROR_CODE_TO_STATUS: Record<ErrorCode, number> = {
    [BAD_REQUEST]: 400,
    [UNAUTHORIZED]: 401,
    [FORBIDDEN]: 403,
    [NOT_FOUND]: 404,
    [CONFLICT]: 409,
    [VALIDATION_ERROR]: 422,
    [INTERNAL_ERROR]: 500,
    [SERVICE_UNAVAILABLE]: 503,
    [TIMEOUT]: 504,
};
