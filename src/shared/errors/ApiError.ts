/**
 * ApiError - Structured error whose message is already a JSON document.
 *
 * Written through the error path, the message passes through unchanged, so
 * clients receive the code and details as a JSON object.
 */

import { ErrorCode, ERROR_CODE_TO_STATUS } from './ErrorCodes.js';
import { JsonValue } from '../json/JsonEncoding.js';

/**
 * Body produced by an ApiError.
 */
export interface ApiErrorBody {
    code: ErrorCode;
    message: string;
    details?: JsonValue;
}

/**
 * API error with standardized structure.
 */
export class ApiError extends Error {
    readonly code: ErrorCode;
    readonly statusCode: number;
    readonly description: string;
    readonly details?: JsonValue;

    constructor(code: ErrorCode, description: string, details?: JsonValue) {
        const body: ApiErrorBody = { code, message: description };
        if (details !== undefined) {
            body.details = details;
        }
        super(JSON.stringify(body));
        this.name = 'ApiError';
        this.code = code;
        this.statusCode = ERROR_CODE_TO_STATUS[code] ?? 500;
        this.description = description;
        this.details = details;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    /**
     * The body as an object, equal to parsing `message`.
     */
    toBody(): ApiErrorBody {
        const body: ApiErrorBody = { code: this.code, message: this.description };
        if (this.details !== undefined) {
            body.details = this.details;
        }
        return body;
    }

    static badRequest(message = 'Bad request'): ApiError {
        return new ApiError('BAD_REQUEST', message);
    }

    static unauthorized(message = 'Authentication required'): ApiError {
        return new ApiError('UNAUTHORIZED', message);
    }

    static forbidden(message = 'Access denied'): ApiError {
        return new ApiError('FORBIDDEN', message);
    }

    /**
     * Create a not found error.
     */
    static notFound(resource: string, id?: string): ApiError {
        const message = id
            ? `${resource} not found: ${id}`
            : `${resource} not found`;
        return new ApiError('NOT_FOUND', message);
    }

    static conflict(message: string, details?: JsonValue): ApiError {
        return new ApiError('CONFLICT', message, details);
    }

    /**
     * Create a validation error, usually with field-level details.
     */
    static validation(message: string, details?: JsonValue): ApiError {
        return new ApiError('VALIDATION_ERROR', message, details);
    }

    static internal(message = 'Internal server error'): ApiError {
        return new ApiError('INTERNAL_ERROR', message);
    }

    static serviceUnavailable(message = 'Service temporarily unavailable'): ApiError {
        return new ApiError('SERVICE_UNAVAILABLE', message);
    }

    static timeout(message = 'Request timeout'): ApiError {
        return new ApiError('TIMEOUT', message);
    }
}
