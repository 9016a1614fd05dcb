/**
 * Range of status codes an HTTP/1.1 response line can carry.
 */

import { IOError } from '../../shared/errors/ResponseErrors.js';

export const MIN_STATUS_CODE = 100;
export const MAX_STATUS_CODE = 999;

export function assertValidStatusCode(statusCode: number): void {
    if (!Number.isInteger(statusCode) || statusCode < MIN_STATUS_CODE || statusCode > MAX_STATUS_CODE) {
        throw IOError.invalidStatus(statusCode);
    }
}
