/**
 * ErrorNormalizer - Turn any error value into a valid JSON response body.
 *
 * An error whose message is already JSON (a structured error marshaled to
 * text) is passed through byte for byte. Any other message is encoded as a
 * JSON string. An absent error is replaced by ErrIsNil and answered with 500.
 */

import { ErrIsNil } from './ResponseErrors.js';
import { encodeJsonString, isValidJson, JsonEncodingOptions, toUtf8 } from '../json/JsonEncoding.js';

/**
 * Anything that can describe itself with a message. Every Error qualifies.
 */
export interface ErrorValue {
    readonly message: string;
}

/**
 * Status sent whenever the nil sentinel stands in for a missing error.
 */
export const NIL_ERROR_STATUS = 500;

/**
 * Outcome of normalizing one error value.
 */
export interface NormalizedError {
    /** JSON body to send */
    body: Uint8Array;
    /** Status to send; differs from the requested one only for absent errors */
    statusCode: number;
    /** True when the message was already JSON and is sent unchanged */
    passThrough: boolean;
    /** True when ErrIsNil was substituted for an absent error */
    substitutedNil: boolean;
}

/**
 * Normalize an error value and requested status into the body and status to send.
 */
export function normalizeError(
    err: ErrorValue | null | undefined,
    statusCode: number,
    options: JsonEncodingOptions = {}
): NormalizedError {
    const substitutedNil = err === null || err === undefined;
    const source: ErrorValue = err ?? ErrIsNil;
    const effectiveStatus = substitutedNil ? NIL_ERROR_STATUS : statusCode;

    const message = source.message;

    if (isValidJson(message)) {
        return {
            body: toUtf8(message),
            statusCode: effectiveStatus,
            passThrough: true,
            substitutedNil,
        };
    }

    return {
        body: toUtf8(encodeJsonString(message, options)),
        statusCode: effectiveStatus,
        passThrough: false,
        substitutedNil,
    };
}

function hasMessage(value: object): value is ErrorValue {
    return 'message' in value && typeof value.message === 'string';
}

/**
 * Adapt a value caught in a catch block to an ErrorValue.
 *
 * Errors and objects with a string message are kept, strings become the
 * message, null and undefined stay absent so the nil guard applies.
 */
export function toErrorValue(thrown: unknown): ErrorValue | undefined {
    if (thrown === null || thrown === undefined) {
        return undefined;
    }

    if (thrown instanceof Error) {
        return thrown;
    }

    if (typeof thrown === 'string') {
        return new Error(thrown);
    }

    if (typeof thrown === 'object' && hasMessage(thrown)) {
        return thrown;
    }

    return new Error(String(thrown));
}
