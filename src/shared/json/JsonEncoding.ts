/**
 * JsonEncoding - JSON validity testing and encoding primitives.
 *
 * Everything here works on UTF-8 bytes or strings and never touches a sink.
 */

import { SerializationError } from '../errors/ResponseErrors.js';

/**
 * Characters escaped by the HTML-safe encoder, plus the two line terminators
 * that are legal in JSON strings but not in JavaScript source.
 */
const HTML_UNSAFE = /[<>&]/g;
const LINE_TERMINATORS = /[\u2028\u2029]/g;

/**
 * Any value JSON can carry without loss.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

/**
 * Options shared by the encoding helpers.
 */
export interface JsonEncodingOptions {
    /** Escape <, > and & as \u003c, \u003e and \u0026 (default: true) */
    escapeHtml?: boolean;
}

/**
 * Encode a string as UTF-8 bytes.
 */
export function toUtf8(text: string): Uint8Array {
    return utf8Encoder.encode(text);
}

/**
 * Report whether the given text or bytes form one complete JSON value.
 *
 * Leading and trailing whitespace is allowed; empty input and bytes that are
 * not valid UTF-8 are not JSON.
 */
export function isValidJson(input: string | Uint8Array): boolean {
    let text: string;
    if (typeof input === 'string') {
        text = input;
    } else {
        try {
            text = utf8Decoder.decode(input);
        } catch {
            return false;
        }
    }

    if (text.trim().length === 0) {
        return false;
    }

    try {
        JSON.parse(text);
        return true;
    } catch {
        return false;
    }
}

function toUnicodeEscape(char: string): string {
    return '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0');
}

/**
 * Apply the post-encoding escapes to serialized JSON text.
 *
 * Only string contents can hold these characters, so replacing them across
 * the whole document keeps it valid and equal in meaning.
 */
export function escapeJsonText(json: string, options: JsonEncodingOptions = {}): string {
    const escapeHtml = options.escapeHtml ?? true;
    let result = json.replace(LINE_TERMINATORS, toUnicodeEscape);
    if (escapeHtml) {
        result = result.replace(HTML_UNSAFE, toUnicodeEscape);
    }
    return result;
}

/**
 * Encode a string as a quoted JSON string literal.
 *
 * Quotes, backslashes and control characters are escaped, so the result is
 * valid JSON for any input.
 */
export function encodeJsonString(text: string, options: JsonEncodingOptions = {}): string {
    return escapeJsonText(JSON.stringify(text), options);
}

function describeType(value: unknown): string {
    return typeof value === 'object' && value !== null ? value.constructor?.name ?? 'object' : typeof value;
}

/**
 * JSON.stringify replacer applied at every depth: maps with string keys
 * become objects, anything JSON would silently drop or mangle is rejected.
 */
function toJsonCompatible(_key: string, value: unknown): unknown {
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new SerializationError(`unsupported value: ${String(value)}`);
    }
    if (typeof value === 'function' || typeof value === 'symbol') {
        throw new SerializationError(`unsupported type: ${typeof value}`);
    }
    if (value instanceof Set || value instanceof WeakMap || value instanceof WeakSet) {
        throw new SerializationError(`unsupported type: ${describeType(value)}`);
    }
    if (value instanceof Map) {
        for (const key of value.keys()) {
            if (typeof key !== 'string') {
                throw new SerializationError(`unsupported map key type: ${describeType(key)}`);
            }
        }
        return Object.fromEntries(value);
    }
    return value;
}

/**
 * Encode an arbitrary value as JSON text.
 *
 * `null` and `undefined` both become `null`; a Map with string keys becomes
 * an object. Throws SerializationError for values JSON cannot represent, at
 * any depth: cycles, bigints, non-finite numbers, functions, symbols, sets
 * and maps with non-string keys.
 */
export function encodeJsonValue(value: unknown, options: JsonEncodingOptions = {}): string {
    if (value === undefined) {
        return 'null';
    }

    let json: string | undefined;
    try {
        json = JSON.stringify(value, toJsonCompatible);
    } catch (error) {
        if (error instanceof SerializationError) {
            throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new SerializationError(`cannot encode value as JSON: ${reason}`, error);
    }

    if (json === undefined) {
        throw new SerializationError(`unsupported type: ${typeof value}`);
    }

    return escapeJsonText(json, options);
}
