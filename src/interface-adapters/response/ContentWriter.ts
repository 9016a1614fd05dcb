/**
 * ContentWriter - Write an already encoded JSON payload.
 *
 * Every other writer ends up here, so this is the only place that decides
 * the header, status and body order.
 */

import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { IOError } from '../../shared/errors/ResponseErrors.js';
import { toUtf8 } from '../../shared/json/JsonEncoding.js';

export const CONTENT_TYPE_HEADER = 'Content-Type';
export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Pre-encoded JSON. Strings are sent as UTF-8.
 */
export type JsonPayload = Uint8Array | string;

const EMPTY_BODY = new Uint8Array(0);

/**
 * Write `payload` verbatim with `Content-Type: application/json` and the
 * given status. An absent payload writes an empty body.
 *
 * The payload is not checked for JSON validity.
 */
export async function writeContent(
    sink: IResponseSink,
    payload: JsonPayload | null | undefined,
    statusCode: number
): Promise<number> {
    const body = payload === null || payload === undefined
        ? EMPTY_BODY
        : typeof payload === 'string' ? toUtf8(payload) : payload;

    try {
        sink.setHeader(CONTENT_TYPE_HEADER, JSON_CONTENT_TYPE);
        sink.setStatus(statusCode);
    } catch (error) {
        throw IOError.from(error, 'cannot set response head');
    }

    try {
        return await sink.write(body);
    } catch (error) {
        throw IOError.from(error, 'cannot write response body');
    }
}
