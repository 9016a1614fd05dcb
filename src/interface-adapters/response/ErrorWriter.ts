/**
 * ErrorWriter - Write an error value as a JSON body.
 */

import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { ErrorValue, normalizeError } from '../../shared/errors/ErrorNormalizer.js';
import { JsonEncodingOptions } from '../../shared/json/JsonEncoding.js';
import { writeContent } from './ContentWriter.js';

/**
 * Normalize `err` and write it. An absent error is written as ErrIsNil with
 * status 500, whatever status was requested.
 *
 * Resolves with the number of bytes written; rejects only with the IOError
 * of the underlying write.
 */
export async function writeError(
    sink: IResponseSink,
    err: ErrorValue | null | undefined,
    statusCode: number,
    options: JsonEncodingOptions = {}
): Promise<number> {
    const normalized = normalizeError(err, statusCode, options);
    return writeContent(sink, normalized.body, normalized.statusCode);
}
