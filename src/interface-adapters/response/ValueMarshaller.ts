/**
 * ValueMarshaller - Encode a value as JSON and write it.
 */

import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { encodeJsonValue, JsonEncodingOptions } from '../../shared/json/JsonEncoding.js';
import { writeContent } from './ContentWriter.js';

/**
 * Encode `value` and write it with the given status.
 *
 * Encoding happens first: a SerializationError leaves the sink untouched.
 */
export async function writeMarshalled(
    sink: IResponseSink,
    value: unknown,
    statusCode: number,
    options: JsonEncodingOptions = {}
): Promise<number> {
    const json = encodeJsonValue(value, options);
    return writeContent(sink, json, statusCode);
}
