import { describe, it, expect, beforeEach } from 'vitest';
import { writeContent, JSON_CONTENT_TYPE } from '../ContentWriter.js';
import { RecordingResponseSink } from '../../../infrastructure/sinks/RecordingResponseSink.js';
import { IOError } from '../../../shared/errors/ResponseErrors.js';
import { isValidJson, toUtf8 } from '../../../shared/json/JsonEncoding.js';

describe('ContentWriter', () => {
    let sink: RecordingResponseSink;

    beforeEach(() => {
        sink = new RecordingResponseSink();
    });

    it('should write the payload bytes with the status code and JSON content type', async () => {
        const payload = toUtf8('{"name": "cale"}');

        const written = await writeContent(sink, payload, 200);

        expect(written).toBe(payload.byteLength);
        expect(sink.text).toBe('{"name": "cale"}');
        expect(isValidJson(sink.body)).toBe(true);
        expect(sink.statusCode).toBe(200);
        expect(sink.header('Content-Type')).toBe(JSON_CONTENT_TYPE);
    });

    it('should send an empty body for an absent payload', async () => {
        const written = await writeContent(sink, undefined, 200);

        expect(written).toBe(0);
        expect(sink.body.length).toBe(0);
        expect(isValidJson(sink.body)).toBe(false);
        expect(sink.statusCode).toBe(200);
        expect(sink.header('content-type')).toBe('application/json');
    });

    it('should treat null and empty payloads the same way', async () => {
        await writeContent(sink, null, 204);
        const other = new RecordingResponseSink();
        await writeContent(other, new Uint8Array(0), 204);

        expect(sink.body.length).toBe(0);
        expect(other.body.length).toBe(0);
        expect(other.statusCode).toBe(204);
    });

    it('should encode string payloads as UTF-8', async () => {
        const written = await writeContent(sink, '"café"', 201);

        expect(written).toBe(7);
        expect(sink.text).toBe('"café"');
        expect(sink.statusCode).toBe(201);
    });

    it('should not validate the payload', async () => {
        await writeContent(sink, 'not json', 200);

        expect(sink.text).toBe('not json');
    });

    it('should set the header and the status before the body', async () => {
        await writeContent(sink, '{}', 200);

        expect(sink.calls).toEqual(['setHeader', 'setStatus', 'write']);
        expect(sink.headerCount).toBe(1);
    });

    it('should propagate a failed write as an IOError', async () => {
        const failing = new RecordingResponseSink({ failWritesWith: new Error('connection reset') });

        const result = writeContent(failing, '{}', 200);

        await expect(result).rejects.toBeInstanceOf(IOError);
        await expect(result).rejects.toThrow('write failed: connection reset');
    });

    it('should refuse a second status on the same sink', async () => {
        sink.setStatus(201);

        await expect(writeContent(sink, '{}', 200)).rejects.toThrow('status already set to 201');
        expect(sink.finished).toBe(false);
        expect(sink.statusCode).toBe(201);
    });
});
