/**
 * RecordingResponseSink - In-memory IResponseSink.
 *
 * Records what a writer sent so callers can inspect it, and enforces the
 * same ordering rules as a real response: head first, one status, one body.
 */

import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { IOError } from '../../shared/errors/ResponseErrors.js';
import { assertValidStatusCode } from './StatusCode.js';

export type SinkCall = 'setHeader' | 'setStatus' | 'write';

export interface RecordingSinkOptions {
    /** Reject every write with this error, wrapped in an IOError */
    failWritesWith?: Error;
}

/**
 * Status a response gets when the body is written without one.
 */
const IMPLICIT_STATUS = 200;

export class RecordingResponseSink implements IResponseSink {
    readonly calls: SinkCall[] = [];
    private readonly headers = new Map<string, string>();
    private status?: number;
    private chunks: Uint8Array[] = [];
    private ended = false;
    private readonly failWritesWith?: Error;

    constructor(options: RecordingSinkOptions = {}) {
        this.failWritesWith = options.failWritesWith;
    }

    setHeader(key: string, value: string): void {
        if (this.ended) {
            throw new IOError(`cannot set header ${key}: headers already sent`);
        }
        this.calls.push('setHeader');
        this.headers.set(key.toLowerCase(), value);
    }

    setStatus(statusCode: number): void {
        if (this.status !== undefined) {
            throw IOError.statusAlreadySet(this.status);
        }
        if (this.ended) {
            throw new IOError('cannot set status: headers already sent');
        }
        assertValidStatusCode(statusCode);
        this.calls.push('setStatus');
        this.status = statusCode;
    }

    async write(body: Uint8Array): Promise<number> {
        if (this.failWritesWith) {
            throw IOError.from(this.failWritesWith, 'write failed');
        }
        if (this.ended) {
            throw IOError.alreadyEnded();
        }
        this.calls.push('write');
        this.status ??= IMPLICIT_STATUS;
        this.chunks.push(Uint8Array.from(body));
        this.ended = true;
        return body.byteLength;
    }

    /**
     * Header value by case-insensitive name.
     */
    header(name: string): string | undefined {
        return this.headers.get(name.toLowerCase());
    }

    get headerCount(): number {
        return this.headers.size;
    }

    /**
     * Status sent, or undefined while nothing was sent.
     */
    get statusCode(): number | undefined {
        return this.status;
    }

    get body(): Buffer {
        return Buffer.concat(this.chunks);
    }

    get text(): string {
        return this.body.toString('utf8');
    }

    get finished(): boolean {
        return this.ended;
    }
}
