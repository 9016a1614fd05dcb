/**
 * NodeResponseSink - IResponseSink over node's http.ServerResponse.
 *
 * `write` sends the body and ends the response; it resolves once the
 * response has finished and rejects if the connection closes first. A
 * failed write still ends the response.
 */

import { ServerResponse } from 'http';
import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { IOError } from '../../shared/errors/ResponseErrors.js';
import { assertValidStatusCode } from './StatusCode.js';

/**
 * Status sent when the body could not be written before the head went out.
 */
const FALLBACK_STATUS = 500;

export class NodeResponseSink implements IResponseSink {
    private statusSet = false;

    constructor(private readonly res: ServerResponse) {}

    setHeader(key: string, value: string): void {
        if (this.res.headersSent) {
            throw new IOError(`cannot set header ${key}: headers already sent`);
        }
        this.res.setHeader(key, value);
    }

    setStatus(statusCode: number): void {
        if (this.statusSet) {
            throw IOError.statusAlreadySet(this.res.statusCode);
        }
        if (this.res.headersSent) {
            throw new IOError('cannot set status: headers already sent');
        }
        assertValidStatusCode(statusCode);
        this.res.statusCode = statusCode;
        this.statusSet = true;
    }

    write(body: Uint8Array): Promise<number> {
        if (this.res.writableEnded || this.res.destroyed) {
            return Promise.reject(IOError.alreadyEnded());
        }

        return new Promise<number>((resolve, reject) => {
            const cleanup = (): void => {
                this.res.off('finish', onFinish);
                this.res.off('close', onClose);
                this.res.off('error', onError);
            };
            const onFinish = (): void => {
                cleanup();
                resolve(body.byteLength);
            };
            const onClose = (): void => {
                cleanup();
                reject(new IOError('connection closed before the response finished'));
            };
            const onError = (error: Error): void => {
                cleanup();
                reject(IOError.from(error, 'response stream failed'));
            };

            this.res.once('finish', onFinish);
            this.res.once('close', onClose);
            this.res.once('error', onError);
            try {
                this.res.end(body);
            } catch (error) {
                cleanup();
                reject(IOError.from(error, 'cannot write response body'));
                this.abandon();
            }
        });
    }

    /**
     * Finish a response whose body could not be sent, so the client is not
     * left waiting: a bare 500 while the head is still unsent, otherwise the
     * connection is torn down.
     */
    private abandon(): void {
        if (this.res.headersSent || this.res.writableEnded) {
            this.res.destroy();
            return;
        }
        this.res.statusCode = FALLBACK_STATUS;
        this.res.end();
    }
}
