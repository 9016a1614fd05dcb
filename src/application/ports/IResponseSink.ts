/**
 * An HTTP response in progress, as seen by the response writers.
 *
 * Writers set the header and the status before the body, and never read
 * anything back.
 */
export interface IResponseSink {
    setHeader(key: string, value: string): void;

    /**
     * Set the status code. May be called once per response, before `write`.
     */
    setStatus(statusCode: number): void;

    /**
     * Accept the body. Resolves with the number of bytes written and rejects
     * with an IOError when the transport refuses them.
     */
    write(body: Uint8Array): Promise<number>;
}
