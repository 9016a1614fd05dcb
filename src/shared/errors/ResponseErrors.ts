/**
 * ResponseErrors - Failure types raised while writing a response.
 *
 * IOError comes from the sink, SerializationError from encoding a value.
 * Neither is ever retried here.
 */

/**
 * The response sink failed to accept a header, the status or the body.
 */
export class IOError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'IOError';

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, IOError.prototype);
    }

    /**
     * Wrap whatever a sink threw, keeping an existing IOError as is.
     */
    static from(error: unknown, action: string): IOError {
        if (error instanceof IOError) {
            return error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        return new IOError(`${action}: ${reason}`, error);
    }

    /**
     * Create an error for a sink that already finished its response.
     */
    static alreadyEnded(): IOError {
        return new IOError('response already ended');
    }

    static invalidStatus(statusCode: number): IOError {
        return new IOError(`invalid status code: ${statusCode}`);
    }

    /**
     * Create an error for a second status code on the same response.
     */
    static statusAlreadySet(current: number): IOError {
        return new IOError(`status already set to ${current}`);
    }
}

/**
 * A value handed to the marshaller cannot be represented as JSON.
 */
export class SerializationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'SerializationError';
        Object.setPrototypeOf(this, SerializationError.prototype);
    }
}

/**
 * Message of the sentinel written when no error value was supplied.
 */
export const ERR_IS_NIL_MESSAGE = 'error is nil';

/**
 * Sentinel substituted for an absent error on the error path.
 */
export const ErrIsNil: Readonly<Error> = Object.freeze(new Error(ERR_IS_NIL_MESSAGE));
