/**
 * JsonResponder - Configured entry point to the response writers.
 *
 * Applies ResponderConfig to every write and logs through ILogger. Failures
 * are logged and rethrown unchanged.
 */

import { IResponseSink } from '../../application/ports/IResponseSink.js';
import { DEFAULT_RESPONDER_CONFIG, loadResponderConfig, ResponderConfig } from '../../config/ResponderConfig.js';
import { ConsoleLogger, ILogger, LogContext } from '../../infrastructure/observability/Logger.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { ErrorValue, normalizeError } from '../../shared/errors/ErrorNormalizer.js';
import { encodeJsonValue } from '../../shared/json/JsonEncoding.js';
import { JsonPayload, writeContent } from './ContentWriter.js';

type Operation = 'content' | 'marshalled' | 'error';

export class JsonResponder {
    readonly config: ResponderConfig;
    private readonly logger: ILogger;

    constructor(config: Partial<ResponderConfig> = {}, logger?: ILogger) {
        this.config = { ...DEFAULT_RESPONDER_CONFIG, ...config };
        this.logger = (logger ?? new ConsoleLogger({}, this.config.logLevel))
            .child({ component: 'JsonResponder' });
    }

    /**
     * Create a responder configured from environment variables.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env, logger?: ILogger): JsonResponder {
        return new JsonResponder(loadResponderConfig(env), logger);
    }

    /**
     * Write a pre-encoded JSON payload.
     */
    async content(sink: IResponseSink, payload: JsonPayload | null | undefined, statusCode: number): Promise<number> {
        return this.send(sink, 'content', payload, statusCode, {});
    }

    /**
     * Encode a value and write it. SerializationError is raised before the
     * sink is touched.
     */
    async marshalled(sink: IResponseSink, value: unknown, statusCode: number): Promise<number> {
        let json: string;
        try {
            json = encodeJsonValue(value, { escapeHtml: this.config.escapeHtml });
        } catch (error) {
            this.logger.error('Failed to encode response value', toError(error), {
                operation: 'marshalled',
                statusCode,
            });
            throw error;
        }
        return this.send(sink, 'marshalled', json, statusCode, {});
    }

    /**
     * Normalize and write an error value; an absent error is sent as
     * ErrIsNil with status 500.
     */
    async error(sink: IResponseSink, err: ErrorValue | null | undefined, statusCode: number): Promise<number> {
        const normalized = normalizeError(err, statusCode, { escapeHtml: this.config.escapeHtml });

        if (normalized.substitutedNil) {
            this.logger.warn('Error response written without an error value', {
                operation: 'error',
                requestedStatusCode: statusCode,
                statusCode: normalized.statusCode,
            });
        }

        return this.send(sink, 'error', normalized.body, normalized.statusCode, {
            passThrough: normalized.passThrough,
        });
    }

    /**
     * Write a structured ApiError with its own status code.
     */
    async apiError(sink: IResponseSink, err: ApiError): Promise<number> {
        return this.error(sink, err, err.statusCode);
    }

    private async send(
        sink: IResponseSink,
        operation: Operation,
        payload: JsonPayload | null | undefined,
        statusCode: number,
        context: LogContext
    ): Promise<number> {
        let bytesWritten: number;
        try {
            bytesWritten = await writeContent(sink, payload, statusCode);
        } catch (error) {
            this.logger.error('Failed to write response', toError(error), {
                ...context,
                operation,
                statusCode,
            });
            throw error;
        }

        if (this.config.logResponses) {
            this.logger.debug('Response written', {
                ...context,
                operation,
                statusCode,
                bytesWritten,
            });
        }

        return bytesWritten;
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
