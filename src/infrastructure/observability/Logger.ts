/**
 * Logger - JSON-line logging for the responder.
 *
 * Entries carry the operation, the requested and effective status and the
 * byte count of each write. The free writer functions never log; only
 * JsonResponder does.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
    component?: string;
    operation?: string;
    statusCode?: number;
    requestedStatusCode?: number;
    bytesWritten?: number;
    passThrough?: boolean;
    [key: string]: unknown;
}

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: Error, context?: LogContext): void;

    /**
     * Logger whose entries also carry `context`.
     */
    child(context: LogContext): ILogger;
}

/**
 * Line-oriented output used by ConsoleLogger; `console` by default.
 */
export interface LogOutput {
    debug(line: string): void;
    info(line: string): void;
    warn(line: string): void;
    error(line: string): void;
}

/**
 * Writes one JSON object per entry to `output`, dropping entries below
 * `minLevel`.
 */
export class ConsoleLogger implements ILogger {
    private baseContext: LogContext;
    private minLevel: LogLevel;
    private output: LogOutput;

    private static levelPriority: Record<LogLevel, number> = {
        debug: 0,
        info: 1,
        warn: 2,
        error: 3,
    };

    constructor(baseContext: LogContext = {}, minLevel: LogLevel = 'debug', output: LogOutput = console) {
        this.baseContext = baseContext;
        this.minLevel = minLevel;
        this.output = output;
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        const errorContext: LogContext = {
            ...context,
            error: error ? {
                name: error.name,
                message: error.message,
                stack: error.stack,
            } : undefined,
        };
        this.log('error', message, errorContext);
    }

    child(context: LogContext): ILogger {
        return new ConsoleLogger(
            { ...this.baseContext, ...context },
            this.minLevel,
            this.output
        );
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (ConsoleLogger.levelPriority[level] < ConsoleLogger.levelPriority[this.minLevel]) {
            return;
        }

        const logEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            ...this.baseContext,
            ...context,
        };

        const output = JSON.stringify(logEntry);

        switch (level) {
            case 'debug':
                this.output.debug(output);
                break;
            case 'info':
                this.output.info(output);
                break;
            case 'warn':
                this.output.warn(output);
                break;
            case 'error':
                this.output.error(output);
                break;
        }
    }
}

/**
 * Discards every entry.
 */
export class NullLogger implements ILogger {
    debug(_message: string, _context?: LogContext): void {}
    info(_message: string, _context?: LogContext): void {}
    warn(_message: string, _context?: LogContext): void {}
    error(_message: string, _error?: Error, _context?: LogContext): void {}
    child(_context: LogContext): ILogger {
        return this;
    }
}
