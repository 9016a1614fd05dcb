/**
 * ResponderConfig - Settings for JsonResponder.
 */

import { LogLevel, LOG_LEVELS } from '../infrastructure/observability/Logger.js';

export interface ResponderConfig {
    /** Escape <, > and & in encoded output */
    escapeHtml: boolean;

    /** Minimum level for the default console logger */
    logLevel: LogLevel;

    /** Log every written response at debug level */
    logResponses: boolean;
}

export const DEFAULT_RESPONDER_CONFIG: ResponderConfig = {
    escapeHtml: true,
    logLevel: 'info',
    logResponses: false,
};

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
        return true;
    }
    if (normalized === 'false' || normalized === '0' || normalized === 'no') {
        return false;
    }
    return fallback;
}

/**
 * Build a configuration from environment variables.
 *
 * Environment variables:
 * - JSON_RESPONDER_ESCAPE_HTML: 'false' | '0' disables HTML escaping (default: enabled)
 * - JSON_RESPONDER_LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
 * - JSON_RESPONDER_LOG_RESPONSES: 'true' | '1' logs each response (default: disabled)
 */
export function loadResponderConfig(env: NodeJS.ProcessEnv = process.env): ResponderConfig {
    const level = env.JSON_RESPONDER_LOG_LEVEL?.trim().toLowerCase();

    return {
        escapeHtml: parseFlag(env.JSON_RESPONDER_ESCAPE_HTML, DEFAULT_RESPONDER_CONFIG.escapeHtml),
        logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_RESPONDER_CONFIG.logLevel,
        logResponses: parseFlag(env.JSON_RESPONDER_LOG_RESPONSES, DEFAULT_RESPONDER_CONFIG.logResponses),
    };
}
