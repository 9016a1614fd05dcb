import { describe, it, expect } from 'vitest';
import { DEFAULT_RESPONDER_CONFIG, loadResponderConfig } from '../ResponderConfig.js';

describe('ResponderConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
        expect(loadResponderConfig({})).toEqual(DEFAULT_RESPONDER_CONFIG);
        expect(DEFAULT_RESPONDER_CONFIG).toEqual({
            escapeHtml: true,
            logLevel: 'info',
            logResponses: false,
        });
    });

    it('should read every setting', () => {
        const config = loadResponderConfig({
            JSON_RESPONDER_ESCAPE_HTML: '0',
            JSON_RESPONDER_LOG_LEVEL: 'debug',
            JSON_RESPONDER_LOG_RESPONSES: 'true',
        });

        expect(config).toEqual({
            escapeHtml: false,
            logLevel: 'debug',
            logResponses: true,
        });
    });

    it('should normalize case and whitespace', () => {
        const config = loadResponderConfig({
            JSON_RESPONDER_ESCAPE_HTML: ' FALSE ',
            JSON_RESPONDER_LOG_LEVEL: ' WARN',
        });

        expect(config.escapeHtml).toBe(false);
        expect(config.logLevel).toBe('warn');
    });

    it('should ignore values it does not understand', () => {
        const config = loadResponderConfig({
            JSON_RESPONDER_ESCAPE_HTML: 'sometimes',
            JSON_RESPONDER_LOG_LEVEL: 'verbose',
            JSON_RESPONDER_LOG_RESPONSES: '',
        });

        expect(config).toEqual(DEFAULT_RESPONDER_CONFIG);
    });
});
