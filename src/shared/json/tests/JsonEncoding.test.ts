import { describe, it, expect } from 'vitest';
import {
    encodeJsonString,
    encodeJsonValue,
    escapeJsonText,
    isValidJson,
    toUtf8,
} from '../JsonEncoding.js';
import { SerializationError } from '../../errors/ResponseErrors.js';

describe('JsonEncoding', () => {
    describe('isValidJson', () => {
        it('should accept every kind of JSON value', () => {
            expect(isValidJson('{"name": "cale"}')).toBe(true);
            expect(isValidJson('[1,2,3]')).toBe(true);
            expect(isValidJson('"not found"')).toBe(true);
            expect(isValidJson('42')).toBe(true);
            expect(isValidJson('false')).toBe(true);
            expect(isValidJson('null')).toBe(true);
        });

        it('should allow surrounding whitespace', () => {
            expect(isValidJson('  {"a": 1}\n')).toBe(true);
        });

        it('should reject empty and blank input', () => {
            expect(isValidJson('')).toBe(false);
            expect(isValidJson('   ')).toBe(false);
            expect(isValidJson(new Uint8Array(0))).toBe(false);
        });

        it('should reject plain text and truncated documents', () => {
            expect(isValidJson('not found')).toBe(false);
            expect(isValidJson('"not found\'')).toBe(false);
            expect(isValidJson('{"a":')).toBe(false);
            expect(isValidJson('[1,2] [3]')).toBe(false);
        });

        it('should test UTF-8 bytes', () => {
            expect(isValidJson(toUtf8('{"city": "Zürich"}'))).toBe(true);
            expect(isValidJson(toUtf8('Zürich'))).toBe(false);
        });

        it('should reject bytes that are not UTF-8', () => {
            expect(isValidJson(new Uint8Array([0x22, 0xff, 0x22]))).toBe(false);
        });
    });

    describe('encodeJsonString', () => {
        it('should quote plain text', () => {
            expect(encodeJsonString('not found')).toBe('"not found"');
        });

        it('should escape quotes, backslashes and control characters', () => {
            expect(encodeJsonString('"not found\'')).toBe(String.raw`"\"not found'"`);
            expect(encodeJsonString('a\nb\\c\td')).toBe(String.raw`"a\nb\\c\td"`);
        });

        it('should escape HTML characters by default', () => {
            expect(encodeJsonString('<b>&')).toBe(String.raw`"\u003cb\u003e\u0026"`);
        });

        it('should leave HTML characters when escaping is disabled', () => {
            expect(encodeJsonString('<b>&', { escapeHtml: false })).toBe('"<b>&"');
        });

        it('should always escape line and paragraph separators', () => {
            expect(encodeJsonString('a\u2028b\u2029', { escapeHtml: false })).toBe(String.raw`"a\u2028b\u2029"`);
        });

        it('should produce valid JSON for awkward input', () => {
            const samples = ['', '"', '\'', '\\', '\u0000', '}{', 'tab\there'];
            for (const sample of samples) {
                const encoded = encodeJsonString(sample);
                expect(isValidJson(encoded)).toBe(true);
                expect(JSON.parse(encoded)).toBe(sample);
            }
        });
    });

    describe('escapeJsonText', () => {
        it('should escape inside a whole document without changing its meaning', () => {
            const escaped = escapeJsonText('{"<tag>":"a & b"}');
            expect(escaped).toBe(String.raw`{"\u003ctag\u003e":"a \u0026 b"}`);
            expect(JSON.parse(escaped)).toEqual({ '<tag>': 'a & b' });
        });
    });

    describe('encodeJsonValue', () => {
        it('should encode scalars canonically', () => {
            expect(encodeJsonValue(0)).toBe('0');
            expect(encodeJsonValue(1.5)).toBe('1.5');
            expect(encodeJsonValue(true)).toBe('true');
            expect(encodeJsonValue('Eder')).toBe('"Eder"');
        });

        it('should encode null and undefined as null', () => {
            expect(encodeJsonValue(null)).toBe('null');
            expect(encodeJsonValue(undefined)).toBe('null');
        });

        it('should encode records and sequences', () => {
            expect(encodeJsonValue({ name: 'Eder' })).toBe('{"name":"Eder"}');
            expect(encodeJsonValue([1, 'a', null])).toBe('[1,"a",null]');
        });

        it('should honour toJSON', () => {
            const date = new Date('2024-01-02T03:04:05.000Z');
            expect(encodeJsonValue({ at: date })).toBe('{"at":"2024-01-02T03:04:05.000Z"}');
        });

        it('should reject cyclic structures', () => {
            const node: Record<string, unknown> = { id: 1 };
            node.self = node;

            let caught: unknown;
            try {
                encodeJsonValue(node);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(SerializationError);
            expect(caught instanceof SerializationError && caught.cause).toBeInstanceOf(TypeError);
        });

        it('should reject bigints', () => {
            expect(() => encodeJsonValue({ total: 10n })).toThrow(SerializationError);
        });

        it('should reject non-finite numbers anywhere', () => {
            expect(() => encodeJsonValue(NaN)).toThrow('unsupported value: NaN');
            expect(() => encodeJsonValue({ ratio: Infinity })).toThrow('unsupported value: Infinity');
        });

        it('should reject functions and symbols at any depth', () => {
            expect(() => encodeJsonValue(() => 1)).toThrow('unsupported type: function');
            expect(() => encodeJsonValue(Symbol('s'))).toThrow('unsupported type: symbol');
            expect(() => encodeJsonValue({ cb: () => 1, name: 'x' })).toThrow('unsupported type: function');
            expect(() => encodeJsonValue([1, Symbol('s')])).toThrow('unsupported type: symbol');
        });

        it('should encode maps with string keys as objects at any depth', () => {
            expect(encodeJsonValue(new Map([['a', 1]]))).toBe('{"a":1}');
            expect(encodeJsonValue({ scores: new Map([['x', [1, 2]]]) })).toBe('{"scores":{"x":[1,2]}}');
        });

        it('should reject maps with other keys', () => {
            expect(() => encodeJsonValue(new Map([[1, 'a']]))).toThrow('unsupported map key type: number');
        });

        it('should reject sets at any depth', () => {
            expect(() => encodeJsonValue(new Set([1]))).toThrow('unsupported type: Set');
            expect(() => encodeJsonValue({ ids: new Set([1, 2]) })).toThrow(SerializationError);
        });
    });
});
