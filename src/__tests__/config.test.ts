import { describe, expect, it } from 'vitest';
import { loadConfig } from '../lib/config';
import { ValidationError } from '../lib/errors';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            queueCapacity: 500,
            tokenIdStart: 1000,
            logLevel: 'info'
        });
    });

    it('reads and coerces environment values', () => {
        const config = loadConfig({ PORT: '8080', QUEUE_CAPACITY: '25', TOKEN_ID_START: '1', LOG_LEVEL: 'debug' });
        expect(config).toEqual({ port: 8080, queueCapacity: 25, tokenIdStart: 1, logLevel: 'debug' });
    });

    it('treats empty strings as unset', () => {
        expect(loadConfig({ QUEUE_CAPACITY: '' }).queueCapacity).toBe(500);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ QUEUE_CAPACITY: '0' })).toThrow(ValidationError);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ValidationError);
        expect(() => loadConfig({ PORT: 'abc' })).toThrow(ValidationError);
    });
});
