import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './utils/errors.js';

describe('loadConfig', () => {
    it('applies defaults when only the API key is set', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

        expect(config).toEqual({
            openaiApiKey: 'test-key',
            openaiBaseUrl: undefined,
            chatModel: 'gpt-4o-mini',
            embeddingModel: 'text-embedding-3-small',
            embeddingBatchSize: 32,
            vectorDbPath: ':cache:',
            maxResults: 5,
            maxHistory: 2,
            maxTokens: 800,
            logFile: undefined,
            logLevel: 'info',
            development: false,
        });
    });

    it('coerces numeric variables', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-key',
            MAX_RESULTS: '3',
            MAX_HISTORY: '4',
            NODE_ENV: 'development',
        });

        expect(config.maxResults).toBe(3);
        expect(config.maxHistory).toBe(4);
        expect(config.development).toBe(true);
    });

    it('treats a blank base URL as unset', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_BASE_URL: '' });
        expect(config.openaiBaseUrl).toBeUndefined();
    });

    it('rejects a missing API key', () => {
        expect(() => loadConfig({})).toThrow(ConfigError);
        expect(() => loadConfig({})).toThrow(/OPENAI_API_KEY/);
    });

    it('rejects a history bound of zero', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', MAX_HISTORY: '0' })).toThrow(/MAX_HISTORY/);
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
