import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { DEFAULT_TRUSTED_DOMAINS, loadConfig } from './index';

const BASE_ENV = { GROQ_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' };

describe('loadConfig', () => {
    it('fills in defaults', () => {
        const config = loadConfig(BASE_ENV);

        expect(config.port).toBe(8080);
        expect(config.defaultModel).toBe('openai_mini');
        expect(config.tavilyApiKey).toBeNull();
        expect(config.session.backend).toBe('file');
        expect(config.routing).toEqual({ floor: 0.4, shiftThreshold: 0.75 });
        expect(config.collaboration).toEqual({ threshold: 0.6, timeoutMs: 45000 });
        expect(config.retrieval.trustedDomains).toEqual(DEFAULT_TRUSTED_DOMAINS);
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            ...BASE_ENV,
            PORT: '9090',
            TAVILY_API_KEY: 'test-secret',
            SESSION_BACKEND: 'redis',
            COLLABORATION_THRESHOLD: '0.7',
            TRUSTED_DOMAINS: ' NIST.gov, cisa.gov ,',
        });

        expect(config.port).toBe(9090);
        expect(config.tavilyApiKey).toBe('test-secret');
        expect(config.session.backend).toBe('redis');
        expect(config.collaboration.threshold).toBe(0.7);
        expect(config.retrieval.trustedDomains).toEqual(['nist.gov', 'cisa.gov']);
    });

    it('requires the model credentials', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret' })).toThrow(ConfigurationError);
    });

    it('rejects malformed values', () => {
        expect(() => loadConfig({ ...BASE_ENV, PORT: 'eighty' })).toThrow('PORT must be a number');
        expect(() => loadConfig({ ...BASE_ENV, ROUTING_FLOOR: '1.5' })).toThrow('between 0 and 1');
        expect(() => loadConfig({ ...BASE_ENV, DEFAULT_MODEL: 'gpt-2' })).toThrow("unknown model 'gpt-2'");
        expect(() => loadConfig({ ...BASE_ENV, SESSION_BACKEND: 'sqlite' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ ...BASE_ENV, CONFIDENCE_RETRIEVAL_WEIGHT: '0', CONFIDENCE_SELF_WEIGHT: '0' })).toThrow(ConfigurationError);
    });
});
