import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError, nullLogger } from '@tap-nomad/shared';
import { loadConfig, parseConfigText, toClientConfig } from '../src/config.js';

describe('config', () => {
  beforeEach(() => {
    for (const name of ['NOMAD_ADDR', 'NOMAD_TOKEN', 'NOMAD_NAMESPACE', 'NOMAD_REGION']) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      expect(loadConfig({})).toEqual({
        address: 'http://127.0.0.1:4646',
        namespace: '*',
        pageSize: 100,
        startIndex: 0,
        maxRetries: 5,
        retryBaseDelayMs: 1000,
        retryMaxDelayMs: 20000,
        requestTimeoutMs: 30000,
      });
    });

    it('should fall back to the environment', () => {
      vi.stubEnv('NOMAD_ADDR', 'http://nomad.internal:4646');
      vi.stubEnv('NOMAD_TOKEN', 'test-secret');
      vi.stubEnv('NOMAD_NAMESPACE', 'platform');
      vi.stubEnv('NOMAD_REGION', 'eu');

      expect(loadConfig({})).toMatchObject({
        address: 'http://nomad.internal:4646',
        token: 'test-secret',
        namespace: 'platform',
        region: 'eu',
      });
    });

    it('should prefer values from the document', () => {
      vi.stubEnv('NOMAD_ADDR', 'http://nomad.internal:4646');

      const config = loadConfig({ address: 'http://other.test:4646', page_size: 250, streams: ['jobs'] });

      expect(config.address).toBe('http://other.test:4646');
      expect(config.pageSize).toBe(250);
      expect(config.streams).toEqual(['jobs']);
    });

    it('should reject an out-of-range page size', () => {
      expect(() => loadConfig({ page_size: 5000 })).toThrow(
        new ConfigError('Config is invalid at page_size: Number must be less than or equal to 1000'),
      );
    });

    it('should reject a wrongly typed value', () => {
      expect(() => loadConfig({ start_index: '10' })).toThrow(ConfigError);
    });

    it('should reject an invalid address from the environment', () => {
      vi.stubEnv('NOMAD_ADDR', 'not a url');

      expect(() => loadConfig({})).toThrow(new ConfigError('Invalid Nomad address: not a url'));
    });

    it('should reject a document that is not an object', () => {
      expect(() => loadConfig([])).toThrow(new ConfigError('Config must be a JSON object'));
    });
  });

  describe('parseConfigText', () => {
    it('should parse JSON text', () => {
      expect(parseConfigText('{"start_index": 42}').startIndex).toBe(42);
    });

    it('should reject invalid JSON', () => {
      expect(() => parseConfigText('{')).toThrow(/^Config is not valid JSON: /);
    });
  });

  describe('toClientConfig', () => {
    it('should map settings onto the Nomad client', () => {
      const config = loadConfig({ token: 'test-secret', max_retries: 2, retry_base_delay_ms: 10 });

      expect(toClientConfig(config, nullLogger)).toEqual({
        baseUrl: 'http://127.0.0.1:4646',
        namespace: '*',
        token: 'test-secret',
        pageSize: 100,
        requestTimeoutMs: 30000,
        retry: { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 20000 },
        logger: nullLogger,
      });
    });
  });
});
