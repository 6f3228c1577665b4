import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Config } from './config.js';
import { ConfigError } from './errors.js';

const ENV_KEYS = [
  'GMGN_BASE_URL',
  'RUGCHECK_BASE_URL',
  'GMGN_TIMEOUT',
  'GMGN_MAX_RETRIES',
  'GMGN_RETRY_DELAY',
  'GMGN_REQUEST_DELAY',
  'GMGN_VERBOSE'
];

describe('Config', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('defaults', () => {
    it('should use the built-in defaults', () => {
      const config = Config.createDefault();

      expect(config.get('baseUrl')).toBe('https://gmgn.ai/defi/quotation/v1/rank');
      expect(config.get('rugcheckUrl')).toBe('https://api.rugcheck.xyz/v1');
      expect(config.get('timeout')).toBe(60);
      expect(config.get('maxRetries')).toBe(3);
      expect(config.get('retryDelay')).toBe(1);
      expect(config.get('requestDelay')).toBe(1);
      expect(config.get('verbose')).toBe(false);
      expect(config.get('userAgents').length).toBeGreaterThan(0);
    });

    it('should enable verbose output', () => {
      expect(Config.createVerbose().get('verbose')).toBe(true);
    });
  });

  describe('environment', () => {
    it('should read values from the environment', () => {
      vi.stubEnv('GMGN_TIMEOUT', '30');
      vi.stubEnv('GMGN_MAX_RETRIES', '5');
      vi.stubEnv('GMGN_VERBOSE', 'true');
      vi.stubEnv('RUGCHECK_BASE_URL', 'https://rugcheck.test/v1');

      const config = new Config();
      expect(config.get('timeout')).toBe(30);
      expect(config.get('maxRetries')).toBe(5);
      expect(config.get('verbose')).toBe(true);
      expect(config.get('rugcheckUrl')).toBe('https://rugcheck.test/v1');
    });

    it('should let explicit overrides win over the environment', () => {
      vi.stubEnv('GMGN_TIMEOUT', '30');
      expect(new Config({ timeout: 10 }).get('timeout')).toBe(10);
    });

    it('should ignore overrides left undefined', () => {
      vi.stubEnv('GMGN_MAX_RETRIES', '5');
      const config = new Config({ timeout: undefined, maxRetries: undefined, verbose: undefined });

      expect(config.get('timeout')).toBe(60);
      expect(config.get('maxRetries')).toBe(5);
      expect(config.get('verbose')).toBe(false);
    });

    it('should reject non-numeric environment values', () => {
      vi.stubEnv('GMGN_MAX_RETRIES', 'lots');
      expect(() => new Config()).toThrow('GMGN_MAX_RETRIES must be a number, got "lots"');
    });
  });

  describe('validation', () => {
    it('should reject invalid settings', () => {
      expect(() => new Config({ timeout: 0 })).toThrow(ConfigError);
      expect(() => new Config({ maxRetries: 11 })).toThrow('maxRetries must be an integer between 0 and 10');
      expect(() => new Config({ maxRetries: 1.5 })).toThrow(ConfigError);
      expect(() => new Config({ retryDelay: -1 })).toThrow(ConfigError);
      expect(() => new Config({ baseUrl: 'not a url' })).toThrow('baseUrl is not a valid URL: "not a url"');
      expect(() => new Config({ userAgents: [] })).toThrow(ConfigError);
    });

    it('should accept zero retries and zero delays', () => {
      const config = new Config({ maxRetries: 0, retryDelay: 0, requestDelay: 0 });
      expect(config.get('maxRetries')).toBe(0);
    });
  });

  describe('set', () => {
    it('should update a value', () => {
      const config = new Config();
      config.set('maxRetries', 7);
      expect(config.get('maxRetries')).toBe(7);
    });

    it('should keep the previous value when validation fails', () => {
      const config = new Config();
      expect(() => config.set('timeout', -5)).toThrow(ConfigError);
      expect(config.get('timeout')).toBe(60);
    });
  });

  it('should return a copy from getAll', () => {
    const config = new Config();
    const all = config.getAll();
    all.userAgents.push('test-agent');
    all.timeout = 1;

    expect(config.get('timeout')).toBe(60);
    expect(config.get('userAgents')).not.toContain('test-agent');
  });
});
