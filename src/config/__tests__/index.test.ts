import { describe, it, expect } from 'vitest';
import { config, loadConfig, parseDecimal, parseNumber } from '../index';

describe('Config', () => {
  it('should have valid server configuration', () => {
    expect(config.server.port).toBeGreaterThan(0);
    expect(typeof config.server.nodeEnv).toBe('string');
  });

  it('should have valid AI configuration', () => {
    expect(config.ai.timeout).toBeGreaterThan(0);
    expect(typeof config.ai.gemini.apiKey).toBe('string');
    expect(config.ai.gemini.model.length).toBeGreaterThan(0);
    expect(config.ai.gemini.baseUrl).toMatch(/^https?:\/\//);
    expect(config.ai.generation.maxOutputTokens).toBeGreaterThan(0);
  });

  it('should have valid throttle and cache configuration', () => {
    expect(config.throttle.minIntervalMs).toBeGreaterThanOrEqual(0);
    expect(config.cache.ttlMs).toBeGreaterThan(0);
    expect(config.cache.maxEntries).toBeGreaterThan(0);
  });

  it('should point persona files at markdown files', () => {
    expect(config.persona.generalFile).toMatch(/\.md$/);
    expect(config.persona.roundStartFile).toMatch(/\.md$/);
  });

  it('should read the log level set for tests', () => {
    expect(config.logging.logLevel).toBe('ERROR');
  });
});

describe('loadConfig', () => {
  it('should default to production without error detail when NODE_ENV is unset', () => {
    const loaded = loadConfig({});

    expect(loaded.server.nodeEnv).toBe('production');
    expect(loaded.server.exposeErrorDetail).toBe(false);
  });

  it('should expose error detail only in development', () => {
    expect(loadConfig({ NODE_ENV: 'development' }).server.exposeErrorDetail).toBe(true);
    expect(loadConfig({ NODE_ENV: 'test' }).server.exposeErrorDetail).toBe(false);
    expect(loadConfig({ NODE_ENV: 'staging' }).server.exposeErrorDetail).toBe(false);
  });

  it('should read values from the given environment', () => {
    const loaded = loadConfig({ PORT: '8080', THROTTLE_INTERVAL_MS: 'later', GEMINI_MODEL: 'gemini-test' });

    expect(loaded.server.port).toBe(8080);
    expect(loaded.throttle.minIntervalMs).toBe(1000);
    expect(loaded.ai.gemini.model).toBe('gemini-test');
  });
});

describe('parseNumber', () => {
  it('should parse integers', () => {
    expect(parseNumber('1000', 5)).toBe(1000);
  });

  it('should fall back on invalid input', () => {
    expect(parseNumber('soon', 5)).toBe(5);
    expect(parseNumber('', 5)).toBe(5);
  });
});

describe('parseDecimal', () => {
  it('should parse decimals', () => {
    expect(parseDecimal('0.25', 0.35)).toBe(0.25);
  });

  it('should fall back on invalid input', () => {
    expect(parseDecimal('warm', 0.35)).toBe(0.35);
  });
});
