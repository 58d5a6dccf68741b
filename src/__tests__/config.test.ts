import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  DEFAULT_ENDPOINT,
  DEFAULT_USER_AGENT,
  defaultConfig,
  normalizeEndpoint,
  resolveConfig,
} from '../config.js';
import type { ChaosMonkeyConfig, FetchFunction } from '../config.js';

describe('defaultConfig', () => {
  it('should use built-in defaults with an empty environment', () => {
    const config = defaultConfig({});

    expect(config.endpoint).toBe(DEFAULT_ENDPOINT);
    expect(config.username).toBe('');
    expect(config.password).toBe('');
    expect(config.region).toBe('');
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
  });

  it('should read CHAOSMONKEY_* variables', () => {
    const config = defaultConfig({
      CHAOSMONKEY_ENDPOINT: 'chaos.example.com',
      CHAOSMONKEY_USERNAME: 'operator',
      CHAOSMONKEY_PASSWORD: 'test-secret',
    });

    expect(config.endpoint).toBe('chaos.example.com');
    expect(config.username).toBe('operator');
    expect(config.password).toBe('test-secret');
  });

  it('should ignore empty variables', () => {
    const config = defaultConfig({ CHAOSMONKEY_ENDPOINT: '' });

    expect(config.endpoint).toBe(DEFAULT_ENDPOINT);
  });
});

describe('normalizeEndpoint', () => {
  it('should prefix http:// when no scheme is given', () => {
    expect(normalizeEndpoint('foo.example.com:9090')).toBe('http://foo.example.com:9090');
  });

  it('should keep an existing https:// scheme', () => {
    expect(normalizeEndpoint('https://foo.example.com')).toBe('https://foo.example.com');
  });

  it('should keep an upper-case scheme', () => {
    expect(normalizeEndpoint('HTTP://foo.example.com')).toBe('HTTP://foo.example.com');
  });

  it('should strip trailing slashes', () => {
    expect(normalizeEndpoint('http://foo.example.com:8080//')).toBe('http://foo.example.com:8080');
  });
});

describe('resolveConfig', () => {
  it('should auto-prefix the scheme of an endpoint from the environment', () => {
    const config = resolveConfig({}, { CHAOSMONKEY_ENDPOINT: 'foo.example.com:9090' });

    expect(config.endpoint).toBe('http://foo.example.com:9090');
  });

  it('should leave a caller-supplied https endpoint unmodified', () => {
    const config = resolveConfig(
      { endpoint: 'https://chaos.example.com' },
      { CHAOSMONKEY_ENDPOINT: 'foo.example.com:9090' },
    );

    expect(config.endpoint).toBe('https://chaos.example.com');
  });

  it('should default to the local endpoint', () => {
    expect(resolveConfig({}, {}).endpoint).toBe('http://127.0.0.1:8080');
  });

  it('should prefer caller values over the environment', () => {
    const config = resolveConfig(
      { username: 'alice', password: 'test-password' },
      { CHAOSMONKEY_USERNAME: 'bob', CHAOSMONKEY_PASSWORD: 'test-secret' },
    );

    expect(config.username).toBe('alice');
    expect(config.password).toBe('test-password');
  });

  it('should treat empty caller values as unset', () => {
    const config = resolveConfig(
      { username: '', userAgent: '' },
      { CHAOSMONKEY_USERNAME: 'bob' },
    );

    expect(config.username).toBe('bob');
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
  });

  it('should keep the custom transport, logger and region', () => {
    const customFetch: FetchFunction = async () => new Response('[]');
    const logger = pino({ level: 'silent' });

    const config = resolveConfig({ fetch: customFetch, logger, region: 'eu-west-1' }, {});

    expect(config.fetch).toBe(customFetch);
    expect(config.logger).toBe(logger);
    expect(config.region).toBe('eu-west-1');
  });

  it('should not mutate the caller config', () => {
    const input: ChaosMonkeyConfig = { endpoint: 'foo.example.com' };

    resolveConfig(input, {});

    expect(input).toEqual({ endpoint: 'foo.example.com' });
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(resolveConfig({}, {}))).toBe(true);
  });

  it('should read the environment on every call', () => {
    const env: Record<string, string | undefined> = { CHAOSMONKEY_ENDPOINT: 'first.example.com' };
    expect(resolveConfig({}, env).endpoint).toBe('http://first.example.com');

    env.CHAOSMONKEY_ENDPOINT = 'second.example.com';
    expect(resolveConfig({}, env).endpoint).toBe('http://second.example.com');
  });
});
