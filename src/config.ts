/**
 * Client configuration and its resolution against the environment.
 */

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Transport used to talk to the API. Compatible with the global `fetch`.
 *
 * Timeouts and cancellation belong here: wrap `fetch` and pass an
 * `AbortSignal` if calls need a deadline.
 */
export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration options for the Chaos Monkey client.
 *
 * All fields are optional. Unset fields fall back to environment variables:
 * - `CHAOSMONKEY_ENDPOINT` - Address of the API server
 * - `CHAOSMONKEY_USERNAME` - Username for HTTP Basic Authentication
 * - `CHAOSMONKEY_PASSWORD` - Password for HTTP Basic Authentication
 */
export interface ChaosMonkeyConfig {
  /**
   * Address and port of the Chaos Monkey API server. `http://` is added when
   * no scheme is given.
   * @default "http://127.0.0.1:8080"
   * @example "chaosmonkey.internal:8080"
   */
  endpoint?: string;

  /**
   * AWS region sent with trigger requests (ignored by vanilla Chaos Monkey).
   */
  region?: string;

  /**
   * Username for HTTP Basic Authentication. Only used together with `password`.
   */
  username?: string;

  /**
   * Password for HTTP Basic Authentication. Only used together with `username`.
   */
  password?: string;

  /**
   * Value of the `User-Agent` header.
   * @default "chaosmonkey Node.js library"
   */
  userAgent?: string;

  /**
   * Custom transport.
   * @default globalThis.fetch
   */
  fetch?: FetchFunction;

  /**
   * pino logger for request tracing at debug level.
   * @default a silent logger
   */
  logger?: Logger;
}

/**
 * A fully populated configuration. Produced by {@link resolveConfig}.
 */
export interface ResolvedConfig {
  readonly endpoint: string;
  readonly region: string;
  readonly username: string;
  readonly password: string;
  readonly userAgent: string;
  readonly fetch: FetchFunction;
  readonly logger: Logger;
}

/** Environment variable source, usually `process.env`. */
export type Environment = Record<string, string | undefined>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ENDPOINT = 'http://127.0.0.1:8080';
export const DEFAULT_USER_AGENT = 'chaosmonkey Node.js library';

export const ENV_ENDPOINT = 'CHAOSMONKEY_ENDPOINT';
export const ENV_USERNAME = 'CHAOSMONKEY_USERNAME';
export const ENV_PASSWORD = 'CHAOSMONKEY_PASSWORD';

// Looked up per call so tests can stub the global.
const globalFetch: FetchFunction = (url, init) => fetch(url, init);

/**
 * Returns the default configuration, with built-in values overridden by the
 * `CHAOSMONKEY_*` environment variables that are set and non-empty.
 */
export function defaultConfig(env: Environment = process.env): ResolvedConfig {
  return Object.freeze({
    endpoint: env[ENV_ENDPOINT] || DEFAULT_ENDPOINT,
    region: '',
    username: env[ENV_USERNAME] || '',
    password: env[ENV_PASSWORD] || '',
    userAgent: DEFAULT_USER_AGENT,
    fetch: globalFetch,
    logger: silentLogger,
  });
}

/**
 * Adds `http://` to endpoints given without a scheme and drops trailing slashes.
 *
 * @example
 * normalizeEndpoint('foo.example.com:9090') // "http://foo.example.com:9090"
 */
export function normalizeEndpoint(endpoint: string): string {
  const withScheme = /^https?:\/\//i.test(endpoint) ? endpoint : `http://${endpoint}`;
  return withScheme.replace(/\/+$/, '');
}

/**
 * Fills every unset field of `config` from the environment, then from the
 * built-in defaults. The input is left untouched.
 */
export function resolveConfig(
  config: ChaosMonkeyConfig = {},
  env: Environment = process.env,
): ResolvedConfig {
  const defaults = defaultConfig(env);

  return Object.freeze({
    endpoint: normalizeEndpoint(config.endpoint || defaults.endpoint),
    region: config.region || defaults.region,
    username: config.username || defaults.username,
    password: config.password || defaults.password,
    userAgent: config.userAgent || defaults.userAgent,
    fetch: config.fetch ?? defaults.fetch,
    logger: config.logger ?? defaults.logger,
  });
}
