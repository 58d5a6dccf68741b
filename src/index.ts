/**
 * chaosmonkey-client - Chaos Monkey REST API client for Node.js
 *
 * Trigger chaos events against auto scaling groups and audit the events
 * Chaos Monkey has already run.
 *
 * @example
 * ```typescript
 * import { ChaosMonkey, Strategy } from 'chaosmonkey-client';
 *
 * // Reads CHAOSMONKEY_ENDPOINT, CHAOSMONKEY_USERNAME and CHAOSMONKEY_PASSWORD
 * const chaosmonkey = new ChaosMonkey();
 *
 * const event = await chaosmonkey.triggerEvent('ExampleAutoScalingGroup', Strategy.BurnCpu);
 * const lastHour = await chaosmonkey.eventsSince(new Date(Date.now() - 3_600_000));
 * ```
 *
 * AWS helpers live in `chaosmonkey-client/aws`.
 *
 * @packageDocumentation
 */

export { ChaosMonkey, API_PATH, CHAOS_TERMINATION, GROUP_TYPE_ASG } from './client.js';

export {
  resolveConfig,
  defaultConfig,
  normalizeEndpoint,
  DEFAULT_ENDPOINT,
  DEFAULT_USER_AGENT,
  ENV_ENDPOINT,
  ENV_USERNAME,
  ENV_PASSWORD,
} from './config.js';

export type {
  ChaosMonkeyConfig,
  ResolvedConfig,
  FetchFunction,
  Environment,
} from './config.js';

export { toEvent, chaosResponseSchema, chaosResponseListSchema } from './event.js';

export type { Event, ChaosRequest, ChaosResponse } from './event.js';

export { ChaosMonkeyError } from './errors.js';

export type { ChaosMonkeyErrorCode } from './errors.js';

export { Strategy } from './strategies.js';

export type { Logger } from './logger.js';
