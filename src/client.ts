/**
 * Chaos Monkey client - trigger chaos events and read their history.
 *
 * Chaos events make Chaos Monkey "break" an EC2 instance in an auto scaling
 * group, to simulate different kinds of failure. To trigger events, the server
 * must be unleashed with on-demand termination enabled:
 *
 * ```
 * simianarmy.chaos.leashed = false
 * simianarmy.chaos.terminateOndemand.enabled = true
 * ```
 */

import type { z } from 'zod';
import type { ChaosMonkeyConfig, ResolvedConfig } from './config.js';
import { resolveConfig } from './config.js';
import { ChaosMonkeyError } from './errors.js';
import type { ChaosRequest, Event } from './event.js';
import { chaosResponseListSchema, chaosResponseSchema, toEvent } from './event.js';
import type { Strategy } from './strategies.js';

/** Path of the chaos resource on the API server. */
export const API_PATH = '/simianarmy/api/v1/chaos';

/** `eventType` of every trigger request. */
export const CHAOS_TERMINATION = 'CHAOS_TERMINATION';

/** `groupType` of every trigger request: an auto scaling group. */
export const GROUP_TYPE_ASG = 'ASG';

type HttpMethod = 'GET' | 'POST';

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Client
// ============================================================================

/**
 * Client for the Chaos Monkey REST API.
 *
 * The client is immutable; every call is a single independent request with no
 * retries, so one instance can be shared freely.
 *
 * @example
 * ```typescript
 * import { ChaosMonkey, Strategy } from 'chaosmonkey-client';
 *
 * const chaosmonkey = new ChaosMonkey({ endpoint: 'http://example.com:8080' });
 *
 * const event = await chaosmonkey.triggerEvent('ExampleAutoScalingGroup', Strategy.ShutdownInstance);
 * console.log(`Terminated ${event.instanceId}`);
 *
 * const history = await chaosmonkey.events();
 * ```
 */
export class ChaosMonkey {
  /** The resolved configuration this client was created with. */
  readonly config: ResolvedConfig;

  /**
   * Creates a new client.
   *
   * @param config - Configuration options (all optional, reads from env vars)
   */
  constructor(config: ChaosMonkeyConfig = {}) {
    this.config = resolveConfig(config);
  }

  /**
   * Triggers a new chaos event, breaking an instance of the given auto scaling
   * group with the given strategy.
   *
   * @param groupName - Name of the auto scaling group
   * @param strategy - Chaos strategy, sent to the server as is
   * @returns The event reported by the server
   * @throws {ChaosMonkeyError} If the request fails
   */
  async triggerEvent(groupName: string, strategy: Strategy): Promise<Event> {
    const body: ChaosRequest = {
      eventType: CHAOS_TERMINATION,
      groupName,
      groupType: GROUP_TYPE_ASG,
    };
    if (strategy) {
      body.chaosType = strategy;
    }
    if (this.config.region) {
      body.region = this.config.region;
    }

    const response = await this.request('POST', API_PATH, chaosResponseSchema, body);
    return toEvent(response);
  }

  /**
   * Lists all chaos events.
   *
   * @throws {ChaosMonkeyError} If the request fails
   */
  async events(): Promise<Event[]> {
    return this.eventsSince(new Date(0));
  }

  /**
   * Lists chaos events triggered since the given time, in the order the
   * server returns them.
   *
   * `since` is sent with full millisecond precision. Event times themselves
   * are only reported to the second (see {@link Event.triggeredAt}).
   *
   * @throws {RangeError} If `since` is an invalid date
   * @throws {ChaosMonkeyError} If the request fails
   */
  async eventsSince(since: Date): Promise<Event[]> {
    const millis = since.getTime();
    if (Number.isNaN(millis)) {
      throw new RangeError('eventsSince requires a valid date');
    }

    const responses = await this.request(
      'GET',
      `${API_PATH}?since=${millis}`,
      chaosResponseListSchema,
    );
    return responses.map(toEvent);
  }

  /**
   * Performs one HTTP exchange and decodes the body with `schema`.
   * The body is always read to the end, so the connection is released.
   * @internal
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: ResponseSchema<T>,
    body?: ChaosRequest,
  ): Promise<T> {
    const url = `${this.config.endpoint}${path}`;
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
    };
    if (this.config.username && this.config.password) {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password}`);
      headers.Authorization = `Basic ${credentials.toString('base64')}`;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.config.logger.debug({ method, url }, 'chaosmonkey request');

    let res: Response;
    let text: string;
    try {
      res = await this.config.fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      text = await res.text();
    } catch (error) {
      throw new ChaosMonkeyError(
        error instanceof Error ? error.message : 'Network request failed',
        0,
        'NETWORK_ERROR',
        { cause: error },
      );
    }

    this.config.logger.debug({ method, url, status: res.status }, 'chaosmonkey response');

    if (res.status !== 200) {
      throw decodeError(res, text);
    }

    const parsed = parseJson(text);
    if (!parsed.ok) {
      throw new ChaosMonkeyError(
        `Malformed response: ${parsed.error}`,
        res.status,
        'MALFORMED_RESPONSE',
      );
    }

    const result = schema.safeParse(parsed.value);
    if (!result.success) {
      throw new ChaosMonkeyError(
        `Malformed response: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
        res.status,
        'MALFORMED_RESPONSE',
        { cause: result.error },
      );
    }

    return result.data;
  }
}

// ============================================================================
// Helpers
// ============================================================================

type JsonResult = { ok: true; value: unknown } | { ok: false; error: string };

function parseJson(text: string): JsonResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Builds the error for a non-200 response: the server's message when the body
 * carries one, the HTTP status line otherwise.
 */
function decodeError(res: Response, text: string): ChaosMonkeyError {
  const parsed = parseJson(text);
  if (parsed.ok) {
    const result = chaosResponseSchema.safeParse(parsed.value);
    if (result.success && result.data.message) {
      return new ChaosMonkeyError(result.data.message, res.status, 'REMOTE_ERROR');
    }
  }

  const statusLine = `${res.status} ${res.statusText}`.trim();
  return new ChaosMonkeyError(`HTTP error: ${statusLine}`, res.status, 'HTTP_ERROR');
}
