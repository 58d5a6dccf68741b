/**
 * Chaos event model and the JSON shapes exchanged with the Chaos Monkey API.
 */

import { z } from 'zod';
import type { Strategy } from './strategies.js';

// ============================================================================
// Wire Types
// ============================================================================

/**
 * Body of a chaos trigger request.
 */
export interface ChaosRequest {
  /** Strategy name, omitted to let the server pick its default */
  chaosType?: string;

  /** Always `CHAOS_TERMINATION` */
  eventType: string;

  /** Auto scaling group to break */
  groupName: string;

  /** Always `ASG` */
  groupType: string;

  /** AWS region. Ignored by vanilla Chaos Monkey, honoured by some forks. */
  region?: string;
}

// Absent and null both decode to the zero value.
const wireString = z.string().nullish().transform((value) => value ?? '');
const wireInt = z.number().int().nullish().transform((value) => value ?? 0);

/**
 * Schema for a single API response object.
 *
 * Missing or null fields decode to empty values and unknown fields are
 * dropped, but a field of the wrong type rejects the whole object.
 */
export const chaosResponseSchema = z.object({
  chaosType: wireString,
  eventId: wireString,
  eventTime: wireInt,
  eventType: wireString,
  groupName: wireString,
  groupType: wireString,
  monkeyType: wireString,
  region: wireString,
  message: wireString,
});

/** A decoded API response. `eventTime` is milliseconds since the Unix epoch. */
export type ChaosResponse = z.infer<typeof chaosResponseSchema>;

/** Event history arrives as an array; `null` means no events. */
export const chaosResponseListSchema = z
  .array(chaosResponseSchema)
  .nullable()
  .transform((responses) => responses ?? []);

// ============================================================================
// Domain Types
// ============================================================================

/**
 * The termination of an EC2 instance by Chaos Monkey.
 */
export interface Event {
  /** ID of the EC2 instance that was terminated */
  readonly instanceId: string;

  /** Name of the auto scaling group containing the instance */
  readonly autoScalingGroupName: string;

  /** AWS region of the instance, empty when the server does not report it */
  readonly region: string;

  /** Strategy used to break the instance */
  readonly strategy: Strategy;

  /** When the event was triggered, truncated to whole seconds */
  readonly triggeredAt: Date;
}

/**
 * Converts an API response into an {@link Event}.
 */
export function toEvent(response: ChaosResponse): Event {
  return Object.freeze({
    instanceId: response.eventId,
    autoScalingGroupName: response.groupName,
    region: response.region,
    strategy: response.chaosType,
    triggeredAt: new Date(Math.floor(response.eventTime / 1000) * 1000),
  });
}
