/**
 * chaosmonkey-client - AWS helpers
 *
 * @example
 * ```typescript
 * import { autoScalingGroups, deleteSimpleDBDomain } from 'chaosmonkey-client/aws';
 *
 * const groups = await autoScalingGroups('us-east-1');
 *
 * // Reset Chaos Monkey's event store
 * await deleteSimpleDBDomain('SIMIAN_ARMY', 'us-east-1');
 * ```
 *
 * @packageDocumentation
 */

export * from './aws/index.js';
