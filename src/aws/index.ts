/**
 * AWS helpers
 *
 * Thin wrappers over the AWS SDK for the resources chaos experiments touch.
 * Credentials come from the standard AWS SDK provider chain (environment
 * variables, shared config, instance roles).
 */

export { autoScalingGroups } from './auto-scaling.js';
export { deleteSimpleDBDomain } from './simpledb.js';
export { paginate } from './paginate.js';
export { DomainNotFoundError, AWS_REQUEST_TIMEOUT_MS } from './types.js';

export type { PageFetcher } from './paginate.js';
export type { SimpleDBDomainClient } from './simpledb.js';
export type { AutoScalingGroup, AwsOptions } from './types.js';
