/**
 * Shared types for the AWS helpers.
 */

import type { Logger } from '../logger.js';

/**
 * Request timeout applied to the AWS clients these helpers create.
 */
export const AWS_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Options accepted by every AWS helper.
 */
export interface AwsOptions<TClient> {
  /**
   * Client to use instead of a fresh one for the requested region.
   */
  client?: TClient;

  /**
   * pino logger for debug tracing.
   * @default a silent logger
   */
  logger?: Logger;
}

/**
 * An AWS auto scaling group.
 */
export interface AutoScalingGroup {
  name: string;

  /** Instances whose lifecycle state is `InService` */
  instancesInService: number;

  desiredCapacity: number;
  minSize: number;
  maxSize: number;
}

/**
 * Thrown when asked to delete a SimpleDB domain that does not exist.
 */
export class DomainNotFoundError extends Error {
  constructor(public readonly domainName: string) {
    super(`SimpleDB domain "${domainName}" does not exist`);
    this.name = 'DomainNotFoundError';
    Object.setPrototypeOf(this, DomainNotFoundError.prototype);
  }
}
