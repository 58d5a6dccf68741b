import {
  AutoScalingClient,
  DescribeAutoScalingGroupsCommand,
  LifecycleState,
} from '@aws-sdk/client-auto-scaling';
import type { AutoScalingGroup as AwsAutoScalingGroup } from '@aws-sdk/client-auto-scaling';
import { silentLogger } from '../logger.js';
import { paginate } from './paginate.js';
import { AWS_REQUEST_TIMEOUT_MS } from './types.js';
import type { AutoScalingGroup, AwsOptions } from './types.js';

/**
 * Lists every auto scaling group in a region.
 *
 * @param region - AWS region, e.g. `us-east-1`
 * @param options - Optional client and logger
 *
 * @example
 * ```typescript
 * const groups = await autoScalingGroups('eu-west-1');
 * for (const group of groups) {
 *   console.log(`${group.name}: ${group.instancesInService}/${group.desiredCapacity}`);
 * }
 * ```
 */
export async function autoScalingGroups(
  region: string,
  options: AwsOptions<AutoScalingClient> = {},
): Promise<AutoScalingGroup[]> {
  const client = options.client ?? new AutoScalingClient({
    region,
    requestHandler: { requestTimeout: AWS_REQUEST_TIMEOUT_MS },
  });
  const logger = options.logger ?? silentLogger;

  const pages = paginate(
    (NextToken) => client.send(new DescribeAutoScalingGroupsCommand({ NextToken })),
    (page) => page.NextToken,
  );

  const groups: AutoScalingGroup[] = [];
  for await (const page of pages) {
    const batch = page.AutoScalingGroups ?? [];
    logger.debug({ region, count: batch.length }, 'auto scaling groups page');
    groups.push(...batch.map(toAutoScalingGroup));
  }
  return groups;
}

function toAutoScalingGroup(group: AwsAutoScalingGroup): AutoScalingGroup {
  const inService = (group.Instances ?? []).filter(
    (instance) => instance.LifecycleState === LifecycleState.IN_SERVICE,
  );

  return {
    name: group.AutoScalingGroupName ?? '',
    instancesInService: inService.length,
    desiredCapacity: group.DesiredCapacity ?? 0,
    minSize: group.MinSize ?? 0,
    maxSize: group.MaxSize ?? 0,
  };
}
