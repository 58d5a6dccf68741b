import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  AutoScalingClient,
  DescribeAutoScalingGroupsCommand,
} from '@aws-sdk/client-auto-scaling';
import { autoScalingGroups } from '../auto-scaling.js';

const autoScalingMock = mockClient(AutoScalingClient);

describe('autoScalingGroups', () => {
  beforeEach(() => {
    autoScalingMock.reset();
  });

  it('should collect groups from every page', async () => {
    autoScalingMock
      .on(DescribeAutoScalingGroupsCommand)
      .resolvesOnce({
        AutoScalingGroups: [
          {
            AutoScalingGroupName: 'web',
            DesiredCapacity: 3,
            MinSize: 2,
            MaxSize: 6,
            Instances: [
              { InstanceId: 'i-1', LifecycleState: 'InService' },
              { InstanceId: 'i-2', LifecycleState: 'Pending' },
              { InstanceId: 'i-3', LifecycleState: 'InService' },
            ],
          },
        ],
        NextToken: 'page-2',
      })
      .resolvesOnce({
        AutoScalingGroups: [
          { AutoScalingGroupName: 'worker', DesiredCapacity: 1, MinSize: 1, MaxSize: 1 },
        ],
      });

    const groups = await autoScalingGroups('us-east-1');

    expect(groups).toEqual([
      { name: 'web', instancesInService: 2, desiredCapacity: 3, minSize: 2, maxSize: 6 },
      { name: 'worker', instancesInService: 0, desiredCapacity: 1, minSize: 1, maxSize: 1 },
    ]);
    const calls = autoScalingMock.commandCalls(DescribeAutoScalingGroupsCommand);
    expect(calls.map((call) => call.args[0].input.NextToken)).toEqual([undefined, 'page-2']);
  });

  it('should return an empty list when there are no groups', async () => {
    autoScalingMock.on(DescribeAutoScalingGroupsCommand).resolves({});

    await expect(autoScalingGroups('us-east-1')).resolves.toEqual([]);
  });

  it('should use an injected client', async () => {
    const client = new AutoScalingClient({ region: 'ap-southeast-2' });
    autoScalingMock.on(DescribeAutoScalingGroupsCommand).resolves({
      AutoScalingGroups: [{ AutoScalingGroupName: 'batch' }],
    });

    const groups = await autoScalingGroups('ap-southeast-2', { client });

    expect(groups).toEqual([
      { name: 'batch', instancesInService: 0, desiredCapacity: 0, minSize: 0, maxSize: 0 },
    ]);
    expect(autoScalingMock.call(0).thisValue).toBe(client);
  });

  it('should propagate SDK errors', async () => {
    autoScalingMock.on(DescribeAutoScalingGroupsCommand).rejects(new Error('AccessDenied'));

    await expect(autoScalingGroups('us-east-1')).rejects.toThrow('AccessDenied');
  });
});
