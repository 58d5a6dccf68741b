/**
 * Chaos strategies understood by a stock Chaos Monkey server.
 *
 * The list is not exhaustive: servers may ship strategies this library has
 * never heard of, so {@link Strategy} accepts any string and the value is sent
 * to the API untouched.
 */
export const Strategy = {
  ShutdownInstance: 'ShutdownInstance',
  BlockAllNetworkTraffic: 'BlockAllNetworkTraffic',
  DetachVolumes: 'DetachVolumes',
  BurnCpu: 'BurnCpu',
  BurnIo: 'BurnIo',
  KillProcesses: 'KillProcesses',
  NullRoute: 'NullRoute',
  FailEc2: 'FailEc2',
  FailDns: 'FailDns',
  FailDynamoDb: 'FailDynamoDb',
  FailS3: 'FailS3',
  FillDisk: 'FillDisk',
  NetworkCorruption: 'NetworkCorruption',
  NetworkLatency: 'NetworkLatency',
  NetworkLoss: 'NetworkLoss',
} as const;

/**
 * A chaos strategy name.
 * @example "ShutdownInstance"
 */
// `string & {}` keeps editor completion for the known names.
export type Strategy = (typeof Strategy)[keyof typeof Strategy] | (string & {});
