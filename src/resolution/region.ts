/**
 * Region Classification
 * @module resolution/region
 *
 * Maps region names and hosts onto the closed set of partitions.
 */

export const PARTITIONS = ['aws', 'aws-cn', 'aws-us-gov'] as const;

export type Partition = typeof PARTITIONS[number];

/**
 * Prefix rules, checked in order. Regions matching none are `aws`.
 */
const REGION_CLASS_RULES: readonly { prefix: string; partition: Partition }[] = [
  { prefix: 'cn-', partition: 'aws-cn' },
  { prefix: 'us-gov-', partition: 'aws-us-gov' },
];

export const DEFAULT_PARTITION: Partition = 'aws';

/**
 * Partition for a region name; depends only on the prefix
 */
export function classifyRegion(region: string): Partition {
  for (const rule of REGION_CLASS_RULES) {
    if (region.startsWith(rule.prefix)) {
      return rule.partition;
    }
  }
  return DEFAULT_PARTITION;
}

export function isPartition(value: string): value is Partition {
  return PARTITIONS.some(p => p === value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled partition: ${String(value)}`);
}

/**
 * DNS suffix of service endpoints in a partition
 */
export function partitionDnsSuffix(partition: Partition): string {
  switch (partition) {
    case 'aws':
      return 'amazonaws.com';
    case 'aws-cn':
      return 'amazonaws.com.cn';
    case 'aws-us-gov':
      return 'amazonaws.com';
    default:
      return assertNever(partition);
  }
}

/**
 * Partition implied by an endpoint host, or null when the host says nothing
 */
export function partitionForHost(host: string): Partition | null {
  const lower = host.toLowerCase();
  if (lower.endsWith('.amazonaws.com.cn')) {
    return 'aws-cn';
  }
  return null;
}

/**
 * Read-only S3 resource ARN for a bucket's scripts prefix
 */
export function s3ReadResource(partition: Partition, bucket: string): string {
  return `arn:${partition}:s3:::${bucket}/scripts/*`;
}
