/**
 * Validation Rules
 * @module validation/rules
 *
 * Rule ids, enumerations and lexical patterns used by the cross-reference
 * validator.
 */

import type { ValidationRule } from './types.js';

// ============================================================================
// Built-in Validation Rules
// ============================================================================

export const BUILTIN_RULES: readonly ValidationRule[] = [
  // References
  { id: 'CC001', description: 'global.cluster_template names an existing cluster section', severity: 'error' },
  { id: 'CC002', description: 'vpc_settings names an existing vpc section', severity: 'error' },
  // Enumerations and ranges
  { id: 'CC003', description: 'scheduler is set and supported', severity: 'error' },
  { id: 'CC004', description: 'Root volume sizes are integers within bounds', severity: 'error' },
  { id: 'CC005', description: 'VPC and subnet ids are set and well-formed', severity: 'error' },
  { id: 'CC006', description: 'base_os is set and supported', severity: 'error' },
  { id: 'CC007', description: 'Other *_settings keys name existing sections', severity: 'error' },
  // Formats
  { id: 'CC008', description: 'pre_install / post_install are s3:// or https:// URIs in the region partition', severity: 'error' },
  { id: 'CC009', description: 'S3 resource ARNs are well-formed and in the region partition', severity: 'error' },
  { id: 'CC010', description: 'aws_region_name is set and well-formed', severity: 'error' },
  { id: 'CC011', description: 'Boolean keys are true or false', severity: 'error' },
  { id: 'CC012', description: 'Queue sizes are non-negative and initial does not exceed max', severity: 'error' },
  { id: 'CC013', description: 'AMI, security group and CIDR values are well-formed', severity: 'error' },
  { id: 'CC014', description: 'extra_json is a JSON object', severity: 'error' },
  // Warnings
  { id: 'CC020', description: 'Section kind is known', severity: 'warning' },
  { id: 'CC021', description: 'Key is defined for its section kind', severity: 'warning' },
  { id: 'CC022', description: 'vpc section is referenced by a cluster', severity: 'warning' },
  { id: 'CC023', description: 'Cluster sets key_name', severity: 'warning' },
];

// ============================================================================
// Enumerations
// ============================================================================

export const SCHEDULERS: readonly string[] = ['sge', 'slurm', 'torque', 'awsbatch'];

export const BASE_OS: readonly string[] = [
  'alinux',
  'alinux2',
  'centos7',
  'centos8',
  'ubuntu1604',
  'ubuntu1804',
  'ubuntu2004',
];

export const BOOLEAN_KEYS: ReadonlySet<string> = new Set([
  'maintain_initial_size',
  'use_public_ips',
  'encrypted_ephemeral',
  'disable_hyperthreading',
  'enable_intel_hpc_platform',
  'update_check',
  'sanity_check',
]);

/**
 * Cluster keys that name other sections, besides vpc_settings
 */
export const SETTINGS_REFERENCES: readonly { key: string; kind: string; maxItems: number }[] = [
  { key: 'scaling_settings', kind: 'scaling', maxItems: 1 },
  { key: 'ebs_settings', kind: 'ebs', maxItems: 5 },
  { key: 'efs_settings', kind: 'efs', maxItems: 1 },
  { key: 'raid_settings', kind: 'raid', maxItems: 1 },
  { key: 'fsx_settings', kind: 'fsx', maxItems: 1 },
  { key: 'dcv_settings', kind: 'dcv', maxItems: 1 },
  { key: 'cw_log_settings', kind: 'cw_log', maxItems: 1 },
  { key: 'dashboard_settings', kind: 'dashboard', maxItems: 1 },
];

export const DEFAULT_VPC_SETTINGS = 'default';

export const DEFAULT_INITIAL_QUEUE_SIZE = 0;
export const DEFAULT_MAX_QUEUE_SIZE = 10;

// ============================================================================
// Patterns
// ============================================================================

function resourceId(prefix: string): RegExp {
  return new RegExp(`^${prefix}-([0-9a-f]{8}|[0-9a-f]{17})$`);
}

export const VPC_ID_PATTERN = resourceId('vpc');
export const SUBNET_ID_PATTERN = resourceId('subnet');
export const SECURITY_GROUP_PATTERN = resourceId('sg');
export const AMI_ID_PATTERN = resourceId('ami');

export const REGION_PATTERN = /^[a-z]{2}(-gov)?-[a-z]+-\d+$/;

export const S3_URI_PATTERN = /^s3:\/\/[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]\/\S+$/;

export const S3_ARN_PATTERN = /^arn:([a-z-]+):s3:::(\S+)$/;

export const BOOLEAN_PATTERN = /^(true|false)$/i;

export const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * IPv4 CIDR with octets 0-255 and prefix 0-32
 */
export function isIpv4Cidr(value: string): boolean {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(value);
  if (!match) {
    return false;
  }
  const octets = match.slice(1, 5).map(Number);
  return octets.every(o => o <= 255) && Number(match[5]) <= 32;
}
