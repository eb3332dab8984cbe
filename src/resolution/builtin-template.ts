/**
 * Built-in Cluster Template
 * @module resolution/builtin-template
 *
 * The packaged template and the variables it expects.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { VariableSpec } from './types.js';

export const BUILTIN_TEMPLATE_URL = new URL('../../templates/cluster-config.ini', import.meta.url);

export const BUILTIN_TEMPLATE_PATH = fileURLToPath(BUILTIN_TEMPLATE_URL);

export const BUILTIN_TEMPLATE_VARIABLES: readonly VariableSpec[] = [
  { name: 'region', required: true, description: 'Region the cluster is created in' },
  { name: 'os', required: true, description: 'Base operating system' },
  { name: 'key_name', required: true, description: 'EC2 key pair for SSH access' },
  { name: 'instance', required: true, description: 'Master and compute instance type' },
  { name: 'scheduler', required: true, description: 'Job scheduler' },
  { name: 'bucket_name', required: true, description: 'Bucket holding the install scripts' },
  { name: 'vpc_id', required: true },
  { name: 'public_subnet_id', required: true, description: 'Subnet for the master node' },
  { name: 'private_subnet_id', required: true, description: 'Subnet for compute nodes' },
  { name: 'cluster_name', required: false, default: 'default' },
  { name: 'custom_ami', required: false },
  { name: 'custom_node', required: false, description: 'Custom node package URL' },
  { name: 'custom_cookbook', required: false, description: 'Custom Chef cookbook URL' },
];

let cached: string | null = null;

export function loadBuiltinTemplate(): string {
  if (cached === null) {
    cached = readFileSync(BUILTIN_TEMPLATE_URL, 'utf-8');
  }
  return cached;
}
