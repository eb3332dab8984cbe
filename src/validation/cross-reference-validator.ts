/**
 * Cross-Reference Validator
 * @module validation/cross-reference-validator
 *
 * Structural and lexical checks on a resolved configuration. Every check
 * runs and issues accumulate; a report is always returned. Nothing here
 * touches the network.
 */

import { getSectionCatalog, SectionCatalog } from '../catalog/section-catalog.js';
import { getValidationConfig } from '../config/index.js';
import {
  classifyRegion,
  isPartition,
  partitionDnsSuffix,
  partitionForHost,
  Partition,
} from '../resolution/region.js';
import { findSection, findSectionRef } from '../resolution/section-assembler.js';
import type { ResolvedConfig, Section } from '../resolution/types.js';
import { isRecord } from '../utils/objects.js';
import {
  AMI_ID_PATTERN,
  BASE_OS,
  BOOLEAN_KEYS,
  BOOLEAN_PATTERN,
  DEFAULT_INITIAL_QUEUE_SIZE,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_VPC_SETTINGS,
  NON_NEGATIVE_INTEGER,
  REGION_PATTERN,
  S3_ARN_PATTERN,
  S3_URI_PATTERN,
  SCHEDULERS,
  SECURITY_GROUP_PATTERN,
  SETTINGS_REFERENCES,
  SUBNET_ID_PATTERN,
  VPC_ID_PATTERN,
  isIpv4Cidr,
} from './rules.js';
import type {
  CrossReference,
  ValidationError,
  ValidationOptions,
  ValidationReport,
  ValidationWarning,
} from './types.js';

interface ResolvedOptions {
  rootVolumeMinGiB: number;
  rootVolumeMaxGiB: number;
  schedulers: readonly string[];
  baseOs: readonly string[];
  disabledRules: ReadonlySet<string>;
  catalog: SectionCatalog;
}

function resolveOptions(options: ValidationOptions): ResolvedOptions {
  const configured = getValidationConfig();
  return {
    rootVolumeMinGiB: options.rootVolumeMinGiB ?? configured.rootVolumeMinGiB,
    rootVolumeMaxGiB: options.rootVolumeMaxGiB ?? configured.rootVolumeMaxGiB,
    schedulers: [...SCHEDULERS, ...(options.extraSchedulers ?? configured.extraSchedulers)],
    baseOs: [...BASE_OS, ...(options.extraBaseOs ?? configured.extraBaseOs)],
    disabledRules: new Set(options.disabledRules ?? configured.disabledRules),
    catalog: options.catalog ?? getSectionCatalog(),
  };
}

/**
 * Accumulates issues for one validation run
 */
class ValidationRun {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationWarning[] = [];
  readonly references: CrossReference[] = [];

  constructor(
    readonly config: ResolvedConfig,
    readonly options: ResolvedOptions
  ) {}

  error(issue: ValidationError): void {
    this.errors.push(issue);
  }

  warn(issue: ValidationWarning): void {
    this.warnings.push(issue);
  }

  /** Partition of aws.aws_region_name, null when the region is unset */
  get regionPartition(): Partition | null {
    const region = findSection(this.config, 'aws')?.entries.get('aws_region_name');
    return region ? classifyRegion(region) : null;
  }

  report(): ValidationReport {
    const disabled = this.options.disabledRules;
    const errors = this.errors.filter(e => !disabled.has(e.rule));
    const warnings = this.warnings.filter(w => !disabled.has(w.rule));
    return { valid: errors.length === 0, errors, warnings, references: this.references };
  }
}

// ============================================================================
// Checks 1-6
// ============================================================================

function checkActiveCluster(run: ValidationRun): Section | null {
  const { config } = run;
  if (config.activeCluster) {
    return config.sections[config.activeCluster.index];
  }
  run.error({
    kind: 'reference',
    rule: 'CC001',
    section: 'global',
    field: 'cluster_template',
    message: `cluster_template '${config.clusterTemplate}' does not name an existing [cluster ${config.clusterTemplate}] section`,
    value: config.clusterTemplate,
    expected: `cluster ${config.clusterTemplate}`,
  });
  return null;
}

function checkVpcReference(run: ValidationRun, cluster: Section): Section | null {
  const name = cluster.entries.get('vpc_settings') ?? DEFAULT_VPC_SETTINGS;
  const ref = findSectionRef(run.config, 'vpc', name);
  if (!ref) {
    run.error({
      kind: 'reference',
      rule: 'CC002',
      section: cluster.name,
      field: 'vpc_settings',
      message: `vpc_settings '${name}' does not name an existing [vpc ${name}] section`,
      value: name,
      expected: `vpc ${name}`,
    });
    return null;
  }
  run.references.push({
    section: cluster.name,
    field: 'vpc_settings',
    targetKind: 'vpc',
    targetLabel: name,
    targetIndex: ref.index,
  });
  return run.config.sections[ref.index];
}

function checkEnum(
  run: ValidationRun,
  section: Section,
  field: string,
  rule: string,
  allowed: readonly string[]
): void {
  const value = section.entries.get(field);
  if (value === undefined || value === '') {
    run.error({ kind: 'required', rule, section: section.name, field, message: `${field} is required` });
    return;
  }
  if (!allowed.includes(value)) {
    run.error({
      kind: 'enum',
      rule,
      section: section.name,
      field,
      message: `${field} '${value}' is not one of: ${allowed.join(', ')}`,
      value,
      expected: allowed.join('|'),
    });
  }
}

function checkRootVolumes(run: ValidationRun, cluster: Section): void {
  const { rootVolumeMinGiB: min, rootVolumeMaxGiB: max } = run.options;
  for (const field of ['master_root_volume_size', 'compute_root_volume_size']) {
    const value = cluster.entries.get(field);
    if (value === undefined) {
      continue;
    }
    const size = NON_NEGATIVE_INTEGER.test(value) ? Number(value) : NaN;
    if (Number.isNaN(size) || size < min || size > max) {
      run.error({
        kind: 'range',
        rule: 'CC004',
        section: cluster.name,
        field,
        message: `${field} must be an integer between ${min} and ${max} GiB, got '${value}'`,
        value,
        expected: `${min}-${max}`,
      });
    }
  }
}

function checkResourceId(
  run: ValidationRun,
  section: Section,
  field: string,
  pattern: RegExp,
  required: boolean,
  rule = 'CC005'
): void {
  const value = section.entries.get(field);
  if (value === undefined || value === '') {
    if (required) {
      run.error({ kind: 'required', rule, section: section.name, field, message: `${field} is required` });
    }
    return;
  }
  if (!pattern.test(value)) {
    run.error({
      kind: 'format',
      rule,
      section: section.name,
      field,
      message: `${field} '${value}' does not match ${pattern.source}`,
      value,
      expected: pattern.source,
    });
  }
}

// ============================================================================
// Checks 7-14
// ============================================================================

function checkSettingsReferences(run: ValidationRun, cluster: Section): void {
  for (const { key, kind, maxItems } of SETTINGS_REFERENCES) {
    const value = cluster.entries.get(key);
    if (value === undefined) {
      continue;
    }
    const names = value.split(',').map(s => s.trim()).filter(s => s !== '');
    if (names.length > maxItems) {
      run.error({
        kind: 'range',
        rule: 'CC007',
        section: cluster.name,
        field: key,
        message: `${key} lists ${names.length} sections, at most ${maxItems} allowed`,
        value,
        expected: `<= ${maxItems}`,
      });
    }
    for (const name of names) {
      const ref = findSectionRef(run.config, kind, name);
      if (!ref) {
        run.error({
          kind: 'reference',
          rule: 'CC007',
          section: cluster.name,
          field: key,
          message: `${key} '${name}' does not name an existing [${kind} ${name}] section`,
          value: name,
          expected: `${kind} ${name}`,
        });
        continue;
      }
      run.references.push({ section: cluster.name, field: key, targetKind: kind, targetLabel: name, targetIndex: ref.index });
    }
  }
}

function checkScriptUris(run: ValidationRun, cluster: Section): void {
  const regionPartition = run.regionPartition;

  for (const field of ['pre_install', 'post_install']) {
    const value = cluster.entries.get(field);
    if (value === undefined || value === '') {
      continue;
    }
    if (S3_URI_PATTERN.test(value)) {
      continue;
    }

    let url: URL | null = null;
    try {
      url = new URL(value);
    } catch {
      url = null;
    }
    if (!url || url.protocol !== 'https:' || url.hostname === '') {
      run.error({
        kind: 'format',
        rule: 'CC008',
        section: cluster.name,
        field,
        message: `${field} must be an s3://bucket/key or https:// URI, got '${value}'`,
        value,
        expected: 's3://bucket/key | https://host/path',
      });
      continue;
    }

    const hostPartition = partitionForHost(url.hostname);
    if (hostPartition && regionPartition && hostPartition !== regionPartition) {
      run.error({
        kind: 'partition',
        rule: 'CC008',
        section: cluster.name,
        field,
        message: `${field} host ${url.hostname} belongs to partition ${hostPartition} but the region is in ${regionPartition} (endpoints under ${partitionDnsSuffix(regionPartition)})`,
        value,
        expected: regionPartition,
      });
    }
  }
}

function checkS3Arns(run: ValidationRun, cluster: Section): void {
  const regionPartition = run.regionPartition;

  for (const field of ['s3_read_resource', 's3_read_write_resource']) {
    const value = cluster.entries.get(field);
    if (value === undefined || value === '') {
      continue;
    }
    const match = S3_ARN_PATTERN.exec(value);
    if (!match || !isPartition(match[1])) {
      run.error({
        kind: 'format',
        rule: 'CC009',
        section: cluster.name,
        field,
        message: `${field} must be an arn:<partition>:s3:::<resource> ARN, got '${value}'`,
        value,
        expected: 'arn:<partition>:s3:::<resource>',
      });
      continue;
    }
    if (regionPartition && match[1] !== regionPartition) {
      run.error({
        kind: 'partition',
        rule: 'CC009',
        section: cluster.name,
        field,
        message: `${field} uses partition ${match[1]} but the region is in ${regionPartition}`,
        value,
        expected: regionPartition,
      });
    }
  }
}

function checkRegion(run: ValidationRun): void {
  const aws = findSection(run.config, 'aws');
  const region = aws?.entries.get('aws_region_name');
  if (region === undefined || region === '') {
    run.warn({
      rule: 'CC010',
      section: 'aws',
      field: 'aws_region_name',
      message: 'aws_region_name is not set; partition checks are skipped',
    });
    return;
  }
  if (!REGION_PATTERN.test(region)) {
    run.error({
      kind: 'format',
      rule: 'CC010',
      section: 'aws',
      field: 'aws_region_name',
      message: `aws_region_name '${region}' is not a region name like us-east-1`,
      value: region,
      expected: REGION_PATTERN.source,
    });
  }
}

function checkBooleans(run: ValidationRun): void {
  for (const section of run.config.sections) {
    for (const [key, value] of section.entries) {
      if (BOOLEAN_KEYS.has(key) && !BOOLEAN_PATTERN.test(value)) {
        run.error({
          kind: 'format',
          rule: 'CC011',
          section: section.name,
          field: key,
          message: `${key} must be true or false, got '${value}'`,
          value,
          expected: 'true|false',
        });
      }
    }
  }
}

function checkQueueSizes(run: ValidationRun, cluster: Section): void {
  const sizes: Record<string, number | null> = {};

  for (const [field, fallback] of [
    ['initial_queue_size', DEFAULT_INITIAL_QUEUE_SIZE],
    ['max_queue_size', DEFAULT_MAX_QUEUE_SIZE],
  ] as const) {
    const value = cluster.entries.get(field);
    if (value === undefined) {
      sizes[field] = fallback;
    } else if (NON_NEGATIVE_INTEGER.test(value)) {
      sizes[field] = Number(value);
    } else {
      sizes[field] = null;
      run.error({
        kind: 'range',
        rule: 'CC012',
        section: cluster.name,
        field,
        message: `${field} must be a non-negative integer, got '${value}'`,
        value,
        expected: '>= 0',
      });
    }
  }

  const initial = sizes.initial_queue_size;
  const max = sizes.max_queue_size;
  if (initial !== null && max !== null && initial > max) {
    run.error({
      kind: 'range',
      rule: 'CC012',
      section: cluster.name,
      field: 'initial_queue_size',
      message: `initial_queue_size ${initial} exceeds max_queue_size ${max}`,
      value: String(initial),
      expected: `<= ${max}`,
    });
  }
}

function checkVpcValues(run: ValidationRun): void {
  for (const section of run.config.sections) {
    if (section.kind !== 'vpc') {
      continue;
    }
    checkResourceId(run, section, 'vpc_security_group_id', SECURITY_GROUP_PATTERN, false, 'CC013');
    const sshFrom = section.entries.get('ssh_from');
    if (sshFrom !== undefined && !isIpv4Cidr(sshFrom)) {
      run.error({
        kind: 'format',
        rule: 'CC013',
        section: section.name,
        field: 'ssh_from',
        message: `ssh_from '${sshFrom}' is not an IPv4 CIDR block`,
        value: sshFrom,
        expected: 'a.b.c.d/n',
      });
    }
  }
}

function checkExtraJson(run: ValidationRun, cluster: Section): void {
  const value = cluster.entries.get('extra_json');
  if (value === undefined) {
    return;
  }
  let parsed: unknown = null;
  try {
    parsed = JSON.parse(value);
  } catch {
    parsed = null;
  }
  if (!isRecord(parsed)) {
    run.error({
      kind: 'format',
      rule: 'CC014',
      section: cluster.name,
      field: 'extra_json',
      message: 'extra_json must be a JSON object',
      value,
      expected: '{...}',
    });
  }
}

// ============================================================================
// Warnings
// ============================================================================

function checkCatalog(run: ValidationRun): void {
  const { catalog } = run.options;
  for (const section of run.config.sections) {
    if (!catalog.isKnownKind(section.kind)) {
      run.warn({ rule: 'CC020', section: section.name, message: `Unknown section kind '${section.kind}'` });
      continue;
    }
    for (const key of section.entries.keys()) {
      if (!catalog.isKnownKey(section.kind, key)) {
        run.warn({
          rule: 'CC021',
          section: section.name,
          field: key,
          message: `Key '${key}' is not defined for [${section.kind}] sections`,
        });
      }
    }
  }
}

function checkUnreferencedVpcs(run: ValidationRun): void {
  const referenced = new Set<string>();
  for (const section of run.config.sections) {
    if (section.kind === 'cluster') {
      referenced.add(section.entries.get('vpc_settings') ?? DEFAULT_VPC_SETTINGS);
    }
  }
  for (const section of run.config.sections) {
    if (section.kind === 'vpc' && section.label !== null && !referenced.has(section.label)) {
      run.warn({ rule: 'CC022', section: section.name, message: `[${section.name}] is not referenced by any cluster` });
    }
  }
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Validate a resolved configuration
 */
export function validate(config: ResolvedConfig, options: ValidationOptions = {}): ValidationReport {
  const run = new ValidationRun(config, resolveOptions(options));

  // 1
  const cluster = checkActiveCluster(run);

  // 2-7, 12-14 read the active cluster and are skipped without it
  if (cluster) {
    const vpc = checkVpcReference(run, cluster);
    checkEnum(run, cluster, 'scheduler', 'CC003', run.options.schedulers);
    checkRootVolumes(run, cluster);
    if (vpc) {
      checkResourceId(run, vpc, 'vpc_id', VPC_ID_PATTERN, true);
      checkResourceId(run, vpc, 'master_subnet_id', SUBNET_ID_PATTERN, true);
      checkResourceId(run, vpc, 'compute_subnet_id', SUBNET_ID_PATTERN, false);
    }
    checkEnum(run, cluster, 'base_os', 'CC006', run.options.baseOs);
    checkSettingsReferences(run, cluster);
    checkScriptUris(run, cluster);
    checkS3Arns(run, cluster);
  }

  checkRegion(run);
  checkBooleans(run);

  if (cluster) {
    checkQueueSizes(run, cluster);
    checkResourceId(run, cluster, 'custom_ami', AMI_ID_PATTERN, false, 'CC013');
  }
  checkVpcValues(run);
  if (cluster) {
    checkExtraJson(run, cluster);
  }

  checkCatalog(run);
  checkUnreferencedVpcs(run);
  if (cluster && !cluster.entries.get('key_name')) {
    run.warn({ rule: 'CC023', section: cluster.name, field: 'key_name', message: 'key_name is not set; SSH access will not be possible' });
  }

  return run.report();
}
