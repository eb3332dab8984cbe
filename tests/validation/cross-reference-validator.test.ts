/**
 * Cross-Reference Validator Tests
 * @module tests/validation/cross-reference-validator.test
 */

import { describe, it, expect } from 'vitest';
import { validate } from '../../src/validation/cross-reference-validator.js';
import { createResolvedConfig } from '../../src/resolution/section-assembler.js';
import { initConfig } from '../../src/config/index.js';
import type { ResolvedConfig, Section } from '../../src/resolution/types.js';

type SectionMap = Record<string, Record<string, string>>;

function build(sections: SectionMap): ResolvedConfig {
  return createResolvedConfig(
    Object.entries(sections).map(([name, entries]): Section => {
      const space = name.indexOf(' ');
      return {
        kind: space === -1 ? name : name.slice(0, space),
        label: space === -1 ? null : name.slice(space + 1),
        name,
        entries: new Map(Object.entries(entries)),
      };
    })
  );
}

function baseSections(): SectionMap {
  return {
    global: { cluster_template: 'default' },
    aws: { aws_region_name: 'us-east-1' },
    'cluster default': {
      base_os: 'alinux2',
      key_name: 'ops',
      scheduler: 'slurm',
      vpc_settings: 'main',
    },
    'vpc main': {
      vpc_id: 'vpc-12345678',
      master_subnet_id: 'subnet-12345678',
    },
  };
}

function withCluster(entries: Record<string, string>): SectionMap {
  const sections = baseSections();
  sections['cluster default'] = { ...sections['cluster default'], ...entries };
  return sections;
}

function rules(sections: SectionMap): string[] {
  return validate(build(sections)).errors.map(e => e.rule);
}

function messages(sections: SectionMap): string[] {
  return validate(build(sections)).errors.map(e => e.message);
}

describe('validate', () => {
  it('should accept a complete configuration', () => {
    expect(validate(build(baseSections()))).toEqual({
      valid: true,
      errors: [],
      warnings: [],
      references: [
        { section: 'cluster default', field: 'vpc_settings', targetKind: 'vpc', targetLabel: 'main', targetIndex: 3 },
      ],
    });
  });

  // ==========================================================================
  // References
  // ==========================================================================

  describe('CC001 active cluster', () => {
    it('should report only the missing cluster when cluster_template names nothing', () => {
      const sections = baseSections();
      sections.global = { cluster_template: 'hpc' };
      const report = validate(build(sections));

      expect(report.valid).toBe(false);
      expect(report.errors).toEqual([
        {
          kind: 'reference',
          rule: 'CC001',
          section: 'global',
          field: 'cluster_template',
          message: "cluster_template 'hpc' does not name an existing [cluster hpc] section",
          value: 'hpc',
          expected: 'cluster hpc',
        },
      ]);
      expect(report.warnings).toEqual([]);
    });

    it('should look for [cluster default] without a global section', () => {
      const sections = baseSections();
      delete sections.global;

      expect(validate(build(sections)).valid).toBe(true);
    });
  });

  describe('CC002 vpc_settings', () => {
    it('should fall back to the default vpc name', () => {
      const sections = baseSections();
      const { vpc_settings: _, ...cluster } = sections['cluster default'];
      sections['cluster default'] = cluster;
      const report = validate(build(sections));

      expect(report.errors.map(e => e.message)).toEqual([
        "vpc_settings 'default' does not name an existing [vpc default] section",
      ]);
      expect(report.warnings.map(w => w.message)).toEqual(['[vpc main] is not referenced by any cluster']);
      expect(report.references).toEqual([]);
    });
  });

  describe('CC007 other settings references', () => {
    it('should record found sections and report missing ones', () => {
      const sections = withCluster({ ebs_settings: 'data, scratch' });
      sections['ebs data'] = { volume_size: '100' };
      const report = validate(build(sections));

      expect(report.errors).toEqual([
        {
          kind: 'reference',
          rule: 'CC007',
          section: 'cluster default',
          field: 'ebs_settings',
          message: "ebs_settings 'scratch' does not name an existing [ebs scratch] section",
          value: 'scratch',
          expected: 'ebs scratch',
        },
      ]);
      expect(report.references[1]).toEqual({
        section: 'cluster default',
        field: 'ebs_settings',
        targetKind: 'ebs',
        targetLabel: 'data',
        targetIndex: 4,
      });
    });

    it('should limit the number of listed sections', () => {
      const sections = withCluster({ scaling_settings: 'a,b' });
      sections['scaling a'] = {};
      sections['scaling b'] = {};

      expect(messages(sections)).toEqual(['scaling_settings lists 2 sections, at most 1 allowed']);
    });
  });

  // ==========================================================================
  // Enumerations and Ranges
  // ==========================================================================

  describe('CC003 scheduler', () => {
    it('should require a scheduler', () => {
      const sections = withCluster({ scheduler: '' });

      expect(messages(sections)).toEqual(['scheduler is required']);
    });

    it('should reject an unsupported scheduler', () => {
      expect(messages(withCluster({ scheduler: 'pbs' }))).toEqual([
        "scheduler 'pbs' is not one of: sge, slurm, torque, awsbatch",
      ]);
    });

    it('should accept configured extra schedulers', () => {
      const report = validate(build(withCluster({ scheduler: 'pbs' })), { extraSchedulers: ['pbs'] });

      expect(report.valid).toBe(true);
    });
  });

  describe('CC004 root volumes', () => {
    it('should reject sizes outside the bounds', () => {
      expect(messages(withCluster({ master_root_volume_size: '10', compute_root_volume_size: 'big' }))).toEqual([
        "master_root_volume_size must be an integer between 20 and 16384 GiB, got '10'",
        "compute_root_volume_size must be an integer between 20 and 16384 GiB, got 'big'",
      ]);
    });

    it('should honour configured bounds', () => {
      const report = validate(build(withCluster({ master_root_volume_size: '10' })), { rootVolumeMinGiB: 8 });

      expect(report.valid).toBe(true);
    });
  });

  describe('CC005 vpc ids', () => {
    it('should check vpc and subnet ids', () => {
      const sections = baseSections();
      sections['vpc main'] = { vpc_id: 'vpc-xyz', compute_subnet_id: 'subnet-0123456789abcdef0' };

      expect(messages(sections)).toEqual([
        "vpc_id 'vpc-xyz' does not match ^vpc-([0-9a-f]{8}|[0-9a-f]{17})$",
        'master_subnet_id is required',
      ]);
    });
  });

  describe('CC006 base_os', () => {
    it('should reject an unsupported operating system', () => {
      expect(rules(withCluster({ base_os: 'windows' }))).toEqual(['CC006']);
    });

    it('should accept configured extra operating systems', () => {
      expect(validate(build(withCluster({ base_os: 'rocky8' })), { extraBaseOs: ['rocky8'] }).valid).toBe(true);
    });
  });

  // ==========================================================================
  // Formats
  // ==========================================================================

  describe('CC008 script URIs', () => {
    it('should accept s3 and https URIs', () => {
      const sections = withCluster({
        pre_install: 's3://cluster-scripts/pre.sh',
        post_install: 'https://example.com/post.sh',
      });

      expect(rules(sections)).toEqual([]);
    });

    it('should reject other schemes', () => {
      expect(messages(withCluster({ pre_install: 'ftp://host/pre.sh' }))).toEqual([
        "pre_install must be an s3://bucket/key or https:// URI, got 'ftp://host/pre.sh'",
      ]);
    });

    it('should reject a host in another partition', () => {
      const sections = withCluster({ post_install: 'https://scripts.s3.cn-north-1.amazonaws.com.cn/post.sh' });

      expect(messages(sections)).toEqual([
        'post_install host scripts.s3.cn-north-1.amazonaws.com.cn belongs to partition aws-cn but the region is in aws (endpoints under amazonaws.com)',
      ]);
    });
  });

  describe('CC009 S3 ARNs', () => {
    it('should reject a malformed ARN', () => {
      expect(messages(withCluster({ s3_read_resource: 'arn:foo:s3:::bucket/*' }))).toEqual([
        "s3_read_resource must be an arn:<partition>:s3:::<resource> ARN, got 'arn:foo:s3:::bucket/*'",
      ]);
    });

    it('should reject an ARN outside the region partition', () => {
      const sections = withCluster({ s3_read_write_resource: 'arn:aws:s3:::bucket/*' });
      sections.aws = { aws_region_name: 'cn-north-1' };

      expect(messages(sections)).toEqual(['s3_read_write_resource uses partition aws but the region is in aws-cn']);
    });

    it('should accept a matching GovCloud ARN', () => {
      const sections = withCluster({ s3_read_resource: 'arn:aws-us-gov:s3:::bucket/scripts/*' });
      sections.aws = { aws_region_name: 'us-gov-west-1' };

      expect(rules(sections)).toEqual([]);
    });
  });

  describe('CC010 region', () => {
    it('should warn and skip partition checks when the region is unset', () => {
      const sections = withCluster({ s3_read_resource: 'arn:aws-cn:s3:::bucket/*' });
      delete sections.aws;
      const report = validate(build(sections));

      expect(report.errors).toEqual([]);
      expect(report.warnings).toEqual([
        {
          rule: 'CC010',
          section: 'aws',
          field: 'aws_region_name',
          message: 'aws_region_name is not set; partition checks are skipped',
        },
      ]);
    });

    it('should reject a malformed region', () => {
      const sections = baseSections();
      sections.aws = { aws_region_name: 'useast1' };

      expect(messages(sections)).toEqual(["aws_region_name 'useast1' is not a region name like us-east-1"]);
    });
  });

  describe('CC011 booleans', () => {
    it('should check boolean keys in every section', () => {
      const sections = baseSections();
      sections.global = { cluster_template: 'default', update_check: 'TRUE' };
      sections['vpc main'] = { ...sections['vpc main'], use_public_ips: 'yes' };
      const report = validate(build(sections));

      expect(report.errors).toEqual([
        {
          kind: 'format',
          rule: 'CC011',
          section: 'vpc main',
          field: 'use_public_ips',
          message: "use_public_ips must be true or false, got 'yes'",
          value: 'yes',
          expected: 'true|false',
        },
      ]);
    });
  });

  describe('CC012 queue sizes', () => {
    it('should reject an initial size above the max', () => {
      expect(messages(withCluster({ initial_queue_size: '5', max_queue_size: '2' }))).toEqual([
        'initial_queue_size 5 exceeds max_queue_size 2',
      ]);
    });

    it('should compare against the default max', () => {
      expect(messages(withCluster({ initial_queue_size: '11' }))).toEqual([
        'initial_queue_size 11 exceeds max_queue_size 10',
      ]);
    });

    it('should reject a negative size without comparing', () => {
      expect(messages(withCluster({ max_queue_size: '-1' }))).toEqual([
        "max_queue_size must be a non-negative integer, got '-1'",
      ]);
    });
  });

  describe('CC013 AMI, security group and CIDR', () => {
    it('should check each format', () => {
      const sections = withCluster({ custom_ami: 'ami-1' });
      sections['vpc main'] = {
        ...sections['vpc main'],
        vpc_security_group_id: 'sg-0123456789abcdef0',
        ssh_from: '10.0.0.0/33',
      };

      expect(messages(sections)).toEqual([
        "custom_ami 'ami-1' does not match ^ami-([0-9a-f]{8}|[0-9a-f]{17})$",
        "ssh_from '10.0.0.0/33' is not an IPv4 CIDR block",
      ]);
    });

    it('should check CIDRs in unreferenced vpc sections too', () => {
      const sections = baseSections();
      sections['vpc spare'] = { ssh_from: '300.0.0.0/8' };

      expect(rules(sections)).toEqual(['CC013']);
    });
  });

  describe('CC014 extra_json', () => {
    it.each(['[1]', 'not json', 'null'])('should reject %s', value => {
      expect(messages(withCluster({ extra_json: value }))).toEqual(['extra_json must be a JSON object']);
    });

    it('should accept an object', () => {
      expect(rules(withCluster({ extra_json: '{"cluster":{}}' }))).toEqual([]);
    });
  });

  // ==========================================================================
  // Warnings
  // ==========================================================================

  describe('warnings', () => {
    it('should warn about unknown kinds and keys', () => {
      const sections = withCluster({ colour: 'blue' });
      sections.mystery = { anything: '1' };
      const report = validate(build(sections));

      expect(report.valid).toBe(true);
      expect(report.warnings).toEqual([
        { rule: 'CC021', section: 'cluster default', field: 'colour', message: "Key 'colour' is not defined for [cluster] sections" },
        { rule: 'CC020', section: 'mystery', message: "Unknown section kind 'mystery'" },
      ]);
    });

    it('should warn when key_name is empty', () => {
      const report = validate(build(withCluster({ key_name: '' })));

      expect(report.valid).toBe(true);
      expect(report.warnings.map(w => w.rule)).toEqual(['CC023']);
    });
  });

  // ==========================================================================
  // Options
  // ==========================================================================

  describe('options', () => {
    it('should drop issues of disabled rules', () => {
      const sections = withCluster({ scheduler: '', key_name: '' });
      const report = validate(build(sections), { disabledRules: ['CC003', 'CC023'] });

      expect(report).toMatchObject({ valid: true, errors: [], warnings: [] });
    });

    it('should fall back to the engine configuration', async () => {
      await initConfig({ env: { VALIDATION_EXTRA_SCHEDULERS: 'pbs, lsf', VALIDATION_DISABLED_RULES: 'CC023' } });
      const report = validate(build(withCluster({ scheduler: 'lsf', key_name: '' })));

      expect(report.valid).toBe(true);
      expect(report.warnings).toEqual([]);
    });

    it('should let explicit options win over the engine configuration', async () => {
      await initConfig({ env: { VALIDATION_EXTRA_SCHEDULERS: 'lsf' } });

      expect(validate(build(withCluster({ scheduler: 'lsf' })), { extraSchedulers: [] }).valid).toBe(false);
    });
  });
});
