/**
 * Section Catalog Tests
 * @module tests/catalog/section-catalog.test
 */

import { describe, it, expect } from 'vitest';
import { getSectionCatalog, parseSectionCatalog } from '../../src/catalog/section-catalog.js';
import { ConfigurationError } from '../../src/errors/domain.js';

describe('parseSectionCatalog', () => {
  const catalog = parseSectionCatalog({
    sections: {
      global: { labelled: false, keys: ['cluster_template'] },
      vpc: { labelled: true, keys: ['vpc_id'] },
    },
  });

  it('should derive label rules', () => {
    expect(catalog.labelRule('global')).toBe('forbidden');
    expect(catalog.labelRule('vpc')).toBe('required');
    expect(catalog.labelRule('mystery')).toBe('optional');
  });

  it('should answer key lookups per kind', () => {
    expect(catalog.isKnownKey('vpc', 'vpc_id')).toBe(true);
    expect(catalog.isKnownKey('global', 'vpc_id')).toBe(false);
    expect(catalog.isKnownKey('mystery', 'vpc_id')).toBe(false);
  });

  it('should list kinds in declaration order', () => {
    expect(catalog.kindNames).toEqual(['global', 'vpc']);
    expect(catalog.isKnownKind('vpc')).toBe(true);
    expect(catalog.isKnownKind('mystery')).toBe(false);
  });

  it('should reject a malformed catalog', () => {
    expect(() => parseSectionCatalog({ sections: { vpc: { labelled: 'yes', keys: [] } } })).toThrow(
      ConfigurationError
    );
    expect(() => parseSectionCatalog({})).toThrow(expect.objectContaining({ code: 'CATALOG_ERROR' }));
  });
});

describe('getSectionCatalog', () => {
  it('should load the packaged catalog once', () => {
    const catalog = getSectionCatalog();

    expect(getSectionCatalog()).toBe(catalog);
    expect(catalog.labelRule('cluster')).toBe('required');
    expect(catalog.labelRule('aws')).toBe('forbidden');
    expect(catalog.isKnownKey('cluster', 'extra_json')).toBe(true);
    expect(catalog.isKnownKey('vpc', 'use_public_ips')).toBe(true);
  });
});
