/**
 * Variable Binder Tests
 * @module tests/resolution/variable-binder.test
 */

import { describe, it, expect } from 'vitest';
import { bind } from '../../src/resolution/variable-binder.js';
import type { VariableSpec } from '../../src/resolution/types.js';

const schema: VariableSpec[] = [
  { name: 'region', required: true },
  { name: 'key_name', required: true },
  { name: 'cluster_name', required: false, default: 'default' },
  { name: 'custom_ami', required: false },
];

describe('bind', () => {
  it('should fill defaults and leave unset optionals out', () => {
    const result = bind({ region: 'eu-west-1', key_name: 'ops' }, schema);

    expect(result).toEqual({
      ok: true,
      value: { region: 'eu-west-1', key_name: 'ops', cluster_name: 'default' },
    });
  });

  it('should prefer an input over a default', () => {
    const result = bind({ region: 'eu-west-1', key_name: 'ops', cluster_name: 'hpc' }, schema);

    expect(result.ok && result.value.cluster_name).toBe('hpc');
  });

  it('should keep an explicitly empty input', () => {
    const result = bind({ region: 'eu-west-1', key_name: '', cluster_name: '' }, schema);

    expect(result.ok && result.value).toEqual({ region: 'eu-west-1', key_name: '', cluster_name: '' });
  });

  it('should pass through inputs the schema does not name', () => {
    const result = bind({ region: 'r', key_name: 'k', extra: 'x' }, schema);

    expect(result.ok && result.value.extra).toBe('x');
  });

  it('should fail on the first missing required variable in schema order', () => {
    const result = bind({}, schema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MissingRequired');
      expect(result.error.variable).toBe('region');
      expect(result.error.message).toBe('Missing required variable: region');
      expect(result.error.code).toBe('MISSING_REQUIRED_VARIABLE');
      expect(result.error.statusCode).toBe(422);
    }
  });

  it('should not mutate its input', () => {
    const inputs = { region: 'r', key_name: 'k' };
    bind(inputs, schema);

    expect(inputs).toEqual({ region: 'r', key_name: 'k' });
  });

  it('should bind anything against an empty schema', () => {
    expect(bind({ a: '1' }, [])).toEqual({ ok: true, value: { a: '1' } });
  });

  it.each([
    ['ops\nscheduler = evil', "value of 'key_name' must not contain a line break"],
    ['ops\r', "value of 'key_name' must not contain a line break"],
    ['{{ region }}', "value of 'key_name' must not contain template syntax"],
    ['{% if region %}', "value of 'key_name' must not contain template syntax"],
  ])('should reject the value %j', (value, reason) => {
    const result = bind({ region: 'eu-west-1', key_name: value }, schema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidInput');
      expect(result.error.variable).toBe('key_name');
      expect(result.error.message).toBe(`Invalid variable input: ${reason}`);
    }
  });

  it('should check pass-through inputs too', () => {
    const result = bind({ region: 'r', key_name: 'k', extra: 'a\nb' }, schema);

    expect(result.ok || result.error.variable).toBe('extra');
  });
});
