/**
 * Variable Binder
 * @module resolution/variable-binder
 */

import { BindError } from '../errors/domain.js';
import { Result, ok, err } from '../utils/result.js';
import type { VariableMap, VariableSpec } from './types.js';

/**
 * Bind raw inputs against a variable schema.
 *
 * Schema entries take their input, else their default; a required entry
 * with neither fails with the first such name in schema order. Optional
 * entries with neither are left out. Inputs the schema does not name pass
 * through unchanged. Every bound value must fit on one entry line and
 * carry no template syntax, so the written text parses back to the same
 * sections.
 */
export function bind(
  rawInputs: VariableMap,
  schema: readonly VariableSpec[]
): Result<VariableMap, BindError> {
  const bound: Record<string, string> = { ...rawInputs };

  for (const spec of schema) {
    if (Object.prototype.hasOwnProperty.call(rawInputs, spec.name)) {
      continue;
    }
    if (spec.default !== undefined) {
      bound[spec.name] = spec.default;
      continue;
    }
    if (spec.required) {
      return err(BindError.missingRequired(spec.name));
    }
  }

  for (const [name, value] of Object.entries(bound)) {
    const problem = unsafeValueReason(value);
    if (problem) {
      return err(BindError.invalidInput(name, `value of '${name}' must not contain ${problem}`));
    }
  }

  return ok(bound);
}

function unsafeValueReason(value: string): string | null {
  if (/[\r\n]/.test(value)) {
    return 'a line break';
  }
  if (value.includes('{{') || value.includes('{%')) {
    return 'template syntax';
  }
  return null;
}
