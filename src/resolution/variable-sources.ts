/**
 * Variable Sources
 * @module resolution/variable-sources
 *
 * Reads template variables from a profile file, prefixed environment
 * variables and `name=value` flags, and merges them with later sources
 * winning.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { BindError } from '../errors/domain.js';
import { getErrorMessage } from '../errors/base.js';
import { Result, ok, err } from '../utils/result.js';
import { isRecord } from '../utils/objects.js';
import type { VariableMap } from './types.js';

export const DEFAULT_VARIABLE_PREFIX = 'CLUSTER_VAR_';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface VariableSourceSet {
  readonly profile?: VariableMap;
  readonly environment?: VariableMap;
  readonly flags?: VariableMap;
}

/**
 * Merge sources: profile, then environment, then flags
 */
export function collectVariables(sources: VariableSourceSet): VariableMap {
  return {
    ...sources.profile,
    ...sources.environment,
    ...sources.flags,
  };
}

// ============================================================================
// Profile
// ============================================================================

/**
 * Parse a YAML or JSON profile of scalar values
 */
export function parseProfile(text: string, source = 'profile'): Result<VariableMap, BindError> {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    return err(BindError.invalidInput(source, getErrorMessage(error), source));
  }

  if (parsed === null || parsed === undefined) {
    return ok({});
  }
  if (!isRecord(parsed)) {
    return err(BindError.invalidInput(source, 'profile must be a mapping of variable names to values', source));
  }

  const variables: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      variables[name] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      variables[name] = String(value);
    } else {
      return err(BindError.invalidInput(name, `value of '${name}' must be a string, number or boolean`, source));
    }
  }
  return ok(variables);
}

/**
 * Read and parse a profile file
 */
export async function loadProfile(path: string): Promise<Result<VariableMap, BindError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return err(BindError.invalidInput(path, getErrorMessage(error), path));
  }
  return parseProfile(text, path);
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Variables from `<prefix><NAME>` environment entries, names lower-cased
 */
export function fromEnvironment(
  env: NodeJS.ProcessEnv,
  prefix: string = DEFAULT_VARIABLE_PREFIX
): VariableMap {
  const variables: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || !key.startsWith(prefix) || key.length === prefix.length) {
      continue;
    }
    variables[key.slice(prefix.length).toLowerCase()] = value;
  }
  return variables;
}

// ============================================================================
// Flags
// ============================================================================

/**
 * Parse `name=value` pairs; the value may itself contain `=`
 */
export function parseVariableFlags(flags: readonly string[]): Result<VariableMap, BindError> {
  const variables: Record<string, string> = {};
  for (const flag of flags) {
    const eq = flag.indexOf('=');
    if (eq === -1) {
      return err(BindError.invalidInput(flag, `expected name=value, got '${flag}'`, '--var'));
    }
    const name = flag.slice(0, eq).trim();
    if (!VARIABLE_NAME.test(name)) {
      return err(BindError.invalidInput(flag, `invalid variable name '${name}'`, '--var'));
    }
    variables[name] = flag.slice(eq + 1);
  }
  return ok(variables);
}
