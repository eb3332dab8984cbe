#!/usr/bin/env node
/**
 * Command Line Interface
 * @module cli
 *
 * Usage:
 *   cluster-config render [--template=PATH] [--profile=PATH] [--var=name=value ...]
 *                         [--output=PATH] [--format=ini|json]
 *   cluster-config validate FILE...
 *
 * Exit codes: 0 when every configuration is valid, 1 on validation, bind or
 * assemble errors, 2 on usage errors.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { ConfigLoader } from './config/index.js';
import type { AppConfig } from './config/index.js';
import { TemplateReadError, UsageError, getErrorMessage } from './errors/index.js';
import { initLogger } from './logging/index.js';
import { toSectionMap } from './resolution/config-writer.js';
import type { VariableMap } from './resolution/types.js';
import {
  collectVariables,
  fromEnvironment,
  loadProfile,
  parseVariableFlags,
} from './resolution/variable-sources.js';
import { ClusterConfigService, type RenderOutcome } from './services/cluster-config-service.js';
import { Result, ok, err } from './utils/result.js';
import type { ValidationReport } from './validation/types.js';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'ini' | 'json';

export type CliCommand =
  | {
      readonly command: 'render';
      readonly template?: string;
      readonly profile?: string;
      readonly vars: readonly string[];
      readonly output?: string;
      readonly format: OutputFormat;
    }
  | { readonly command: 'validate'; readonly files: readonly string[] }
  | { readonly command: 'help' };

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readonly env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage:
  cluster-config render [--template=PATH] [--profile=PATH] [--var=name=value ...]
                        [--output=PATH] [--format=ini|json]
  cluster-config validate FILE...

Template variables are read from the profile, then CLUSTER_VAR_* environment
variables, then --var flags; later sources win.
`;

// ============================================================================
// Argument Parsing
// ============================================================================

const RENDER_OPTIONS = new Set(['--template', '--profile', '--var', '--output', '--format']);

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(args: readonly string[]): Result<CliCommand, UsageError> {
  const [command, ...rest] = args;

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    return ok({ command: 'help' });
  }

  if (command === 'validate') {
    const option = rest.find(arg => arg.startsWith('-'));
    if (option !== undefined) {
      return err(new UsageError(`Unknown option for validate: ${option}`));
    }
    if (rest.length === 0) {
      return err(new UsageError('validate needs at least one FILE'));
    }
    return ok({ command: 'validate', files: rest });
  }

  if (command !== 'render') {
    return err(new UsageError(`Unknown command '${command}'`));
  }

  const values = new Map<string, string>();
  const vars: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (!RENDER_OPTIONS.has(name)) {
      return err(new UsageError(`Unknown option for render: ${arg}`));
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        return err(new UsageError(`${name} needs a value`));
      }
      value = next;
      i++;
    }

    if (name === '--var') {
      vars.push(value);
    } else if (values.has(name)) {
      return err(new UsageError(`${name} given more than once`));
    } else {
      values.set(name, value);
    }
  }

  const format = values.get('--format') ?? 'ini';
  if (format !== 'ini' && format !== 'json') {
    return err(new UsageError(`--format must be ini or json, got '${format}'`));
  }

  return ok({
    command: 'render',
    template: values.get('--template'),
    profile: values.get('--profile'),
    vars,
    output: values.get('--output'),
    format,
  });
}

// ============================================================================
// Reporting
// ============================================================================

/**
 * One line per issue, errors first
 */
export function formatReport(report: ValidationReport, prefix = ''): string[] {
  const lines: string[] = [];
  for (const e of report.errors) {
    lines.push(`${prefix}error ${e.rule} [${e.section}] ${e.field}: ${e.message}`);
  }
  for (const w of report.warnings) {
    const field = w.field ? ` ${w.field}` : '';
    lines.push(`${prefix}warning ${w.rule} [${w.section}]${field}: ${w.message}`);
  }
  return lines;
}

function writeLines(write: (text: string) => void, lines: readonly string[]): void {
  for (const line of lines) {
    write(`${line}\n`);
  }
}

// ============================================================================
// Commands
// ============================================================================

async function runRender(
  command: Extract<CliCommand, { command: 'render' }>,
  config: AppConfig,
  service: ClusterConfigService,
  io: CliIo
): Promise<number> {
  const templatePath = command.template ?? config.template.path;
  let template: string | undefined;
  if (templatePath !== undefined) {
    try {
      template = await readFile(templatePath, 'utf-8');
    } catch (error) {
      throw new TemplateReadError(templatePath, error instanceof Error ? error : new Error(String(error)));
    }
  }

  let profile: VariableMap = {};
  if (command.profile !== undefined) {
    const loaded = await loadProfile(command.profile);
    if (!loaded.ok) {
      io.stderr(`error: ${loaded.error.message}\n`);
      return EXIT_INVALID;
    }
    profile = loaded.value;
  }

  const flags = parseVariableFlags(command.vars);
  if (!flags.ok) {
    io.stderr(`error: ${flags.error.message}\n`);
    return EXIT_INVALID;
  }

  const variables = collectVariables({
    profile,
    environment: fromEnvironment(io.env, config.template.variablePrefix),
    flags: flags.value,
  });

  const outcome: RenderOutcome = service.render({ template, source: templatePath, variables });
  if (outcome.status !== 'resolved') {
    io.stderr(`error: ${outcome.error.message}\n`);
    return EXIT_INVALID;
  }

  writeLines(io.stderr, formatReport(outcome.report));

  let output: string;
  if (command.format === 'json') {
    const activeCluster = outcome.config.activeCluster
      ? outcome.config.sections[outcome.config.activeCluster.index].name
      : null;
    output = `${JSON.stringify({ activeCluster, sections: toSectionMap(outcome.config), report: outcome.report }, null, 2)}\n`;
  } else if (outcome.report.valid) {
    output = outcome.text;
  } else {
    // An invalid configuration is never emitted as provisionable text
    return EXIT_INVALID;
  }

  if (command.output !== undefined) {
    await writeFile(command.output, output, 'utf-8');
  } else {
    io.stdout(output);
  }

  return outcome.report.valid ? EXIT_OK : EXIT_INVALID;
}

async function runValidate(
  command: Extract<CliCommand, { command: 'validate' }>,
  service: ClusterConfigService,
  io: CliIo
): Promise<number> {
  const outcomes = await service.validateFiles(command.files);
  let failed = 0;

  for (const settled of outcomes) {
    const file = command.files[settled.index];
    if (settled.status === 'rejected') {
      failed++;
      io.stderr(`${file}: error: ${getErrorMessage(settled.reason)}\n`);
      continue;
    }

    const outcome = settled.value;
    if (outcome.status === 'assemble-failed') {
      failed++;
      io.stderr(`error: ${outcome.error.message}\n`);
      continue;
    }

    writeLines(io.stderr, formatReport(outcome.report, `${file}: `));
    if (outcome.report.valid) {
      io.stdout(`${file}: ok\n`);
    } else {
      failed++;
      io.stdout(`${file}: invalid (${outcome.report.errors.length} errors)\n`);
    }
  }

  return failed === 0 ? EXIT_OK : EXIT_INVALID;
}

// ============================================================================
// Entry Point
// ============================================================================

const processIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  env: process.env,
};

/**
 * Run the CLI and return its exit code
 */
export async function runCli(args: readonly string[], io: CliIo = processIo): Promise<number> {
  const parsed = parseArgs(args);
  if (!parsed.ok) {
    io.stderr(`error: ${parsed.error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const command = parsed.value;
  if (command.command === 'help') {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    const config = await new ConfigLoader({ env: io.env }).load();
    initLogger({ level: config.logging.level, pretty: config.logging.pretty }, { service: 'cli' });
    const service = new ClusterConfigService({
      validation: config.validation,
      concurrency: config.template.renderConcurrency,
    });

    return command.command === 'render'
      ? await runRender(command, config, service, io)
      : await runValidate(command, service, io);
  } catch (error) {
    io.stderr(`error: ${getErrorMessage(error)}\n`);
    return error instanceof UsageError ? EXIT_USAGE : EXIT_INVALID;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`error: ${getErrorMessage(error)}\n`);
      process.exitCode = EXIT_INVALID;
    }
  );
}
