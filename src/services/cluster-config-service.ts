/**
 * Cluster Config Service
 * @module services/cluster-config-service
 *
 * Runs the resolution pipeline: bind variables, resolve region and feature
 * placeholders, parse the template, select branches, assemble sections and
 * validate the result. Single renders are synchronous; file and batch
 * variants read templates asynchronously through a bounded worker pool.
 */

import { readFile } from 'node:fs/promises';
import { getConfig } from '../config/index.js';
import { AssembleError, BindError, TemplateReadError } from '../errors/domain.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import { parseTemplate, INLINE_SOURCE } from '../parsers/cluster-template/template-parser.js';
import { BUILTIN_TEMPLATE_PATH, BUILTIN_TEMPLATE_VARIABLES, loadBuiltinTemplate } from '../resolution/builtin-template.js';
import { placeholderValues, resolve, selectBranches } from '../resolution/conditional-resolver.js';
import { formatConfig, parseResolvedConfig } from '../resolution/config-writer.js';
import { assemble } from '../resolution/section-assembler.js';
import type { ResolvedConfig, VariableMap, VariableSpec } from '../resolution/types.js';
import { bind } from '../resolution/variable-binder.js';
import { andThen } from '../utils/result.js';
import { parallelWithLimit, Settled } from '../utils/concurrency.js';
import { validate } from '../validation/cross-reference-validator.js';
import type { ValidationOptions, ValidationReport } from '../validation/types.js';

// ============================================================================
// Types
// ============================================================================

export interface RenderRequest {
  /** Template text; the packaged template when omitted */
  readonly template?: string;
  /** Name used in errors and logs */
  readonly source?: string;
  readonly variables: VariableMap;
  /**
   * Variable schema. Defaults to the packaged template's schema when the
   * template is omitted, and to no schema otherwise (unbound markers are
   * then reported by the assembler).
   */
  readonly schema?: readonly VariableSpec[];
}

export type RenderOutcome =
  | { readonly status: 'bind-failed'; readonly source: string; readonly error: BindError }
  | { readonly status: 'assemble-failed'; readonly source: string; readonly error: AssembleError }
  | {
      readonly status: 'resolved';
      readonly source: string;
      readonly config: ResolvedConfig;
      readonly text: string;
      readonly report: ValidationReport;
      /** Full substitution context: bound variables plus placeholders */
      readonly variables: VariableMap;
    };

export type ValidateOutcome =
  | { readonly status: 'assemble-failed'; readonly source: string; readonly error: AssembleError }
  | {
      readonly status: 'validated';
      readonly source: string;
      readonly config: ResolvedConfig;
      readonly report: ValidationReport;
    };

export interface ClusterConfigServiceOptions {
  readonly validation?: ValidationOptions;
  /** Templates rendered at once by renderMany / validateFiles */
  readonly concurrency?: number;
  readonly logger?: StructuredLogger;
}

// ============================================================================
// Service
// ============================================================================

/**
 * @example
 * ```typescript
 * const service = new ClusterConfigService();
 * const outcome = service.render({ variables: { region: 'us-east-1', ... } });
 * if (outcome.status === 'resolved' && outcome.report.valid) {
 *   await writeFile('cluster.ini', outcome.text);
 * }
 * ```
 */
export class ClusterConfigService {
  private readonly validation: ValidationOptions;
  private readonly concurrency: number;
  private readonly logger: StructuredLogger;

  constructor(options: ClusterConfigServiceOptions = {}) {
    this.validation = options.validation ?? {};
    this.concurrency = options.concurrency ?? getConfig().template.renderConcurrency;
    this.logger = options.logger ?? createModuleLogger('cluster-config-service');
  }

  /**
   * Render one template
   */
  render(request: RenderRequest): RenderOutcome {
    const builtin = request.template === undefined;
    const source = request.source ?? (builtin ? BUILTIN_TEMPLATE_PATH : INLINE_SOURCE);
    const text = request.template ?? loadBuiltinTemplate();
    const schema = request.schema ?? (builtin ? BUILTIN_TEMPLATE_VARIABLES : []);
    const startTime = Date.now();

    this.logger.renderStarted(source, { variableCount: Object.keys(request.variables).length });

    const bound = bind(request.variables, schema);
    if (!bound.ok) {
      this.logger.renderFailed(source, bound.error);
      return { status: 'bind-failed', source, error: bound.error };
    }

    const placeholders = resolve(bound.value.region ?? '', {
      customNode: bound.value.custom_node,
      customCookbook: bound.value.custom_cookbook,
    });
    // Explicit variables win over computed placeholders
    const context: VariableMap = { ...placeholderValues(placeholders), ...bound.value };

    const assembled = andThen(
      andThen(parseTemplate(text, source), document => selectBranches(document, context)),
      sections => assemble(context, sections, { source })
    );
    if (!assembled.ok) {
      this.logger.renderFailed(source, assembled.error);
      return { status: 'assemble-failed', source, error: assembled.error };
    }

    const report = validate(assembled.value, this.validation);
    this.logger.renderCompleted(source, Date.now() - startTime, assembled.value.sections.length, {
      valid: report.valid,
      errorCount: report.errors.length,
      warningCount: report.warnings.length,
    });

    return {
      status: 'resolved',
      source,
      config: assembled.value,
      text: formatConfig(assembled.value),
      report,
      variables: context,
    };
  }

  /**
   * Parse and validate an already-resolved configuration
   */
  validateText(text: string, source: string = INLINE_SOURCE): ValidateOutcome {
    const parsed = parseResolvedConfig(text, source);
    if (!parsed.ok) {
      this.logger.renderFailed(source, parsed.error);
      return { status: 'assemble-failed', source, error: parsed.error };
    }

    const report = validate(parsed.value, this.validation);
    this.logger.configValidated(source, {
      valid: report.valid,
      errorCount: report.errors.length,
      warningCount: report.warnings.length,
    });
    return { status: 'validated', source, config: parsed.value, report };
  }

  /**
   * Render a template file. Rejects with TemplateReadError when the file
   * cannot be read.
   */
  async renderFile(
    path: string,
    variables: VariableMap,
    schema?: readonly VariableSpec[]
  ): Promise<RenderOutcome> {
    const template = await readSource(path);
    return this.render({ template, source: path, variables, schema });
  }

  async validateFile(path: string): Promise<ValidateOutcome> {
    return this.validateText(await readSource(path), path);
  }

  /**
   * Render many requests with bounded concurrency. A failure is reported
   * for its own request only.
   */
  async renderMany(
    requests: readonly RenderRequest[],
    concurrency: number = this.concurrency
  ): Promise<Settled<RenderOutcome>[]> {
    return this.batch(requests, async request => this.render(request), concurrency);
  }

  /**
   * Validate many resolved files with bounded concurrency
   */
  async validateFiles(
    paths: readonly string[],
    concurrency: number = this.concurrency
  ): Promise<Settled<ValidateOutcome>[]> {
    return this.batch(paths, path => this.validateFile(path), concurrency);
  }

  private async batch<T, R extends { status: string }>(
    items: readonly T[],
    operation: (item: T) => Promise<R>,
    concurrency: number
  ): Promise<Settled<R>[]> {
    const startTime = Date.now();
    const outcomes = await parallelWithLimit(items, item => operation(item), concurrency);
    const failed = outcomes.filter(
      o => o.status === 'rejected' || (o.value.status !== 'resolved' && o.value.status !== 'validated')
    ).length;
    this.logger.batchCompleted(items.length, failed, Date.now() - startTime);
    return outcomes;
  }
}

async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new TemplateReadError(path, error instanceof Error ? error : new Error(String(error)));
  }
}
