/**
 * Section Catalog
 * @module catalog/section-catalog
 *
 * Known section kinds, whether they take a label, and the keys each kind
 * defines. Loaded once from data/section-catalog.json and validated with zod.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors/domain.js';
import { getErrorMessage } from '../errors/base.js';
import { ConfigErrorCodes } from '../errors/codes.js';

const CATALOG_URL = new URL('../../data/section-catalog.json', import.meta.url);

const SectionKindSchema = z.object({
  labelled: z.boolean(),
  keys: z.array(z.string().min(1)),
});

const CatalogSchema = z.object({
  sections: z.record(SectionKindSchema),
});

export interface SectionKindInfo {
  readonly labelled: boolean;
  readonly keys: ReadonlySet<string>;
}

export class SectionCatalog {
  private readonly kinds: ReadonlyMap<string, SectionKindInfo>;

  constructor(kinds: ReadonlyMap<string, SectionKindInfo>) {
    this.kinds = kinds;
  }

  isKnownKind(kind: string): boolean {
    return this.kinds.has(kind);
  }

  /**
   * Whether a kind requires a label. Unknown kinds accept either form.
   */
  labelRule(kind: string): 'required' | 'forbidden' | 'optional' {
    const info = this.kinds.get(kind);
    if (!info) {
      return 'optional';
    }
    return info.labelled ? 'required' : 'forbidden';
  }

  /**
   * Whether `key` is defined for `kind`; unknown kinds define nothing
   */
  isKnownKey(kind: string, key: string): boolean {
    return this.kinds.get(kind)?.keys.has(key) ?? false;
  }

  get kindNames(): string[] {
    return [...this.kinds.keys()];
  }
}

/**
 * Build a catalog from its JSON form
 */
export function parseSectionCatalog(raw: unknown): SectionCatalog {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'section-catalog',
      `Invalid section catalog: ${result.error.message}`,
      {},
      ConfigErrorCodes.CATALOG_ERROR
    );
  }

  const kinds = new Map<string, SectionKindInfo>();
  for (const [kind, info] of Object.entries(result.data.sections)) {
    kinds.set(kind, { labelled: info.labelled, keys: new Set(info.keys) });
  }
  return new SectionCatalog(kinds);
}

let catalogInstance: SectionCatalog | null = null;

/**
 * The packaged catalog, read on first use
 */
export function getSectionCatalog(): SectionCatalog {
  if (!catalogInstance) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(CATALOG_URL, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        'section-catalog',
        `Failed to read section catalog: ${getErrorMessage(error)}`,
        {},
        ConfigErrorCodes.CATALOG_ERROR
      );
    }
    catalogInstance = parseSectionCatalog(raw);
  }
  return catalogInstance;
}
