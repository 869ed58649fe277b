import { z } from 'zod';

import type { FragmentCacheStore } from './fragment-cache.js';
import type { PhasedLogger } from './logger.js';
import type { TplScopes } from './types.js';

import { silentLogger } from './logger.js';
import { tplLookupName } from './template-runtime.js';

/**
 * Renders template source against a scope stack. Errors propagate unchanged.
 */
export type TemplateRenderer = (content: string, scopes: TplScopes) => string;

/**
 * Supplies a fresh value for a re-fetched name at second pass.
 * Returning undefined leaves the name unset.
 */
export type TokenProvider = (name: string, ambient: TplScopes) => unknown;

/**
 * Default marker delimiter. Deployments should pick their own value that
 * cannot occur in rendered output.
 */
export const DEFAULT_DELIMITER = '\u0002phased:7b1c44e09d\u0003';

export const DEFAULT_REFETCH_NAMES: readonly string[] = [ 'csrf_token' ];

/**
 * Resolved configuration shared by parser, scanner and fragment cache.
 */
export interface PhasedConfig {
  /** Sentinel string bounding marker sections. */
  readonly delimiter: string;
  /** Capture the whole context for every deferred block. */
  readonly keepContext: boolean;
  /** Names never serialized into snapshots, re-fetched at second pass. */
  readonly refetchNames: readonly string[];
  readonly tokenProvider: TokenProvider;
  /** Maximum nesting of markers resolved within markers. */
  readonly maxDepth: number;
  /** Throw on malformed snapshots after the rest of the text is resolved. */
  readonly strictSnapshots: boolean;
  readonly logger: PhasedLogger;
  /** Render collaborator for deferred content; the engine's own parser when unset. */
  readonly renderer?: TemplateRenderer;
  /** Fragment cache backend; an in-memory store when unset. */
  readonly cacheStore?: FragmentCacheStore;
}

export type PhasedOptions = Partial<PhasedConfig>;

const phasedOptionsSchema = z.object({
  delimiter: z.string().min(1, 'delimiter must not be empty').optional(),
  keepContext: z.boolean().optional(),
  refetchNames: z.array(z.string().min(1)).optional(),
  maxDepth: z.number().int().positive().optional(),
  strictSnapshots: z.boolean().optional(),
});

/**
 * Look the name up in the ambient scopes; lazy values (functions) are called.
 */
export const defaultTokenProvider: TokenProvider = (name, ambient) => {
  const r = tplLookupName(ambient, name);
  if (!r.found) return undefined;
  const v = r.value;
  return typeof v === 'function' ? v() : v;
};

/**
 * Validate options and fill in defaults.
 *
 * @param options - Partial configuration.
 * @returns Frozen configuration object.
 * @throws TypeError if a scalar option is invalid.
 */
export function createPhasedConfig (options: PhasedOptions = {}): PhasedConfig {
  const parsed = phasedOptionsSchema.safeParse({
    delimiter: options.delimiter,
    keepContext: options.keepContext,
    refetchNames: options.refetchNames,
    maxDepth: options.maxDepth,
    strictSnapshots: options.strictSnapshots,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TypeError(`Invalid phased option '${issue.path.join('.')}': ${issue.message}`);
  }
  const o = parsed.data;
  return Object.freeze({
    delimiter: o.delimiter ?? DEFAULT_DELIMITER,
    keepContext: o.keepContext ?? false,
    refetchNames: Object.freeze([ ...(o.refetchNames ?? DEFAULT_REFETCH_NAMES) ]),
    tokenProvider: options.tokenProvider ?? defaultTokenProvider,
    maxDepth: o.maxDepth ?? 16,
    strictSnapshots: o.strictSnapshots ?? false,
    logger: options.logger ?? silentLogger,
    renderer: options.renderer,
    cacheStore: options.cacheStore,
  });
}
