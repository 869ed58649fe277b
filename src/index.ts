/*!
 * phased-template
 *
 * Two-pass string templates: render and cache a page once, then fill in the
 * per-request `{% phased %}` blocks in a second pass.
 *
 * Copyright (c) 2025-2026 cryeffect Media Group <https://crymg.de>, Peter Müller
 * Licensed under the MIT License.
 */

import {
  tplParse,
  tplRenderNodes,
} from './template-parser.js';

export {
  tplParse,
  tplRenderNodes,
} from './template-parser.js';

export {
  tplTokenize,
  tplTokensToSource,
  TplTokenStream,
} from './template-lexer.js';

export {
  escapeHtml,
} from './html-utils.js';

export {
  registerTemplateFilter,
} from './template-filters.js';

export {
  PhasedTemplateEngine,
} from './phased-engine.js';

export {
  createPhasedConfig,
  DEFAULT_DELIMITER,
  DEFAULT_REFETCH_NAMES,
} from './phased-config.js';

export type {
  PhasedConfig,
  PhasedOptions,
  TemplateRenderer,
  TokenProvider,
} from './phased-config.js';

export {
  captureSnapshot,
  deserializeSnapshot,
  serializeSnapshot,
} from './snapshot.js';

export type {
  ContextSnapshot,
  SnapshotValue,
} from './snapshot.js';

export { emitMarker } from './marker.js';
export { tplCollectDeferred } from './phased-parser.js';
export { resolveMarkers } from './second-pass.js';
export type { SecondPassResult } from './second-pass.js';

export {
  fragmentCacheKey,
  FragmentCache,
  MemoryFragmentCache,
} from './fragment-cache.js';

export type { FragmentCacheStore } from './fragment-cache.js';

export {
  createConsoleLogger,
  silentLogger,
} from './logger.js';

export type {
  LogLevel,
  PhasedLogger,
} from './logger.js';

export {
  MalformedSnapshotError,
  PhasedError,
  PhasedErrorCode,
  TemplateSyntaxError,
  UnclosedBlockError,
  UnknownVariableError,
  UnserializableValueError,
} from './errors.js';

export type {
  TemplateFilterHandler,
  TplNode,
  TplScopes,
  TplTagParser,
  TplToken,
} from './types.js';

/**
 * Render a template in a single pass using the provided data as the root scope.
 * Data objects are merged left to right, so later objects override
 * properties of earlier ones. No phased tags are registered here.
 *
 * Malformed or misplaced control tokens are preserved as text - no throws.
 *
 * @param tpl - Template string.
 * @param data - Data objects for the root scope.
 * @returns Rendered string.
 */
export function renderTemplate (tpl: string, ...data: Record<string, unknown>[]): string {
  return tplRenderNodes(tplParse(tpl), data);
}
