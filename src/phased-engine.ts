import type {
  PhasedConfig,
  PhasedOptions,
  TemplateRenderer,
} from './phased-config.js';
import type { SecondPassResult } from './second-pass.js';
import type {
  TplNode,
  TplTagParser,
} from './types.js';

import {
  FragmentCache,
  MemoryFragmentCache,
} from './fragment-cache.js';
import { createPhasedConfig } from './phased-config.js';
import {
  createPhasedCacheTag,
  createPhasedTag,
  PHASED_CACHE_TAG,
  PHASED_TAG,
} from './phased-tags.js';
import { resolveMarkers } from './second-pass.js';
import {
  tplParse,
  tplRenderNodes,
} from './template-parser.js';

/**
 * Template engine with deferred (`phased`) and cache-aware (`phasedcache`) blocks.
 *
 * Data objects passed to the render methods form the scope stack: later
 * objects override properties of earlier ones.
 *
 * @example
 * ```ts
 * const engine = new PhasedTemplateEngine({ delimiter: '@@PHASED@@' });
 * const cacheable = engine.renderFirstPass('Hi{% phased %} {{ user }}{% endphased %}!', {});
 * // ...store `cacheable`, later per request:
 * engine.resolve(cacheable, { user: 'Ada' }); // 'Hi Ada!'
 * ```
 */
export class PhasedTemplateEngine {
  readonly config: PhasedConfig;
  readonly fragmentCache: FragmentCache;
  private readonly tags: ReadonlyMap<string, TplTagParser>;
  private readonly renderer: TemplateRenderer;

  constructor (options: PhasedOptions = {}) {
    this.config = createPhasedConfig(options);
    this.renderer = this.config.renderer ?? ((content, scopes) => tplRenderNodes(this.parse(content), scopes));
    this.fragmentCache = new FragmentCache(this.config.cacheStore ?? new MemoryFragmentCache(), this.config, this.renderer);
    this.tags = new Map([
      [ PHASED_TAG, createPhasedTag(this.config) ],
      [ PHASED_CACHE_TAG, createPhasedCacheTag(this.fragmentCache) ],
    ]);
  }

  /**
   * Parse a template with the phased tags registered.
   *
   * @param tpl - Template source.
   * @returns AST node list.
   */
  parse (tpl: string): TplNode[] {
    return tplParse(tpl, { tags: this.tags });
  }

  /**
   * First pass: render everything except deferred blocks, which become markers.
   *
   * @param tpl - Template source.
   * @param data - Scope objects.
   * @returns Marker-bearing text.
   */
  renderFirstPass (tpl: string, ...data: Record<string, unknown>[]): string {
    return tplRenderNodes(this.parse(tpl), data);
  }

  /**
   * Second pass, reporting malformed snapshots instead of throwing.
   *
   * @param text - Marker-bearing text.
   * @param ambient - Request-level scope objects.
   * @returns Output and snapshot errors.
   */
  resolveDetailed (text: string, ...ambient: Record<string, unknown>[]): SecondPassResult {
    return resolveMarkers(text, ambient, this.config, this.renderer);
  }

  /**
   * Second pass: replace every marker with its rendered content.
   *
   * @param text - Marker-bearing text.
   * @param ambient - Request-level scope objects.
   * @returns Final output.
   * @throws MalformedSnapshotError when `strictSnapshots` is set and a marker is corrupt.
   */
  resolve (text: string, ...ambient: Record<string, unknown>[]): string {
    const { output, errors } = this.resolveDetailed(text, ...ambient);
    if (this.config.strictSnapshots && errors.length > 0) throw errors[0];
    return output;
  }

  /**
   * Both passes with the same data as first-pass context and ambient context.
   *
   * @param tpl - Template source.
   * @param data - Scope objects.
   * @returns Final output.
   */
  render (tpl: string, ...data: Record<string, unknown>[]): string {
    return this.resolve(this.renderFirstPass(tpl, ...data), ...data);
  }

  /**
   * Cache-aware fragment rendering outside of templates.
   *
   * @param fragmentName - Fragment name.
   * @param varyArgs - Values the fragment varies on.
   * @param renderFn - Produces marker-bearing text on a cache miss.
   * @param ambient - Request-level scope objects.
   * @param ttlSeconds - Lifetime of a new cache entry.
   * @returns Resolved fragment text.
   */
  getOrRenderFragment (
    fragmentName: string,
    varyArgs: readonly unknown[],
    renderFn: () => string,
    ambient: Record<string, unknown>[],
    ttlSeconds: number,
  ): string {
    return this.fragmentCache.getOrRender(fragmentName, varyArgs, renderFn, ambient, ttlSeconds);
  }
}
