import { createHash } from 'node:crypto';

import type {
  PhasedConfig,
  TemplateRenderer,
} from './phased-config.js';
import type { TplScopes } from './types.js';

import { resolveMarkers } from './second-pass.js';
import { tplStringify } from './template-runtime.js';

/**
 * Storage backend for cached fragments. Calls are synchronous; a backend may
 * throw, which the fragment cache treats as a miss.
 */
export interface FragmentCacheStore {
  get(key: string): string | undefined | null;
  set(key: string, value: string, ttlSeconds: number): void;
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process fragment store with per-entry expiry.
 */
export class MemoryFragmentCache implements FragmentCacheStore {
  private readonly entries = new Map<string, MemoryEntry>();

  /**
   * @param now - Clock in milliseconds, replaceable for tests.
   */
  constructor (private readonly now: () => number = Date.now) {}

  get (key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Store a value. A ttl of 0 or less stores nothing.
   */
  set (key: string, value: string, ttlSeconds: number): void {
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  delete (key: string): boolean {
    return this.entries.delete(key);
  }

  clear (): void {
    this.entries.clear();
  }

  get size (): number {
    return this.entries.size;
  }
}

/**
 * Cache key for a fragment: name plus a hash of its vary-by values.
 *
 * @param fragmentName - Fragment name.
 * @param varyArgs - Values the fragment varies on, in order.
 * @returns Cache key.
 */
export const fragmentCacheKey = (fragmentName: string, varyArgs: readonly unknown[]): string => {
  const joined = varyArgs.map((v) => encodeURIComponent(tplStringify(v))).join(':');
  return `phased.cache.${fragmentName}.${createHash('md5').update(joined).digest('hex')}`;
};

/**
 * Caches fragments as pre-second-pass text, so deferred blocks inside them
 * are rendered again on every request.
 */
export class FragmentCache {
  constructor (
    private readonly store: FragmentCacheStore,
    private readonly config: PhasedConfig,
    private readonly render: TemplateRenderer,
  ) {}

  /**
   * Return the fragment's text with its markers resolved.
   *
   * Hit: the cached text goes through the second pass. Miss: `renderFn`
   * produces the text, which is stored as-is and then goes through the
   * second pass. Store failures count as a miss and are logged.
   *
   * @param fragmentName - Fragment name.
   * @param varyArgs - Values the fragment varies on.
   * @param renderFn - Produces marker-bearing text on a miss.
   * @param ambient - Scopes for the second pass.
   * @param ttlSeconds - Lifetime of a new entry.
   * @returns Resolved fragment text.
   */
  getOrRender (
    fragmentName: string,
    varyArgs: readonly unknown[],
    renderFn: () => string,
    ambient: TplScopes,
    ttlSeconds: number,
  ): string {
    const key = fragmentCacheKey(fragmentName, varyArgs);
    const { logger } = this.config;
    let text = this.read(key);
    if (text === undefined) {
      logger.debug('phased: fragment cache miss', { fragment: fragmentName, key });
      text = renderFn();
      this.write(key, text, ttlSeconds);
    } else {
      logger.debug('phased: fragment cache hit', { fragment: fragmentName, key });
    }
    const result = resolveMarkers(text, ambient, this.config, this.render);
    if (this.config.strictSnapshots && result.errors.length > 0) throw result.errors[0];
    return result.output;
  }

  private read (key: string): string | undefined {
    try {
      return this.store.get(key) ?? undefined;
    } catch (err) {
      this.config.logger.warn('phased: fragment cache read failed, rendering fresh', { key, error: String(err) });
      return undefined;
    }
  }

  private write (key: string, value: string, ttlSeconds: number): void {
    try {
      this.store.set(key, value, ttlSeconds);
    } catch (err) {
      this.config.logger.warn('phased: fragment cache write failed', { key, error: String(err) });
    }
  }
}
