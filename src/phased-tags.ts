import type { FragmentCache } from './fragment-cache.js';
import type { PhasedConfig } from './phased-config.js';
import type {
  TplScopes,
  TplTagParser,
} from './types.js';

import { TemplateSyntaxError } from './errors.js';
import { emitMarker } from './marker.js';
import {
  parsePhasedArgs,
  tplCollectDeferred,
} from './phased-parser.js';
import {
  captureSnapshot,
  unquoteName,
} from './snapshot.js';
import { tplTokensToSource } from './template-lexer.js';
import {
  tplEvalOperand,
  tplParseOperand,
  tplResolveKey,
} from './template-runtime.js';

export const PHASED_TAG = 'phased';
export const PHASED_END_TAG = 'endphased';
export const PHASED_CACHE_TAG = 'phasedcache';
export const PHASED_CACHE_END_TAG = 'endphasedcache';

/**
 * `{% phased [with name ...] %}...{% endphased %}`
 *
 * The block's source is kept verbatim (nested phased blocks included) and
 * emitted as a marker together with a snapshot of the requested variables.
 * Without names, the whole context is kept when `keepContext` is enabled;
 * with names, exactly those are kept.
 *
 * @param config - Phased configuration.
 * @returns Tag parser.
 */
export const createPhasedTag = (config: PhasedConfig): TplTagParser => (args, api) => {
  const requested = parsePhasedArgs(PHASED_TAG, args);
  const literal = tplTokensToSource(tplCollectDeferred(api.stream, PHASED_TAG, PHASED_END_TAG));
  const keepWhole = config.keepContext && requested.length === 0;
  return {
    type: 'tag',
    render: (scopes) => emitMarker(literal, captureSnapshot(scopes, requested, keepWhole, config), config),
  };
};

/**
 * Resolve the expiry argument of `phasedcache` to whole seconds.
 */
const resolveExpire = (arg: string, scopes: TplScopes): number => {
  const operand = tplParseOperand(arg);
  const value = operand ? tplEvalOperand(scopes, operand) : undefined;
  const seconds = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof seconds !== 'number' || !Number.isInteger(seconds)) {
    throw new TemplateSyntaxError(`'${PHASED_CACHE_TAG}' tag got a non-integer timeout value: '${arg}'`, { expire: arg });
  }
  return seconds;
};

/**
 * `{% phasedcache expire fragment_name [vary ...] %}...{% endphasedcache %}`
 *
 * The body is parsed normally. Its first-pass output (markers included) is
 * cached under the fragment name and vary values; deferred blocks in it are
 * resolved against the current context on every render.
 *
 * @param fragmentCache - Fragment cache wrapper.
 * @returns Tag parser.
 */
export const createPhasedCacheTag = (fragmentCache: FragmentCache): TplTagParser => (args, api) => {
  if (args.length < 2) {
    throw new TemplateSyntaxError(`'${PHASED_CACHE_TAG}' tag requires at least 2 arguments.`, { args });
  }
  const [ expireArg, nameArg, ...varyNames ] = args;
  const fragmentName = unquoteName(nameArg).name;
  const nodes = api.parseUntil(PHASED_CACHE_END_TAG);
  return {
    type: 'tag',
    render: (scopes, renderNodes) => {
      const ttl = resolveExpire(expireArg, scopes);
      const vary = varyNames.map((n) => tplResolveKey(scopes, n));
      return fragmentCache.getOrRender(fragmentName, vary, () => renderNodes(nodes, scopes), scopes, ttl);
    },
  };
};
