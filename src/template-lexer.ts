import type {
  TplToken,
  TplTokenStreamLike,
  TplTokenType,
} from './types.js';

/**
 * Closing sequence for each opening tag sequence.
 */
const closers: Record<string, { close: string, type: Exclude<TplTokenType, 'text'> }> = {
  '{{': { close: '}}', type: 'var' },
  '{%': { close: '%}', type: 'block' },
  '{#': { close: '#}', type: 'comment' },
};

/**
 * Split a template source into tokens.
 *
 * Recognized tokens: `{{ ... }}` (var), `{% ... %}` (block), `{# ... #}` (comment),
 * everything else is text. An unterminated tag turns the rest of the input into a
 * single text token.
 *
 * @param tpl - Template source string.
 * @returns Token list in source order.
 */
export const tplTokenize = (tpl: string): TplToken[] => {
  const tokens: TplToken[] = [];
  const reToken = /\{\{|\{%|\{#/g;
  let idx = 0;
  while (idx < tpl.length) {
    reToken.lastIndex = idx;
    const m = reToken.exec(tpl);
    if (!m) {
      tokens.push({ type: 'text', contents: tpl.slice(idx), raw: tpl.slice(idx) });
      break;
    }
    const start = m.index;
    if (start > idx) {
      const text = tpl.slice(idx, start);
      tokens.push({ type: 'text', contents: text, raw: text });
    }
    const { close, type } = closers[m[0]];
    const end = tpl.indexOf(close, start + 2);
    if (end === -1) {
      // Unterminated tag: keep the rest as text
      const rest = tpl.slice(start);
      tokens.push({ type: 'text', contents: rest, raw: rest });
      break;
    }
    tokens.push({
      type,
      contents: tpl.slice(start + 2, end).trim(),
      raw: tpl.slice(start, end + 2),
    });
    idx = end + 2;
  }
  return tokens;
};

/**
 * Re-serialize a token to its original source text.
 *
 * @param token - Token to serialize.
 * @returns Source text, byte-for-byte as it was read.
 */
export const tplTokenToSource = (token: TplToken): string => token.raw;

/**
 * Re-serialize a token sequence to source text.
 *
 * @param tokens - Tokens to serialize.
 * @returns Concatenated source text.
 */
export const tplTokensToSource = (tokens: TplToken[]): string => tokens.map(tplTokenToSource).join('');

/**
 * First word of a block token, e.g. `phased` for `{% phased with a %}`.
 *
 * @param token - Token to inspect.
 * @returns Tag name, or undefined for non-block tokens.
 */
export const tplBlockName = (token: TplToken): string | undefined => {
  if (token.type !== 'block') return undefined;
  const m = /^\S+/.exec(token.contents);
  return m ? m[0] : undefined;
};

/**
 * Forward-only cursor over a token list.
 */
export class TplTokenStream implements TplTokenStreamLike {
  private pos = 0;

  constructor (private readonly tokens: TplToken[]) {}

  hasMore (): boolean {
    return this.pos < this.tokens.length;
  }

  next (): TplToken | undefined {
    const t = this.tokens[this.pos];
    if (t !== undefined) this.pos++;
    return t;
  }

  peek (): TplToken | undefined {
    return this.tokens[this.pos];
  }
}
