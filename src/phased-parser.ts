import type {
  TplToken,
  TplTokenStreamLike,
} from './types.js';

import {
  TemplateSyntaxError,
  UnclosedBlockError,
} from './errors.js';

import {
  tplBlockName,
} from './template-lexer.js';

/**
 * Consume the tokens of a deferred block without interpreting them.
 *
 * The stream must be positioned right after the `{% beginName %}` token.
 * Nested `beginName` blocks are balanced with a depth counter; the matching
 * `{% endName %}` is consumed but not returned.
 *
 * @param stream - Token stream.
 * @param beginName - Tag name opening a deferred block (e.g. `phased`).
 * @param endName - Tag name closing it (e.g. `endphased`).
 * @returns Tokens between the begin tag and its matching end tag.
 * @throws UnclosedBlockError if the stream ends before the matching end tag.
 */
export const tplCollectDeferred = (stream: TplTokenStreamLike, beginName: string, endName: string): TplToken[] => {
  const tokens: TplToken[] = [];
  let depth = 0;
  for (let token = stream.next(); token; token = stream.next()) {
    const name = tplBlockName(token);
    if (name === beginName) {
      depth++;
    } else if (name === endName) {
      depth--;
      if (depth < 0) return tokens;
    }
    tokens.push(token);
  }
  throw new UnclosedBlockError(beginName, endName);
};

/**
 * Parse the arguments of a `{% phased %}` tag: nothing, or `with` followed by
 * at least one variable name.
 *
 * @param tagName - Tag name used in error messages.
 * @param args - Words after the tag name.
 * @returns Requested variable names as written (quotes kept).
 * @throws TemplateSyntaxError on any other form.
 */
export const parsePhasedArgs = (tagName: string, args: string[]): string[] => {
  if (args.length === 0) return [];
  if (args[0] !== 'with') {
    throw new TemplateSyntaxError(`'${tagName}' tag requires the second argument to be 'with'.`, { tagName });
  }
  if (args.length === 1) {
    throw new TemplateSyntaxError(`'${tagName}' tag requires at least one context variable name.`, { tagName });
  }
  return args.slice(1);
};
