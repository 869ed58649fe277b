import type {
  Frame,
  TplFallbackLink,
  TplFilter,
  TplFilterArg,
  TplInterpNode,
  TplNode,
  TplParseOptions,
  TplScopes,
  TplTokenStreamLike,
} from './types.js';

import {
  UnclosedBlockError,
} from './errors.js';

import {
  escapeHtml,
} from './html-utils.js';

import {
  tplBlockName,
  tplTokenize,
  TplTokenStream,
} from './template-lexer.js';

import {
  tplParseIfBranch,
  tplParseIfOpen,
  tplRenderIfNode,
} from './template-if.js';

import {
  tplParseEach,
  tplParseEnd,
  tplRenderEachNode,
} from './template-each.js';

import {
  tplEmptyish,
  tplEvalOperand,
  tplIsIdentifier,
  tplParseLiteral,
  tplParseOperand,
  tplResolveKey,
  tplStringify,
} from './template-runtime.js';

import {
  applyTemplateFilters,
} from './template-filters.js';

/**
 * Split `src` on any of `seps` outside of single/double quoted strings.
 * Longer separators must come first in `seps`.
 *
 * @param src - Source text.
 * @param seps - Separators to split on.
 * @returns Trimmed parts and the separator found between each pair of parts.
 */
export const tplSplitTopLevel = (src: string, seps: string[]): { parts: string[], seps: string[] } => {
  const parts: string[] = [];
  const found: string[] = [];
  let buf = '';
  let inQ: string | null = null;
  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (inQ) {
      buf += ch;
      if (ch === '\\' && i + 1 < src.length) {
        buf += src[++i];
      } else if (ch === inQ) {
        inQ = null;
      }
      continue;
    }
    if (ch === '"' || ch === '\'') {
      inQ = ch;
      buf += ch;
      continue;
    }
    const sep = seps.find((s) => src.startsWith(s, i));
    if (sep) {
      parts.push(buf.trim());
      found.push(sep);
      buf = '';
      i += sep.length - 1;
      continue;
    }
    buf += ch;
  }
  parts.push(buf.trim());
  return { parts, seps: found };
};

/**
 * Split tag arguments on whitespace, keeping quoted words (with their quotes) intact.
 *
 * @param src - Argument source text.
 * @returns Argument words.
 */
export const tplSplitArgs = (src: string): string[] => {
  return src.match(/"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'|\S+/g) ?? [];
};

/**
 * Parse a single filter call such as `replace('a', 'b')`.
 *
 * @param src - Filter source text.
 * @returns Parsed filter or null if unsupported.
 */
const tplParseFilter = (src: string): TplFilter | null => {
  const mFn = /^(\w+)\s*(?:\(([\s\S]*)\))?$/.exec(src);
  if (!mFn) return null;
  const f: TplFilter = { name: mFn[1] };
  if (mFn[2] && mFn[2].trim().length > 0) {
    const args: TplFilterArg[] = [];
    for (const a of tplSplitTopLevel(mFn[2], [ ',' ]).parts) {
      const parsed = tplParseLiteral(a);
      if (parsed !== undefined) args.push(parsed);
    }
    f.args = args;
  }
  return f;
};

/**
 * Parse the inside of an interpolation token.
 *
 * Supported: `key`, `= key` (escaped), `- key` (raw), fallback chains with
 * `||` / `??`, and a filter pipeline after the first single `|`.
 *
 * @param inner - Token contents without `{{` / `}}`.
 * @returns Interpolation node, or null if not a supported interpolation.
 */
export const tplParseInterp = (inner: string): TplInterpNode | null => {
  const mode: TplInterpNode['mode'] = inner.startsWith('-') ? 'raw' : 'escape';
  const expr = /^[-=]/.test(inner) ? inner.slice(1) : inner;
  const { parts, seps } = tplSplitTopLevel(expr, [ '||', '??', '|' ]);
  let filterAt = seps.indexOf('|');
  if (filterAt === -1) filterAt = seps.length;

  const key = parts[0];
  if (!tplIsIdentifier(key)) return null;
  const node: TplInterpNode = { type: 'interp', key, mode };

  const chain: TplFallbackLink[] = [];
  for (let i = 1; i <= filterAt; i++) {
    const right = tplParseOperand(parts[i]);
    if (!right) {
      // unsupported operand: ignore the whole chain
      chain.length = 0;
      break;
    }
    chain.push({ op: seps[i - 1] === '??' ? 'nullish' : 'or', right });
  }
  if (chain.length > 0) node.fallbackChain = chain;

  const filters: TplFilter[] = [];
  for (const fp of parts.slice(filterAt + 1)) {
    const f = tplParseFilter(fp);
    if (f) filters.push(f);
  }
  if (filters.length > 0) node.filters = filters;
  return node;
};

/**
 * Close every open control frame, attaching its node to its parent list.
 *
 * @param nodesStack - Stack of node lists.
 * @param controlStack - Stack of open control frames.
 */
const tplCloseFrames = (nodesStack: TplNode[][], controlStack: Frame[]): void => {
  for (let top = controlStack.at(-1); top; top = controlStack.at(-1)) {
    tplParseEnd(top.kind, nodesStack, controlStack);
  }
};

/**
 * Parse tokens from a stream into nodes.
 *
 * Without `until`, parsing runs to the end of the stream. With `until`, it
 * stops after the `{% until.endName %}` token and throws UnclosedBlockError
 * if the stream ends first.
 *
 * @param stream - Token stream.
 * @param options - Parse options (registered tags).
 * @param until - Optional terminator of the enclosing tag.
 * @returns AST node list.
 */
export const tplParseTokens = (
  stream: TplTokenStreamLike,
  options: TplParseOptions,
  until?: { tagName: string, endName: string },
): TplNode[] => {
  const root: TplNode[] = [];
  const nodesStack: TplNode[][] = [ root ];
  const controlStack: Frame[] = [];
  const push = (n: TplNode): void => {
    nodesStack[nodesStack.length - 1].push(n);
  };

  for (let token = stream.next(); token; token = stream.next()) {
    if (token.type === 'text') {
      push({ type: 'text', value: token.contents });
      continue;
    }
    if (token.type === 'comment') continue;
    if (token.type === 'var') {
      push(tplParseInterp(token.contents) ?? { type: 'text', value: token.raw });
      continue;
    }

    const raw = token.contents;
    const name = tplBlockName(token) ?? '';
    if (until && name === until.endName) {
      tplCloseFrames(nodesStack, controlStack);
      return root;
    }
    const rest = raw.slice(name.length).trim();
    const lower = name.toLowerCase();
    let handled = true;
    if (raw.startsWith('#')) {
      // Inline comment: no output
    } else if (lower === 'if' && rest) {
      tplParseIfOpen(rest, nodesStack, controlStack);
    } else if (lower === 'elseif' && rest) {
      handled = tplParseIfBranch(rest, nodesStack, controlStack);
    } else if (lower === 'else' && !rest) {
      handled = tplParseIfBranch(null, nodesStack, controlStack);
    } else if (lower === 'endif' && !rest) {
      handled = tplParseEnd('if', nodesStack, controlStack);
    } else if (lower === 'each') {
      handled = tplParseEach(raw, nodesStack, controlStack);
    } else if (lower === 'endeach' && !rest) {
      handled = tplParseEnd('each', nodesStack, controlStack);
    } else {
      const tag = options.tags?.get(name);
      if (tag) {
        push(tag(tplSplitArgs(rest), {
          stream,
          parseUntil: (endName) => tplParseTokens(stream, options, { tagName: name, endName }),
        }));
      } else {
        handled = false;
      }
    }
    // Unknown or misplaced control -> keep literal
    if (!handled) push({ type: 'text', value: token.raw });
  }

  if (until) throw new UnclosedBlockError(until.tagName, until.endName);
  tplCloseFrames(nodesStack, controlStack);
  return root;
};

/**
 * Parse a template string to an AST.
 *
 * Recognized syntax:
 * - Interpolations: {{ key }}, {{= key }} (escaped), {{- key }} (raw)
 * - Controls: {% if test %}, {% elseif test %}, {% else %}, {% endif %}
 *             {% each listExpr as var %}, {% endeach %}
 * - Comments: {# ... #}, {% # ... %}
 * - Block tags registered through `options.tags`
 *
 * Misplaced/invalid control tokens are preserved verbatim as text. Block tags
 * may throw (e.g. TemplateSyntaxError, UnclosedBlockError).
 *
 * @param tpl - Template source string.
 * @param options - Parse options.
 * @returns AST node list representing the parsed template.
 */
export const tplParse = (tpl: string, options: TplParseOptions = {}): TplNode[] => {
  return tplParseTokens(new TplTokenStream(tplTokenize(tpl)), options);
};

/**
 * Render a list of nodes with the provided scope stack.
 *
 * Evaluation order for interpolations:
 * 1) Resolve primary key
 * 2) Apply fallback chain (|| and ??) left-to-right
 * 3) Apply filter pipeline in order
 * 4) Stringify the value
 * 5) Escape HTML unless mode === 'raw'
 *
 * @param nodes - AST node list to render.
 * @param scopes - Scope stack used for key resolution.
 * @returns Rendered string output.
 */
export const tplRenderNodes = (nodes: TplNode[], scopes: TplScopes): string => {
  let out = '';
  for (const n of nodes) {
    if (n.type === 'text') {
      out += n.value;
    } else if (n.type === 'interp') {
      let val = tplResolveKey(scopes, n.key);
      for (const fb of n.fallbackChain ?? []) {
        const replace = fb.op === 'or' ? tplEmptyish(val) : (val === null || val === undefined);
        if (replace) val = tplEvalOperand(scopes, fb.right);
      }
      val = applyTemplateFilters(val, n.filters);
      const str = tplStringify(val);
      out += (n.mode === 'raw') ? str : escapeHtml(str);
    } else if (n.type === 'if') {
      out += tplRenderIfNode(n, scopes, tplRenderNodes);
    } else if (n.type === 'each') {
      out += tplRenderEachNode(n, scopes, tplRenderNodes);
    } else {
      out += n.render(scopes, tplRenderNodes);
    }
  }
  return out;
};
