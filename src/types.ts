/**
 * Token kinds produced by the lexer.
 * - text: plain text between tags
 * - var: `{{ ... }}` interpolation
 * - block: `{% ... %}` control or tag
 * - comment: `{# ... #}` comment
 */
export type TplTokenType = 'text' | 'var' | 'block' | 'comment';

/**
 * A single lexer token.
 */
export interface TplToken {
  type: TplTokenType;
  /** Inner contents without delimiters, trimmed (text tokens: the text itself). */
  contents: string;
  /** Exact source slice the token was read from. */
  raw: string;
}

/**
 * Scope stack used during rendering; the last entry is the innermost scope.
 */
export type TplScopes = Record<string, unknown>[];

/**
 * Plain text node: rendered verbatim.
 */
export interface TplTextNode {
  type: 'text';
  value: string;
}

/**
 * Interpolation node for inserting values from scope.
 * - key: Identifier or dot-path (e.g. "user.name").
 * - mode:
 *   - 'escape': HTML-escape the string value (default)
 *   - 'raw': insert the string value as-is
 * - fallbackChain: `||` replaces empty-ish values, `??` replaces nullish values only
 * - filters: pipeline applied after fallback resolution and before final escaping
 */
export interface TplInterpNode {
  type: 'interp';
  key: string;
  mode: 'escape' | 'raw';
  fallbackChain?: TplFallbackLink[];
  filters?: TplFilter[];
}

export interface TplFallbackLink {
  op: 'or' | 'nullish';
  right: TplExpr;
}

export type TplFilterArg = string | number | boolean | null;

export interface TplFilter {
  /** Name of a registered filter; unknown names are skipped at render time. */
  name: string;
  args?: TplFilterArg[];
}

/**
 * Filter implementation: receives the current value and parsed arguments.
 */
export type TemplateFilterHandler = (value: unknown, args?: TplFilterArg[]) => unknown;

export type TplCompareOp = '==' | '!=' | '>' | '<' | '>=' | '<=';

export interface TplExprKey {
  kind: 'key';
  key: string;
}

export interface TplExprLiteral {
  kind: 'literal';
  value: TplFilterArg;
}

/**
 * Operand of a comparison or fallback: another key or a literal.
 */
export type TplExpr = TplExprKey | TplExprLiteral;

export type TplIfTest =
  | { type: 'operand', expr: TplExpr }
  | { type: 'compare', left: TplExpr, op: TplCompareOp, right: TplExpr }
  | { type: 'and', nodes: TplIfTest[] }
  | { type: 'or', nodes: TplIfTest[] }
  | { type: 'not', node: TplIfTest };

export interface TplIfBranch {
  test: TplIfTest;
  nodes: TplNode[];
}

/**
 * If control node: ordered branches (if + elseifs) and optional else branch.
 */
export interface TplIfNode {
  type: 'if';
  branches: TplIfBranch[];
  alternate?: TplNode[];
}

/**
 * Each control node iterating over an array or the own keys of an object.
 */
export interface TplEachNode {
  type: 'each';
  /** Identifier/dot-path resolving to an Array or an Object. */
  listExpr: string;
  /** Loop variable: the item for arrays, `{ key, value }` for objects. */
  varName: string;
  /** Optional name for the zero-based index (arrays only). */
  indexVarName?: string;
  children: TplNode[];
}

/**
 * Renders a node list against a scope stack.
 */
export type TplRenderFn = (nodes: TplNode[], scopes: TplScopes) => string;

/**
 * Node produced by a registered block tag. The tag owns its rendering.
 */
export interface TplTagNode {
  type: 'tag';
  render: (scopes: TplScopes, renderNodes: TplRenderFn) => string;
}

/** Union of all AST node types. */
export type TplNode = TplTextNode | TplInterpNode | TplIfNode | TplEachNode | TplTagNode;

/**
 * Helpers handed to a tag parser.
 */
export interface TplTagParseApi {
  /** Remaining tokens, positioned right after the tag token. */
  stream: TplTokenStreamLike;
  /**
   * Parse nested nodes up to the matching `{% endName %}` (consumed).
   * Throws UnclosedBlockError if the stream ends first.
   */
  parseUntil: (endName: string) => TplNode[];
}

/**
 * Parses one occurrence of a registered block tag.
 *
 * @param args - Tag arguments, i.e. the words after the tag name.
 */
export type TplTagParser = (args: string[], api: TplTagParseApi) => TplNode;

/**
 * Minimal token stream contract used by tag parsers.
 */
export interface TplTokenStreamLike {
  hasMore: () => boolean;
  next: () => TplToken | undefined;
  peek: () => TplToken | undefined;
}

export interface TplParseOptions {
  /** Block tags by name, in addition to the built-in control structures. */
  tags?: ReadonlyMap<string, TplTagParser>;
}

/**
 * Internal parser frame for an open if block.
 */
export interface IfFrame {
  kind: 'if';
  node: TplIfNode;
  parentNodes: TplNode[];
  inAlternate: boolean;
}

/**
 * Internal parser frame for an open each block.
 */
export interface EachFrame {
  kind: 'each';
  node: TplEachNode;
  parentNodes: TplNode[];
}

export type Frame = IfFrame | EachFrame;
