import type {
  Frame,
  TplCompareOp,
  TplExpr,
  TplIfNode,
  TplIfTest,
  TplNode,
  TplRenderFn,
  TplScopes,
} from './types.js';

import {
  tplEvalOperand,
  tplParseOperand,
  tplTruthy,
} from './template-runtime.js';

type Tok =
  | { t: 'lparen' | 'rparen' | 'and' | 'or' | 'not' }
  | { t: 'comp', v: TplCompareOp }
  | { t: 'operand', v: TplExpr };

const reTestToken = /\s*(?:(\(|\))|(&&|\|\|)|(==|!=|>=|<=|>|<)|(!|not\b)|('(?:\\.|[^'\\])*'|"(?:\\.|[^"\\])*"|[+-]?\d+(?:\.\d+)?|[A-Za-z_][\w.]*))/iy;

const compareOps: readonly string[] = [ '==', '!=', '>=', '<=', '>', '<' ];

const isCompareOp = (s: string): s is TplCompareOp => compareOps.includes(s);

/**
 * Split an if/elseif expression into tokens. Unknown characters are skipped.
 *
 * @param src - Raw test expression.
 * @returns Token list.
 */
const tplTokenizeTest = (src: string): Tok[] => {
  const tokens: Tok[] = [];
  let i = 0;
  while (i < src.length) {
    reTestToken.lastIndex = i;
    const m = reTestToken.exec(src);
    if (!m) {
      if (/^\s*$/.test(src.slice(i))) break;
      i++;
      continue;
    }
    i = reTestToken.lastIndex;
    if (m[1]) tokens.push({ t: m[1] === '(' ? 'lparen' : 'rparen' });
    else if (m[2]) tokens.push({ t: m[2] === '&&' ? 'and' : 'or' });
    else if (m[3] && isCompareOp(m[3])) tokens.push({ t: 'comp', v: m[3] });
    else if (m[4]) tokens.push({ t: 'not' });
    else {
      const operand = tplParseOperand(m[5]);
      if (operand) tokens.push({ t: 'operand', v: operand });
    }
  }
  return tokens;
};

/**
 * Parse an if/elseif test.
 *
 * Precedence: `!`/`not` > comparison > `&&` > `||`; parentheses group.
 * An empty or unusable expression yields a test that is always false.
 *
 * @param s - Raw test expression (e.g. `a`, `!a`, `a && b`, `x >= 10`).
 * @returns Parsed test AST.
 */
export const tplParseTest = (s: string): TplIfTest => {
  const tokens = tplTokenizeTest(s);
  let p = 0;

  const parseOr = (): TplIfTest | null => {
    const nodes: TplIfTest[] = [];
    for (;;) {
      const n = parseAnd();
      if (!n) break;
      nodes.push(n);
      if (tokens[p]?.t !== 'or') break;
      p++;
    }
    if (nodes.length === 0) return null;
    return nodes.length === 1 ? nodes[0] : { type: 'or', nodes };
  };

  const parseAnd = (): TplIfTest | null => {
    const nodes: TplIfTest[] = [];
    for (;;) {
      const n = parseUnary();
      if (!n) break;
      nodes.push(n);
      if (tokens[p]?.t !== 'and') break;
      p++;
    }
    if (nodes.length === 0) return null;
    return nodes.length === 1 ? nodes[0] : { type: 'and', nodes };
  };

  const parseUnary = (): TplIfTest | null => {
    if (tokens[p]?.t === 'not') {
      p++;
      const inner = parseUnary();
      return inner ? { type: 'not', node: inner } : null;
    }
    return parseCompare();
  };

  const parseCompare = (): TplIfTest | null => {
    const t = tokens[p];
    if (!t) return null;
    if (t.t === 'lparen') {
      p++;
      const inner = parseOr();
      if (tokens[p]?.t === 'rparen') p++;
      return inner;
    }
    if (t.t !== 'operand') return null;
    p++;
    const op = tokens[p];
    const right = tokens[p + 1];
    if (op?.t === 'comp' && right?.t === 'operand') {
      p += 2;
      return { type: 'compare', left: t.v, op: op.v, right: right.v };
    }
    return { type: 'operand', expr: t.v };
  };

  return parseOr() ?? { type: 'operand', expr: { kind: 'literal', value: false } };
};

/**
 * Compare two values. Equality coerces towards the right operand's type;
 * relational operators compare numerically when both sides are numeric,
 * otherwise as strings.
 *
 * @param left - Left value.
 * @param op - Comparison operator.
 * @param right - Right value.
 * @returns Result of the comparison.
 */
const tplCompare = (left: unknown, op: TplCompareOp, right: unknown): boolean => {
  const str = (v: unknown): string => (v === null || v === undefined) ? '' : String(v);
  if (op === '==' || op === '!=') {
    let eq: boolean;
    if (typeof right === 'number') eq = Number(left) === right;
    else if (typeof right === 'boolean') eq = Boolean(left) === right;
    else if (right === null) eq = left === null || left === undefined;
    else eq = str(left) === str(right);
    return op === '==' ? eq : !eq;
  }
  const ln = Number(left);
  const rn = Number(right);
  if (!Number.isNaN(ln) && !Number.isNaN(rn)) return tplOrder(ln, op, rn);
  return tplOrder(str(left), op, str(right));
};

const tplOrder = <T extends number | string>(a: T, op: TplCompareOp, b: T): boolean => {
  if (op === '>') return a > b;
  if (op === '<') return a < b;
  if (op === '>=') return a >= b;
  return a <= b;
};

/**
 * Evaluate a parsed test against the scope stack.
 *
 * @param t - Test AST node.
 * @param scopes - Scope stack.
 * @returns Whether the test holds.
 */
export const tplEvalTest = (t: TplIfTest, scopes: TplScopes): boolean => {
  switch (t.type) {
    case 'operand': return tplTruthy(tplEvalOperand(scopes, t.expr));
    case 'compare': return tplCompare(tplEvalOperand(scopes, t.left), t.op, tplEvalOperand(scopes, t.right));
    case 'not': return !tplEvalTest(t.node, scopes);
    case 'and': return t.nodes.every((n) => tplEvalTest(n, scopes));
    case 'or': return t.nodes.some((n) => tplEvalTest(n, scopes));
  }
};

/**
 * Open an `{% if %}` frame and push its first branch onto the node stack.
 *
 * @param expr - Raw if test expression.
 * @param nodesStack - Stack of node lists used to build nested AST structures.
 * @param controlStack - Stack of open control frames.
 */
export const tplParseIfOpen = (expr: string, nodesStack: TplNode[][], controlStack: Frame[]): void => {
  const nodes: TplNode[] = [];
  const node: TplIfNode = { type: 'if', branches: [ { test: tplParseTest(expr), nodes } ] };
  controlStack.push({ kind: 'if', node, parentNodes: nodesStack[nodesStack.length - 1], inAlternate: false });
  nodesStack.push(nodes);
};

/**
 * Handle `{% elseif %}` and `{% else %}`. Misplaced tokens (no open if, or
 * already in the else branch) are reported as not handled.
 *
 * @param expr - Test expression for elseif, or null for else.
 * @param nodesStack - Stack of node lists.
 * @param controlStack - Stack of open control frames.
 * @returns Whether the token was consumed as a branch switch.
 */
export const tplParseIfBranch = (expr: string | null, nodesStack: TplNode[][], controlStack: Frame[]): boolean => {
  const top = controlStack[controlStack.length - 1];
  if (top?.kind !== 'if' || top.inAlternate) return false;
  nodesStack.pop();
  const nodes: TplNode[] = [];
  if (expr === null) {
    top.node.alternate = nodes;
    top.inAlternate = true;
  } else {
    top.node.branches.push({ test: tplParseTest(expr), nodes });
  }
  nodesStack.push(nodes);
  return true;
};

/**
 * Render an `if` node: the first branch whose test holds, else the alternate.
 *
 * @param n - The AST node to render.
 * @param scopes - Scope stack used for key resolution.
 * @param renderNodes - Recursive renderer for child node lists.
 * @returns Rendered string output for this if node.
 */
export const tplRenderIfNode = (n: TplIfNode, scopes: TplScopes, renderNodes: TplRenderFn): string => {
  for (const br of n.branches) {
    if (tplEvalTest(br.test, scopes)) return renderNodes(br.nodes, scopes);
  }
  return n.alternate ? renderNodes(n.alternate, scopes) : '';
};
