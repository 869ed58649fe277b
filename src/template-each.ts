import type {
  Frame,
  TplEachNode,
  TplNode,
  TplRenderFn,
  TplScopes,
} from './types.js';

import {
  tplResolveKey,
} from './template-runtime.js';

/**
 * Parse an `{% each listExpr as var[, i] %}` token and open its frame.
 *
 * @param raw - Inner control token contents (without `{%` / `%}`).
 * @param nodesStack - Stack of node lists used to build nested AST structures.
 * @param controlStack - Stack of open control frames.
 * @returns False on syntax errors, so the caller keeps the token as text.
 */
export const tplParseEach = (raw: string, nodesStack: TplNode[][], controlStack: Frame[]): boolean => {
  const mEach = /^each\s+(.+?)\s+as\s+([A-Za-z_]\w*)(?:\s*,\s*([A-Za-z_]\w*))?$/i.exec(raw);
  if (!mEach) return false;
  const node: TplEachNode = {
    type: 'each',
    listExpr: mEach[1].trim(),
    varName: mEach[2],
    children: [],
  };
  if (mEach[3]) node.indexVarName = mEach[3];
  controlStack.push({ kind: 'each', node, parentNodes: nodesStack[nodesStack.length - 1] });
  nodesStack.push(node.children);
  return true;
};

/**
 * Close the innermost open control frame if it is of the given kind.
 *
 * @param kind - Expected frame kind.
 * @param nodesStack - Stack of node lists.
 * @param controlStack - Stack of open control frames.
 * @returns False if misplaced, so the caller keeps the token as text.
 */
export const tplParseEnd = (kind: Frame['kind'], nodesStack: TplNode[][], controlStack: Frame[]): boolean => {
  const top = controlStack[controlStack.length - 1];
  if (top?.kind !== kind) return false;
  controlStack.pop();
  nodesStack.pop();
  top.parentNodes.push(top.node);
  return true;
};

/**
 * Render an `each` node:
 * - Arrays: expose item as `varName` and optional index as `indexVarName`.
 * - Objects: iterate own keys and expose `{ key, value }` as `varName`.
 *
 * @param n - The AST node to render.
 * @param scopes - Scope stack used for key resolution.
 * @param renderNodes - Recursive renderer for child node lists.
 * @returns Rendered string output for this loop node.
 */
export const tplRenderEachNode = (n: TplEachNode, scopes: TplScopes, renderNodes: TplRenderFn): string => {
  const v = tplResolveKey(scopes, n.listExpr);
  let out = '';
  if (Array.isArray(v)) {
    v.forEach((item: unknown, i) => {
      const scope: Record<string, unknown> = { [n.varName]: item };
      if (n.indexVarName) scope[n.indexVarName] = i;
      out += renderNodes(n.children, [ ...scopes, scope ]);
    });
  } else if (v && typeof v === 'object') {
    for (const [ key, value ] of Object.entries(v)) {
      out += renderNodes(n.children, [ ...scopes, { [n.varName]: { key, value } } ]);
    }
  }
  return out;
};
