/**
 * Internal runtime helpers shared by parser/render modules.
 */

import type {
  TplExpr,
  TplFilterArg,
  TplScopes,
} from './types.js';

/**
 * Result of a key lookup: distinguishes "missing" from "present but undefined".
 */
export type TplLookup = { found: true, value: unknown } | { found: false };

const notFound: TplLookup = { found: false };

/**
 * Read an own data property without running accessors.
 *
 * Security: we only read own properties to avoid prototype chain traversal.
 *
 * @param obj - Object to read from.
 * @param seg - Property name.
 * @returns Lookup result.
 */
const tplOwnData = (obj: unknown, seg: string): TplLookup => {
  if (!obj || typeof obj !== 'object') return notFound;
  if (!Object.prototype.hasOwnProperty.call(obj, seg)) return notFound;
  const desc = Object.getOwnPropertyDescriptor(obj, seg);
  if (!desc) return notFound;
  // Do not execute accessors (getters) during template rendering.
  if (typeof desc.get === 'function' || typeof desc.set === 'function') return notFound;
  const value: unknown = desc.value;
  return { found: true, value };
};

/**
 * Resolve a dot-path from a given object (ignores prototype chain).
 *
 * @param obj - Object to resolve from.
 * @param path - Path segments (already split by '.').
 * @returns Lookup result; not found if any segment is missing.
 */
export const tplLookupFrom = (obj: unknown, path: string[]): TplLookup => {
  let cur: TplLookup = { found: true, value: obj };
  for (const seg of path) {
    if (!cur.found) return cur;
    cur = tplOwnData(cur.value, seg);
  }
  return cur;
};

/**
 * Look up a key (identifier or dot-path) across a stack of scopes.
 * The innermost scope defining the first path segment wins; the rest of the
 * path is resolved inside that value only.
 *
 * @param scopes - Stack of scope objects; last entry is the innermost scope.
 * @param key - Identifier or dot-path.
 * @returns Lookup result.
 */
export const tplLookupKey = (scopes: TplScopes, key: string): TplLookup => {
  const parts = key.split('.');
  for (let i = scopes.length - 1; i >= 0; i--) {
    const head = tplOwnData(scopes[i], parts[0]);
    if (head.found) return tplLookupFrom(head.value, parts.slice(1));
  }
  return notFound;
};

/**
 * Look up a literal name (no dot-path splitting) across a stack of scopes.
 *
 * @param scopes - Stack of scope objects; last entry is the innermost scope.
 * @param name - Exact property name.
 * @returns Lookup result.
 */
export const tplLookupName = (scopes: TplScopes, name: string): TplLookup => {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const r = tplOwnData(scopes[i], name);
    if (r.found) return r;
  }
  return notFound;
};

/**
 * Resolve a key across a stack of scopes.
 *
 * @param scopes - Stack of scope objects; last entry is the innermost scope.
 * @param key - Identifier or dot-path.
 * @returns Resolved value or undefined.
 */
export const tplResolveKey = (scopes: TplScopes, key: string): unknown => {
  const r = tplLookupKey(scopes, key);
  return r.found ? r.value : undefined;
};

/**
 * Flatten a scope stack into a single object. Later scopes override earlier ones.
 * Accessor properties are skipped.
 *
 * @param scopes - Stack of scope objects.
 * @returns New flat object.
 */
export const tplFlattenScopes = (scopes: TplScopes): Record<string, unknown> => {
  const flat: Record<string, unknown> = {};
  for (const scope of scopes) {
    for (const k of Object.keys(scope)) {
      const r = tplOwnData(scope, k);
      if (r.found) flat[k] = r.value;
    }
  }
  return flat;
};

/**
 * Truthiness for control flow:
 * - Arrays: true if non-empty
 * - Objects: true if has at least one own key
 * - Other values: Boolean coercion
 *
 * @param v - Value to test.
 * @returns Truthiness result.
 */
export const tplTruthy = (v: unknown): boolean => {
  if (Array.isArray(v)) return v.length > 0;
  if (v && typeof v === 'object') return Object.keys(v).length > 0;
  return Boolean(v);
};

/**
 * Empty-ish for `||` fallbacks: undefined, null, '', [] and {}.
 * Boolean false and number 0 are NOT empty.
 *
 * @param v - Value to test.
 * @returns Whether the value is considered empty-ish.
 */
export const tplEmptyish = (v: unknown): boolean => {
  if (v === undefined || v === null) return true;
  if (typeof v === 'string') return v.length === 0;
  if (Array.isArray(v)) return v.length === 0;
  if (typeof v === 'object') return Object.keys(v).length === 0;
  return false;
};

/**
 * Stringify a value for output: nullish becomes ''.
 *
 * @param v - Value to stringify.
 * @returns String form.
 */
export const tplStringify = (v: unknown): string => {
  if (typeof v === 'string') return v;
  if (v === undefined || v === null) return '';
  return String(v);
};

/**
 * Checks whether a string is an identifier or dot-path identifier.
 *
 * @param s - Input string.
 * @returns True if the string matches the identifier/dot-path grammar.
 */
export const tplIsIdentifier = (s: string): boolean => /^[A-Za-z_][\w.]*$/.test(s);

/**
 * Parse a literal operand: quoted string (with `\\` and quote escapes),
 * number, `true`, `false` or `null`.
 *
 * @param s - Operand source text.
 * @returns Literal value, or undefined if `s` is not a literal.
 */
export const tplParseLiteral = (s: string): TplFilterArg | undefined => {
  const mq = /^(['"])([\s\S]*)\1$/.exec(s);
  if (mq) {
    const quote = mq[1];
    return mq[2].replace(/\\\\/g, '\\').replace(new RegExp('\\\\' + quote, 'g'), quote);
  }
  if (/^[+-]?\d+(?:\.\d+)?$/.test(s)) return Number(s);
  if (/^true$/i.test(s)) return true;
  if (/^false$/i.test(s)) return false;
  if (/^null$/i.test(s)) return null;
  return undefined;
};

/**
 * Parse an operand that is either a literal or a key.
 *
 * @param s - Operand source text.
 * @returns Parsed operand or null if unsupported.
 */
export const tplParseOperand = (s: string): TplExpr | null => {
  const lit = tplParseLiteral(s);
  if (lit !== undefined) return { kind: 'literal', value: lit };
  if (tplIsIdentifier(s)) return { kind: 'key', key: s };
  return null;
};

/**
 * Evaluate an operand against the scope stack.
 *
 * @param scopes - Scope stack.
 * @param e - Operand.
 * @returns Literal value or resolved key value.
 */
export const tplEvalOperand = (scopes: TplScopes, e: TplExpr): unknown => {
  return e.kind === 'literal' ? e.value : tplResolveKey(scopes, e.key);
};
