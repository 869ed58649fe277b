import { z } from 'zod';

import type { PhasedConfig } from './phased-config.js';
import type { TplScopes } from './types.js';

import {
  MalformedSnapshotError,
  UnknownVariableError,
  UnserializableValueError,
} from './errors.js';

import {
  tplFlattenScopes,
  tplLookupKey,
  tplLookupName,
} from './template-runtime.js';

/**
 * Values a snapshot can carry: JSON scalars (finite numbers only) and nested
 * arrays/plain objects of them.
 */
export type SnapshotValue = string | number | boolean | null | SnapshotValue[] | { [key: string]: SnapshotValue };

/**
 * Variables captured for one deferred block.
 */
export interface ContextSnapshot {
  vars: Record<string, SnapshotValue>;
  /** Names to re-fetch from the ambient context at second pass. */
  refetch: string[];
}

/**
 * Prefix of every serialized snapshot; bumped if the encoding changes.
 */
export const SNAPSHOT_PREFIX = 'p1:';

const snapshotValueSchema: z.ZodType<SnapshotValue> = z.lazy(() => z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  z.null(),
  z.array(snapshotValueSchema),
  z.record(snapshotValueSchema),
]));

const snapshotSchema = z.object({
  vars: z.record(snapshotValueSchema),
  refetch: z.array(z.string()),
}).strict();

const fitsModel = (v: unknown, path: WeakSet<object>): boolean => {
  if (v === null || typeof v === 'string' || typeof v === 'boolean') return true;
  if (typeof v === 'number') return Number.isFinite(v);
  if (typeof v !== 'object' || path.has(v)) return false;
  const keys = Object.keys(v);
  if (Array.isArray(v)) {
    // holes and extra keys do not survive JSON
    if (keys.length !== v.length) return false;
    for (let i = 0; i < v.length; i++) {
      if (!Object.prototype.hasOwnProperty.call(v, i)) return false;
    }
  } else {
    const proto: unknown = Object.getPrototypeOf(v);
    if (proto !== Object.prototype && proto !== null) return false;
  }
  path.add(v);
  const fits = keys.every((k) => {
    const desc = Object.getOwnPropertyDescriptor(v, k);
    // accessors are never run
    if (!desc || typeof desc.get === 'function' || typeof desc.set === 'function') return false;
    const value: unknown = desc.value;
    return fitsModel(value, path);
  });
  path.delete(v);
  return fits;
};

/**
 * Check whether a value fits the snapshot value model: JSON scalars and
 * dense arrays or plain objects of them, holding data properties only and
 * no cycles. Getters are not called.
 *
 * @param v - Value to check.
 * @returns True if `v` can be serialized losslessly.
 */
export const isSnapshotValue = (v: unknown): v is SnapshotValue => fitsModel(v, new WeakSet());

const describeType = (v: unknown): string => {
  if (v === null) return 'null';
  if (typeof v === 'object') return v.constructor?.name ?? 'object';
  if (typeof v === 'number') return 'non-finite number';
  return typeof v;
};

/**
 * Remove one matching pair of surrounding quotes.
 *
 * @param name - Requested variable name as written in the tag.
 * @returns Unquoted name and whether it was quoted.
 */
export const unquoteName = (name: string): { name: string, quoted: boolean } => {
  if (name.length >= 2 && (name[0] === '"' || name[0] === '\'') && name[name.length - 1] === name[0]) {
    return { name: name.slice(1, -1), quoted: true };
  }
  return { name, quoted: false };
};

/**
 * Store `value` at a dot-path inside `vars`, creating or extending nested objects.
 * An array on the way was captured whole and already holds the value.
 */
const assignPath = (vars: Record<string, SnapshotValue>, path: string[], value: SnapshotValue): void => {
  let target = vars;
  for (const seg of path.slice(0, -1)) {
    const cur = target[seg];
    if (Array.isArray(cur)) return;
    // copy so a value captured earlier is never mutated in place
    const next: Record<string, SnapshotValue> = cur !== null && typeof cur === 'object' ? { ...cur } : {};
    target[seg] = next;
    target = next;
  }
  target[path[path.length - 1]] = value;
};

/**
 * Capture the variables a deferred block needs from the rendering context.
 *
 * - `keepWhole`: every variable of every scope (innermost wins). Values
 *   outside the snapshot value model are dropped.
 * - Each requested name is resolved now. Quoted names are read as one literal
 *   key; unquoted names are dot-paths stored at the same nested path.
 * - Refetch names present in the context are removed and listed in `refetch`.
 *
 * @param scopes - Rendering context at first pass.
 * @param requestedNames - Names as written in the tag (quotes allowed).
 * @param keepWhole - Capture the whole context.
 * @param config - Phased configuration.
 * @returns New snapshot.
 * @throws UnknownVariableError if a requested name cannot be resolved.
 * @throws UnserializableValueError if a requested value cannot be serialized.
 */
export const captureSnapshot = (
  scopes: TplScopes,
  requestedNames: readonly string[],
  keepWhole: boolean,
  config: PhasedConfig,
): ContextSnapshot => {
  const vars: Record<string, SnapshotValue> = {};
  const refetch = config.refetchNames.filter((n) => tplLookupName(scopes, n).found);

  if (keepWhole) {
    for (const [ k, v ] of Object.entries(tplFlattenScopes(scopes))) {
      if (refetch.includes(k)) continue;
      if (isSnapshotValue(v)) vars[k] = v;
      else config.logger.debug('phased: dropping value from whole-context snapshot', { name: k, type: describeType(v) });
    }
  }

  for (const requested of requestedNames) {
    const { name, quoted } = unquoteName(requested);
    const r = quoted ? tplLookupName(scopes, name) : tplLookupKey(scopes, name);
    if (!r.found) throw new UnknownVariableError(name);
    if (refetch.includes(name)) continue;
    if (!isSnapshotValue(r.value)) throw new UnserializableValueError(name, describeType(r.value));
    if (quoted) vars[name] = r.value;
    else assignPath(vars, name.split('.'), r.value);
  }

  return { vars, refetch };
};

/**
 * Serialize a snapshot: prefix + base64 of its JSON form.
 *
 * @param snapshot - Snapshot to serialize.
 * @returns Text safe to embed in a marker.
 */
export const serializeSnapshot = (snapshot: ContextSnapshot): string => {
  return SNAPSHOT_PREFIX + Buffer.from(JSON.stringify(snapshot), 'utf8').toString('base64');
};

/**
 * Cheap shape check: prefix followed by base64 characters.
 *
 * @param text - Candidate snapshot section.
 * @returns Whether `text` looks like a serialized snapshot.
 */
export const looksLikeSnapshot = (text: string): boolean => {
  return text.startsWith(SNAPSHOT_PREFIX) && /^[A-Za-z0-9+/]*={0,2}$/.test(text.slice(SNAPSHOT_PREFIX.length));
};

/**
 * Decode a serialized snapshot.
 *
 * @param text - Serialized snapshot.
 * @returns Decoded snapshot.
 * @throws MalformedSnapshotError on foreign or corrupt input.
 */
export const deserializeSnapshot = (text: string): ContextSnapshot => {
  if (!looksLikeSnapshot(text)) {
    throw new MalformedSnapshotError('unexpected encoding', { sample: text.slice(0, 32) });
  }
  const payload = text.slice(SNAPSHOT_PREFIX.length);
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64').toString('utf8'));
  } catch (err) {
    throw new MalformedSnapshotError(err instanceof Error ? err.message : String(err));
  }
  const parsed = snapshotSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedSnapshotError(parsed.error.issues[0].message, { path: parsed.error.issues[0].path.join('.') });
  }
  return parsed.data;
};
