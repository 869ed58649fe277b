import type {
  PhasedConfig,
  TemplateRenderer,
} from './phased-config.js';
import type { ContextSnapshot } from './snapshot.js';
import type { TplScopes } from './types.js';

import {
  MalformedSnapshotError,
} from './errors.js';

import {
  deserializeSnapshot,
  looksLikeSnapshot,
} from './snapshot.js';

/**
 * Output of a second pass plus the markers that could not be restored.
 */
export interface SecondPassResult {
  output: string;
  /** One entry per marker whose snapshot could not be decoded; its span is dropped. */
  errors: MalformedSnapshotError[];
}

interface PassState {
  config: PhasedConfig;
  render: TemplateRenderer;
  ambient: TplScopes;
  errors: MalformedSnapshotError[];
}

/**
 * Replace every marker in `text` with its rendered content.
 *
 * Markers are found left to right. A marker is `DELIM content DELIM snapshot DELIM`
 * where the snapshot section looks like a serialized snapshot; any other
 * delimiter occurrence is kept as text and scanning resumes at the next
 * delimiter. Each marker's content is rendered against the ambient scopes
 * with the snapshot on top, then resolved again for markers it produced
 * (depth-first) until `config.maxDepth` nesting levels have been expanded.
 *
 * Errors thrown by the renderer propagate unchanged.
 *
 * @param text - Text that may contain markers.
 * @param ambient - Request-level scopes filling gaps the snapshots leave.
 * @param config - Phased configuration.
 * @param render - Template render collaborator.
 * @returns Resolved text and collected snapshot errors.
 */
export const resolveMarkers = (
  text: string,
  ambient: TplScopes,
  config: PhasedConfig,
  render: TemplateRenderer,
): SecondPassResult => {
  const state: PassState = { config, render, ambient, errors: [] };
  return { output: resolveText(text, 0, state), errors: state.errors };
};

const resolveText = (text: string, depth: number, state: PassState): string => {
  const d = state.config.delimiter;
  if (!text.includes(d)) return text;
  if (depth > state.config.maxDepth) {
    state.config.logger.warn('phased: maximum marker depth reached, leaving text unresolved', { maxDepth: state.config.maxDepth });
    return text;
  }

  let out = '';
  let pos = 0;
  for (;;) {
    const d1 = text.indexOf(d, pos);
    const d2 = d1 === -1 ? -1 : text.indexOf(d, d1 + d.length);
    const d3 = d2 === -1 ? -1 : text.indexOf(d, d2 + d.length);
    if (d3 === -1) break;
    const snapshotText = text.slice(d2 + d.length, d3);
    if (!looksLikeSnapshot(snapshotText)) {
      // not a marker: keep the first delimiter and what follows as text
      out += text.slice(pos, d2);
      pos = d2;
      continue;
    }
    out += text.slice(pos, d1);
    out += resolveMarker(text.slice(d1 + d.length, d2), snapshotText, depth, state);
    pos = d3 + d.length;
  }
  return out + text.slice(pos);
};

const resolveMarker = (content: string, snapshotText: string, depth: number, state: PassState): string => {
  const { config } = state;
  let snapshot: ContextSnapshot;
  try {
    snapshot = deserializeSnapshot(snapshotText);
  } catch (err) {
    if (!(err instanceof MalformedSnapshotError)) throw err;
    config.logger.error('phased: dropping marker with malformed snapshot', { error: err.message });
    state.errors.push(err);
    return '';
  }

  const refetched: Record<string, unknown> = {};
  for (const name of snapshot.refetch) {
    const value = config.tokenProvider(name, state.ambient);
    if (value === undefined) {
      config.logger.warn('phased: no ambient value for re-fetched name', { name });
    } else {
      refetched[name] = value;
    }
  }

  const rendered = state.render(content, [ ...state.ambient, snapshot.vars, refetched ]);
  return resolveText(rendered, depth + 1, state);
};
