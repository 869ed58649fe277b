import type { PhasedConfig } from './phased-config.js';
import type { ContextSnapshot } from './snapshot.js';

import { serializeSnapshot } from './snapshot.js';

/**
 * Build the in-place marker for a deferred block:
 * `DELIM + literal + DELIM + snapshot + DELIM`.
 *
 * The literal is not checked for occurrences of the delimiter; picking a
 * delimiter that never appears in templates or rendered output is part of the
 * deployment configuration.
 *
 * @param literal - Unrendered source of the deferred block.
 * @param snapshot - Captured variables.
 * @param config - Phased configuration (delimiter).
 * @returns Marker text.
 */
export const emitMarker = (literal: string, snapshot: ContextSnapshot, config: Pick<PhasedConfig, 'delimiter'>): string => {
  const d = config.delimiter;
  return d + literal + d + serializeSnapshot(snapshot) + d;
};
