/**
 * @fileoverview Label set formatting.
 *
 * @module @kprint/core/labels
 */

import type { LabelSet } from '../api/types.js';

/**
 * Render a label set as sorted `key=value` pairs joined with commas.
 *
 * @example
 * ```typescript
 * formatLabels({ tier: 'web', app: 'shop' }); // 'app=shop,tier=web'
 * formatLabels(undefined);                    // ''
 * ```
 */
export function formatLabels(labels: LabelSet | undefined): string {
  if (!labels) return '';
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .sort()
    .join(',');
}
