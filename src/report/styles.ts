/**
 * Variant Styles
 *
 * One label and colour per variant, shared by every chart.
 *
 * @module report/styles
 */

import type { AttentionType } from '../records/index.js';

export interface VariantStyle {
  label: string;
  color: string;
  marker: 'circle' | 'square' | 'diamond';
}

export const VARIANT_STYLES: Record<AttentionType, VariantStyle> = {
  naive: { label: 'Naive', color: '#7f7f7f', marker: 'circle' },
  shared: { label: 'Shared Memory', color: 'steelblue', marker: 'square' },
  flash: { label: 'Flash Attention', color: 'coral', marker: 'diamond' },
};

/**
 * Theoretical memory curves. These are not measured variants, so their
 * labels differ from VARIANT_STYLES.
 */
export const MEMORY_STYLES = {
  standard: { label: 'Standard (theoretical)', color: 'red', marker: 'circle' },
  flash: { label: 'Flash (theoretical)', color: 'green', marker: 'square' },
} as const satisfies Record<string, VariantStyle>;

export const GRID_OPACITY = 0.3;
export const REFERENCE_LINE_COLOR = 'gray';
