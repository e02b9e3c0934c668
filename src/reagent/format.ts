/**
 * Human-readable preparation instructions.
 */

import type { PreparationResult } from './types.js';

export interface FormatOptions {
  /** What to call the chemical, e.g. a formula (default "reagent") */
  label?: string;
  /** Decimal places (default 2) */
  precision?: number;
}

export function formatPreparation(result: PreparationResult, options: FormatOptions = {}): string {
  const label = options.label ?? 'reagent';
  const digits = options.precision ?? 2;
  const fixed = (value: number) => value.toFixed(digits);

  if (result.kind === 'solid') {
    return `Weigh ${fixed(result.requiredMassGrams)} g of ${label}`;
  }
  return (
    `Measure ${fixed(result.requiredConcentrateVolumeMilliliters)} mL ` +
    `(${fixed(result.requiredConcentrateMassGrams)} g) of ${label} concentrate ` +
    `(${fixed(result.requiredPureMassGrams)} g pure)`
  );
}
