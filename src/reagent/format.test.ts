import { describe, expect, it } from 'vitest';
import { formatPreparation } from './format.js';

describe('formatPreparation', () => {
  it('formats a solid with two decimals by default', () => {
    expect(formatPreparation({ kind: 'solid', requiredMassGrams: 6.9105 }, { label: 'K2CO3' })).toBe(
      'Weigh 6.91 g of K2CO3',
    );
  });

  it('formats a liquid concentrate', () => {
    const text = formatPreparation(
      {
        kind: 'liquid',
        requiredPureMassGrams: 4.904,
        requiredConcentrateMassGrams: 5.0041,
        requiredConcentrateVolumeMilliliters: 2.7196,
      },
      { label: 'H2SO4' },
    );
    expect(text).toBe('Measure 2.72 mL (5.00 g) of H2SO4 concentrate (4.90 g pure)');
  });

  it('honours the precision and falls back to a generic label', () => {
    expect(formatPreparation({ kind: 'solid', requiredMassGrams: 1.23456 }, { precision: 4 })).toBe(
      'Weigh 1.2346 g of reagent',
    );
  });
});
