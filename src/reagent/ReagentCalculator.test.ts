import { describe, expect, it } from 'vitest';
import { InvalidInputError, prepare, tryPrepare } from './ReagentCalculator.js';
import type { LiquidChemical, PreparationRequest, PreparationResult } from './types.js';

const sulfuricAcid: LiquidChemical = { kind: 'liquid', molarMass: 98.08, density: 1.84, purity: 0.98 };

function solidRequest(volume: number, concentration: number, molarMass: number): PreparationRequest {
  return {
    targetVolumeMilliliters: volume,
    targetConcentrationMolar: concentration,
    chemical: { kind: 'solid', molarMass },
  };
}

function liquidRequest(volume: number, concentration: number, chemical: LiquidChemical = sulfuricAcid): PreparationRequest {
  return { targetVolumeMilliliters: volume, targetConcentrationMolar: concentration, chemical };
}

function expectLiquid(result: PreparationResult) {
  if (result.kind !== 'liquid') throw new Error(`expected liquid result, got ${result.kind}`);
  return result;
}

function expectInvalid(request: PreparationRequest, field: string): InvalidInputError {
  try {
    prepare(request);
  } catch (err) {
    if (!(err instanceof InvalidInputError)) throw err;
    expect(err.field).toBe(field);
    return err;
  }
  throw new Error(`expected InvalidInputError for ${field}`);
}

describe('ReagentCalculator', () => {
  describe('solid reagents', () => {
    it('computes the mass for 500 mL of 0.10 M potassium carbonate', () => {
      const result = prepare(solidRequest(500, 0.1, 138.21));
      expect(result.kind).toBe('solid');
      if (result.kind !== 'solid') return;
      expect(result.requiredMassGrams).toBeCloseTo(6.9105, 6);
    });

    it('follows (volume / 1000) * concentration * molarMass', () => {
      const cases: Array<[number, number, number]> = [
        [1000, 1, 58.44],
        [250, 0.5, 101.1032],
        [10, 2, 142.04],
        [0.5, 0.001, 286.141],
      ];
      for (const [volume, concentration, molarMass] of cases) {
        const result = prepare(solidRequest(volume, concentration, molarMass));
        if (result.kind !== 'solid') throw new Error('expected solid result');
        expect(result.requiredMassGrams).toBeCloseTo((volume / 1000) * concentration * molarMass, 10);
      }
    });
  });

  describe('liquid reagents', () => {
    it('computes pure mass, concentrate mass and volume for 98% sulfuric acid', () => {
      const result = expectLiquid(prepare(liquidRequest(500, 0.1)));
      expect(result.requiredPureMassGrams).toBeCloseTo(4.904, 6);
      expect(result.requiredConcentrateMassGrams).toBeCloseTo(5.0041, 4);
      expect(result.requiredConcentrateVolumeMilliliters).toBeCloseTo(2.7196, 4);
    });

    it('derives the concentrate volume from purity and density', () => {
      const chemical: LiquidChemical = { kind: 'liquid', molarMass: 36.46, density: 1.18, purity: 0.37 };
      const result = expectLiquid(prepare(liquidRequest(1000, 1, chemical)));
      const expected = ((1000 / 1000) * 1 * 36.46 / 0.37) / 1.18;
      expect(result.requiredConcentrateVolumeMilliliters).toBeCloseTo(expected, 10);
    });

    it('treats purity 1 as neat solute', () => {
      const chemical: LiquidChemical = { kind: 'liquid', molarMass: 60.05, density: 1.049, purity: 1 };
      const result = expectLiquid(prepare(liquidRequest(200, 0.25, chemical)));
      expect(result.requiredConcentrateMassGrams).toBe(result.requiredPureMassGrams);
    });
  });

  it('increases every output when the concentration increases', () => {
    const lowSolid = prepare(solidRequest(500, 0.1, 138.21));
    const highSolid = prepare(solidRequest(500, 0.2, 138.21));
    if (lowSolid.kind !== 'solid' || highSolid.kind !== 'solid') throw new Error('expected solid results');
    expect(highSolid.requiredMassGrams).toBeGreaterThan(lowSolid.requiredMassGrams);

    const low = expectLiquid(prepare(liquidRequest(500, 0.1)));
    const high = expectLiquid(prepare(liquidRequest(500, 0.2)));
    expect(high.requiredPureMassGrams).toBeGreaterThan(low.requiredPureMassGrams);
    expect(high.requiredConcentrateMassGrams).toBeGreaterThan(low.requiredConcentrateMassGrams);
    expect(high.requiredConcentrateVolumeMilliliters).toBeGreaterThan(low.requiredConcentrateVolumeMilliliters);
  });

  it('returns identical results for identical input', () => {
    expect(prepare(liquidRequest(750, 0.3))).toEqual(prepare(liquidRequest(750, 0.3)));
  });

  describe('invalid input', () => {
    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('rejects target volume %s', (volume) => {
      expectInvalid(solidRequest(volume, 0.1, 138.21), 'targetVolumeMilliliters');
    });

    it('rejects a non-positive concentration', () => {
      expectInvalid(solidRequest(500, 0, 138.21), 'targetConcentrationMolar');
    });

    it('rejects a non-positive molar mass', () => {
      expectInvalid(solidRequest(500, 0.1, -1), 'chemical.molarMass');
    });

    it.each([0, 1.5])('rejects purity %s for liquids', (purity) => {
      expectInvalid(liquidRequest(500, 0.1, { ...sulfuricAcid, purity }), 'chemical.purity');
    });

    it('rejects a zero density', () => {
      expectInvalid(liquidRequest(500, 0.1, { ...sulfuricAcid, density: 0 }), 'chemical.density');
    });

    it('names the field and reason in the message', () => {
      const err = expectInvalid(solidRequest(-5, 0.1, 138.21), 'targetVolumeMilliliters');
      expect(err.message).toBe('Invalid targetVolumeMilliliters: must be greater than 0');
      expect(err.reason).toBe('must be greater than 0');
      expect(err.code).toBe('INVALID_INPUT');
      expect(err.statusCode).toBe(400);
    });

    it('reports non-finite numbers separately from non-positive ones', () => {
      const err = expectInvalid(solidRequest(Number.NaN, 0.1, 138.21), 'targetVolumeMilliliters');
      expect(err.reason).toBe('must be a finite number');
    });

    it('rejects finite inputs whose result overflows', () => {
      const err = expectInvalid(solidRequest(1e300, 0.1, 1e300), 'targetVolumeMilliliters');
      expect(err.reason).toBe('result exceeds the representable range');
    });

    it('rejects a liquid whose concentrate volume overflows', () => {
      // pure mass is finite (1e300 g); dividing by a tiny density is not
      const chemical: LiquidChemical = { kind: 'liquid', molarMass: 1e300, density: 1e-10, purity: 1 };
      expect(tryPrepare(liquidRequest(1000, 1, chemical))).toEqual({
        ok: false,
        error: { field: 'targetVolumeMilliliters', reason: 'result exceeds the representable range' },
      });
    });
  });

  describe('tryPrepare', () => {
    it('wraps a successful result', () => {
      const outcome = tryPrepare(solidRequest(1000, 1, 100));
      expect(outcome).toEqual({ ok: true, result: { kind: 'solid', requiredMassGrams: 100 } });
    });

    it('returns the failed field instead of throwing', () => {
      const outcome = tryPrepare(liquidRequest(500, 0.1, { ...sulfuricAcid, purity: 1.5 }));
      expect(outcome).toEqual({
        ok: false,
        error: { field: 'chemical.purity', reason: 'must not exceed 1' },
      });
    });
  });
});
