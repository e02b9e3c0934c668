import { describe, expect, it } from 'vitest';
import { parsePresetCatalog, PresetNotFoundError } from './PresetCatalog.js';
import { InvalidInputError } from './ReagentCalculator.js';
import { ReagentService } from './ReagentService.js';

const catalog = parsePresetCatalog(`
presets:
  - { id: k2co3, formula: K2CO3, kind: solid, molarMass: 138.205 }
  - { id: h2so4, formula: H2SO4, kind: liquid, molarMass: 98.079, density: 1.84, purity: 0.98 }
`);

const service = new ReagentService(catalog, {
  defaultVolumeMl: 500,
  defaultConcentrationMolar: 0.1,
  displayPrecision: 2,
});

describe('ReagentService', () => {
  it('prepares a preset solid with the default volume and concentration', () => {
    const report = service.prepare({ preset: 'K2CO3' });
    expect(report.preset?.id).toBe('k2co3');
    expect(report.result.kind).toBe('solid');
    if (report.result.kind === 'solid') {
      expect(report.result.requiredMassGrams).toBeCloseTo(6.91025, 8);
    }
    expect(report.display).toBe('Weigh 6.91 g of K2CO3');
  });

  it('prepares sulfuric acid by volume of concentrate', () => {
    const report = service.prepare({ preset: 'h2so4', volume: 1, volumeUnit: 'L', concentration: 0.5 });
    expect(report.request.targetVolumeMilliliters).toBe(1000);
    if (report.result.kind !== 'liquid') throw new Error('expected liquid result');
    // 0.5 mol * 98.079 g/mol = 49.0395 g pure, / 0.98 = 50.0403 g, / 1.84 = 27.1958 mL
    expect(report.result.requiredPureMassGrams).toBeCloseTo(49.0395, 6);
    expect(report.result.requiredConcentrateMassGrams).toBeCloseTo(50.0403, 3);
    expect(report.result.requiredConcentrateVolumeMilliliters).toBeCloseTo(27.1958, 3);
    expect(report.display).toBe('Measure 27.20 mL (50.04 g) of H2SO4 concentrate (49.04 g pure)');
  });

  it('labels inline chemicals generically and omits the preset', () => {
    const report = service.prepare({ chemical: { kind: 'solid', molarMass: 100 }, volume: 100, concentration: 1 });
    expect(report.display).toBe('Weigh 10.00 g of reagent');
    expect('preset' in report).toBe(false);
  });

  it('surfaces calculator preconditions as InvalidInputError', () => {
    expect(() => service.prepare({ preset: 'k2co3', volume: 0 })).toThrow(InvalidInputError);
    expect(() =>
      service.prepare({ chemical: { kind: 'liquid', molarMass: 98, density: 1.8, purity: 0 } }),
    ).toThrow('Invalid chemical.purity: must be greater than 0');
  });

  it('looks presets up by id or formula', () => {
    expect(service.getPreset('H2SO4').id).toBe('h2so4');
    expect(() => service.getPreset('HCl')).toThrow(PresetNotFoundError);
    expect(service.listPresets()).toHaveLength(2);
    expect(service.presetCount).toBe(2);
  });
});
