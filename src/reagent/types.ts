/**
 * Types for reagent preparation.
 *
 * Quantities carry their unit in the field name. Molar mass is g/mol,
 * density is g/mL and purity is a mass fraction in (0, 1].
 */

export type ChemicalKind = 'solid' | 'liquid';

/**
 * A solid reagent weighed out directly.
 */
export interface SolidChemical {
  kind: 'solid';
  molarMass: number;
}

/**
 * A liquid concentrate (e.g. 98% sulfuric acid) dispensed by volume.
 */
export interface LiquidChemical {
  kind: 'liquid';
  molarMass: number;
  density: number;
  purity: number;
}

export type ChemicalSpec = SolidChemical | LiquidChemical;

export interface PreparationRequest {
  targetVolumeMilliliters: number;
  targetConcentrationMolar: number;
  chemical: ChemicalSpec;
}

export interface SolidPreparation {
  kind: 'solid';
  requiredMassGrams: number;
}

export interface LiquidPreparation {
  kind: 'liquid';
  /** Mass of 100% solute */
  requiredPureMassGrams: number;
  /** Mass of the concentrate as supplied */
  requiredConcentrateMassGrams: number;
  requiredConcentrateVolumeMilliliters: number;
}

export type PreparationResult = SolidPreparation | LiquidPreparation;

/**
 * Which request field failed validation and why.
 */
export interface InvalidInput {
  /** Dotted path into the request, e.g. "chemical.purity" */
  field: string;
  reason: string;
}

export type PrepareOutcome =
  | { ok: true; result: PreparationResult }
  | { ok: false; error: InvalidInput };
