/**
 * ReagentCalculator: molarity to mass/volume for solution preparation.
 *
 * Pure functions: no I/O, no rounding, no unit conversion beyond mL → L.
 * Display rounding belongs to the caller (see format.ts).
 */

import type {
  ChemicalSpec,
  InvalidInput,
  PreparationRequest,
  PreparationResult,
  PrepareOutcome,
} from './types.js';

const MILLILITERS_PER_LITER = 1000;

export class InvalidInputError extends Error {
  readonly code = 'INVALID_INPUT';
  readonly statusCode = 400;
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.reason = reason;
  }

  toJSON(): InvalidInput {
    return { field: this.field, reason: this.reason };
  }
}

function requirePositive(value: number, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(field, 'must be a finite number');
  }
  if (value <= 0) {
    throw new InvalidInputError(field, 'must be greater than 0');
  }
}

function validateChemical(chemical: ChemicalSpec): void {
  requirePositive(chemical.molarMass, 'chemical.molarMass');

  switch (chemical.kind) {
    case 'solid':
      return;
    case 'liquid':
      requirePositive(chemical.density, 'chemical.density');
      requirePositive(chemical.purity, 'chemical.purity');
      if (chemical.purity > 1) {
        throw new InvalidInputError('chemical.purity', 'must not exceed 1');
      }
      return;
    default: {
      const unknownKind: never = chemical;
      throw new InvalidInputError('chemical.kind', `unsupported kind ${JSON.stringify(unknownKind)}`);
    }
  }
}

function requireRepresentable(result: PreparationResult): PreparationResult {
  const outputs = result.kind === 'solid'
    ? [result.requiredMassGrams]
    : [result.requiredPureMassGrams, result.requiredConcentrateMassGrams, result.requiredConcentrateVolumeMilliliters];
  if (!outputs.every(Number.isFinite)) {
    throw new InvalidInputError('targetVolumeMilliliters', 'result exceeds the representable range');
  }
  return result;
}

/**
 * Compute how much reagent is needed for a target volume and molarity.
 *
 * @throws InvalidInputError when any precondition fails; nothing is computed in that case.
 */
export function prepare(request: PreparationRequest): PreparationResult {
  requirePositive(request.targetVolumeMilliliters, 'targetVolumeMilliliters');
  requirePositive(request.targetConcentrationMolar, 'targetConcentrationMolar');
  validateChemical(request.chemical);

  const liters = request.targetVolumeMilliliters / MILLILITERS_PER_LITER;
  const moles = liters * request.targetConcentrationMolar;
  const { chemical } = request;

  if (chemical.kind === 'solid') {
    return requireRepresentable({ kind: 'solid', requiredMassGrams: moles * chemical.molarMass });
  }

  const requiredPureMassGrams = moles * chemical.molarMass;
  // The concentrate is only `purity` solute by mass
  const requiredConcentrateMassGrams = requiredPureMassGrams / chemical.purity;
  return requireRepresentable({
    kind: 'liquid',
    requiredPureMassGrams,
    requiredConcentrateMassGrams,
    requiredConcentrateVolumeMilliliters: requiredConcentrateMassGrams / chemical.density,
  });
}

/**
 * Non-throwing form of {@link prepare}.
 */
export function tryPrepare(request: PreparationRequest): PrepareOutcome {
  try {
    return { ok: true, result: prepare(request) };
  } catch (err) {
    if (err instanceof InvalidInputError) {
      return { ok: false, error: err.toJSON() };
    }
    throw err;
  }
}
