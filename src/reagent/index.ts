/**
 * Public exports for reagent preparation.
 */

export * from './types.js';
export { prepare, tryPrepare, InvalidInputError } from './ReagentCalculator.js';
export {
  PresetCatalog,
  PresetCatalogError,
  PresetNotFoundError,
  loadPresetCatalog,
  parsePresetCatalog,
  presetEntrySchema,
  toChemicalSpec,
} from './PresetCatalog.js';
export type { PresetEntry } from './PresetCatalog.js';
export {
  parsePreparationInput,
  preparationInputSchema,
  preparationInputShape,
  chemicalInputSchema,
  toMilliliters,
  toMolar,
  VOLUME_UNITS,
  CONCENTRATION_UNITS,
} from './PreparationInput.js';
export type {
  ParsedPreparation,
  PreparationDefaults,
  PreparationInput,
  VolumeUnit,
  ConcentrationUnit,
} from './PreparationInput.js';
export { formatPreparation } from './format.js';
export type { FormatOptions } from './format.js';
export { ReagentService } from './ReagentService.js';
export type { PreparationReport, ReagentSettings } from './ReagentService.js';
