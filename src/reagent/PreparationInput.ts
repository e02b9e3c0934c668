/**
 * PreparationInput: turns an untrusted request body into a PreparationRequest.
 *
 * Shared by the HTTP handlers, the MCP tools and the CLI script. Handles
 * preset resolution, unit normalization (to mL and mol/L) and defaults.
 * Range checks are left to the calculator.
 */

import { z } from 'zod';
import { InvalidInputError } from './ReagentCalculator.js';
import { toChemicalSpec, type PresetCatalog, type PresetEntry } from './PresetCatalog.js';
import type { ChemicalSpec, PreparationRequest } from './types.js';

export const VOLUME_UNITS = ['mL', 'L', 'uL'] as const;
export const CONCENTRATION_UNITS = ['M', 'mM'] as const;

export type VolumeUnit = (typeof VOLUME_UNITS)[number];
export type ConcentrationUnit = (typeof CONCENTRATION_UNITS)[number];

export const chemicalInputSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('solid'),
    molarMass: z.number().describe('Molar mass in g/mol'),
  }).strict(),
  z.object({
    kind: z.literal('liquid'),
    molarMass: z.number().describe('Molar mass in g/mol'),
    density: z.number().describe('Concentrate density in g/mL'),
    purity: z.number().describe('Mass fraction of solute in the concentrate, (0, 1]'),
  }).strict(),
]);

export const preparationInputShape = {
  volume: z.number().optional().describe('Target solution volume (default 500 mL)'),
  volumeUnit: z.enum(VOLUME_UNITS).optional().describe('Unit of `volume` (default "mL")'),
  concentration: z.number().optional().describe('Target concentration (default 0.10 M)'),
  concentrationUnit: z.enum(CONCENTRATION_UNITS).optional().describe('Unit of `concentration` (default "M")'),
  preset: z.string().min(1).optional().describe('Preset id or formula, e.g. "h2so4" or "K2CO3"'),
  chemical: chemicalInputSchema.optional().describe('Inline chemical properties, instead of a preset'),
};

export const preparationInputSchema = z.object(preparationInputShape).strict();

export type PreparationInput = z.infer<typeof preparationInputSchema>;

export interface PreparationDefaults {
  volumeMl: number;
  concentrationMolar: number;
}

export interface ParsedPreparation {
  request: PreparationRequest;
  /** Set when the chemical came from the catalog */
  preset?: PresetEntry;
}

export function toMilliliters(value: number, unit: VolumeUnit): number {
  switch (unit) {
    case 'mL':
      return value;
    case 'L':
      return value * 1000;
    case 'uL':
      return value / 1000;
  }
}

export function toMolar(value: number, unit: ConcentrationUnit): number {
  switch (unit) {
    case 'M':
      return value;
    case 'mM':
      return value / 1000;
  }
}

function resolveChemical(
  input: PreparationInput,
  catalog: PresetCatalog,
): { chemical: ChemicalSpec; preset?: PresetEntry } {
  if (input.preset !== undefined && input.chemical !== undefined) {
    throw new InvalidInputError('preset', 'give either preset or chemical, not both');
  }
  if (input.preset !== undefined) {
    const preset = catalog.require(input.preset);
    return { chemical: toChemicalSpec(preset), preset };
  }
  if (input.chemical !== undefined) {
    return { chemical: input.chemical };
  }
  throw new InvalidInputError('chemical', 'a preset or chemical is required');
}

function issueField(issue: z.ZodIssue): string {
  const unknownKey = issue.code === 'unrecognized_keys' ? issue.keys[0] : undefined;
  const path = unknownKey === undefined ? issue.path : [...issue.path, unknownKey];
  return path.length > 0 ? path.join('.') : 'request';
}

/**
 * Parse and normalize a preparation request body.
 *
 * @throws InvalidInputError on a malformed body
 * @throws PresetNotFoundError when `preset` names nothing in the catalog
 */
export function parsePreparationInput(
  body: unknown,
  catalog: PresetCatalog,
  defaults: PreparationDefaults,
): ParsedPreparation {
  const parsed = preparationInputSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue) {
      throw new InvalidInputError('request', 'malformed request');
    }
    throw new InvalidInputError(issueField(issue), issue.message);
  }

  const input = parsed.data;
  const { chemical, preset } = resolveChemical(input, catalog);

  const targetVolumeMilliliters = input.volume === undefined
    ? defaults.volumeMl
    : toMilliliters(input.volume, input.volumeUnit ?? 'mL');
  const targetConcentrationMolar = input.concentration === undefined
    ? defaults.concentrationMolar
    : toMolar(input.concentration, input.concentrationUnit ?? 'M');

  const request: PreparationRequest = { targetVolumeMilliliters, targetConcentrationMolar, chemical };
  return preset ? { request, preset } : { request };
}
