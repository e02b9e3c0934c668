/**
 * PresetCatalog: bundled chemicals the calculator can be pointed at by name.
 *
 * Presets live in a YAML file (reagents/presets.yaml) and are validated on
 * load. Lookups match `id` first, then `formula`, both exact.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import yaml from 'yaml';
import type { ChemicalSpec } from './types.js';

const presetBase = {
  id: z.string().min(1),
  formula: z.string().min(1),
  name: z.string().min(1).optional(),
  molarMass: z.number().positive(),
};

const solidPresetSchema = z.object({
  ...presetBase,
  kind: z.literal('solid'),
}).strict();

const liquidPresetSchema = z.object({
  ...presetBase,
  kind: z.literal('liquid'),
  density: z.number().positive(),
  purity: z.number().positive().max(1),
}).strict();

export const presetEntrySchema = z.discriminatedUnion('kind', [solidPresetSchema, liquidPresetSchema]);

const presetFileSchema = z.object({
  presets: z.array(presetEntrySchema),
});

export type PresetEntry = z.infer<typeof presetEntrySchema>;

export class PresetCatalogError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
  ) {
    super(`Preset catalog ${sourcePath}: ${message}`);
    this.name = 'PresetCatalogError';
  }
}

export class PresetNotFoundError extends Error {
  readonly code = 'PRESET_NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly key: string) {
    super(`Unknown preset: ${key}`);
    this.name = 'PresetNotFoundError';
  }
}

export class PresetCatalog {
  private readonly entries: PresetEntry[];
  private readonly byId = new Map<string, PresetEntry>();
  private readonly byFormula = new Map<string, PresetEntry>();

  constructor(entries: PresetEntry[]) {
    this.entries = [...entries];
    for (const entry of this.entries) {
      this.byId.set(entry.id, entry);
      if (!this.byFormula.has(entry.formula)) {
        this.byFormula.set(entry.formula, entry);
      }
    }
  }

  get size(): number {
    return this.entries.length;
  }

  list(): PresetEntry[] {
    return [...this.entries];
  }

  get(idOrFormula: string): PresetEntry | undefined {
    return this.byId.get(idOrFormula) ?? this.byFormula.get(idOrFormula);
  }

  require(idOrFormula: string): PresetEntry {
    const entry = this.get(idOrFormula);
    if (!entry) {
      throw new PresetNotFoundError(idOrFormula);
    }
    return entry;
  }
}

export function toChemicalSpec(entry: PresetEntry): ChemicalSpec {
  if (entry.kind === 'liquid') {
    return { kind: 'liquid', molarMass: entry.molarMass, density: entry.density, purity: entry.purity };
  }
  return { kind: 'solid', molarMass: entry.molarMass };
}

/**
 * Parse catalog YAML content.
 *
 * @throws PresetCatalogError naming the first offending entry
 */
export function parsePresetCatalog(content: string, sourcePath = '<inline>'): PresetCatalog {
  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    throw new PresetCatalogError(err instanceof Error ? err.message : String(err), sourcePath);
  }

  const result = presetFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new PresetCatalogError(`${where}: ${issue?.message ?? 'invalid catalog'}`, sourcePath);
  }

  const seen = new Set<string>();
  for (const entry of result.data.presets) {
    if (seen.has(entry.id)) {
      throw new PresetCatalogError(`duplicate preset id: ${entry.id}`, sourcePath);
    }
    seen.add(entry.id);
  }

  return new PresetCatalog(result.data.presets);
}

export async function loadPresetCatalog(path: string): Promise<PresetCatalog> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new PresetCatalogError(`cannot read file (${err instanceof Error ? err.message : String(err)})`, path);
  }
  return parsePresetCatalog(content, path);
}
