#!/usr/bin/env tsx
import { resolve } from 'node:path';
import { loadConfig } from '../config/loader.js';
import { InvalidInputError } from '../reagent/ReagentCalculator.js';
import { PresetNotFoundError, loadPresetCatalog } from '../reagent/PresetCatalog.js';
import { ReagentService } from '../reagent/ReagentService.js';
import type { PreparationInput } from '../reagent/PreparationInput.js';

const USAGE = 'Usage: npx tsx src/tools/prepareReagent.ts <preset> [volume-mL] [molarity]';

function parseNumberArg(field: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new InvalidInputError(field, `not a number: ${raw}`);
  }
  return value;
}

/**
 * Map positional arguments onto a preparation request body.
 * Volume is in mL and concentration in mol/L; omitted values fall back to the configured defaults.
 */
export function parsePrepareArgs(args: string[]): PreparationInput {
  const [preset, volumeArg, molarityArg] = args;
  if (!preset) {
    throw new InvalidInputError('preset', 'a preset id or formula is required');
  }
  const body: PreparationInput = { preset };
  const volume = parseNumberArg('volume', volumeArg);
  if (volume !== undefined) body.volume = volume;
  const concentration = parseNumberArg('concentration', molarityArg);
  if (concentration !== undefined) body.concentration = concentration;
  return body;
}

/**
 * Load config and presets from `basePath` and return the display line for `args`.
 */
export async function runPrepareReagent(args: string[], basePath: string): Promise<string> {
  const body = parsePrepareArgs(args);
  const configPath = process.env.CONFIG_PATH || resolve(basePath, 'config.yaml');
  const config = await loadConfig({ configPath });
  const catalog = await loadPresetCatalog(resolve(basePath, config.reagents.presetsPath));
  const service = new ReagentService(catalog, config.reagents);
  return service.prepare(body).display;
}

async function main(): Promise<void> {
  try {
    console.log(await runPrepareReagent(process.argv.slice(2), process.env.APP_BASE_PATH || process.cwd()));
  } catch (err) {
    if (err instanceof InvalidInputError || err instanceof PresetNotFoundError) {
      console.error(err.message);
      console.error(USAGE);
    } else {
      console.error(err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
  }
}

const isMain = process.argv[1]?.endsWith('prepareReagent.ts') ||
               process.argv[1]?.endsWith('prepareReagent.js');

if (isMain) {
  main().catch(console.error);
}
