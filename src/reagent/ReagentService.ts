/**
 * ReagentService: the calculator bound to a preset catalog and configured defaults.
 *
 * This is what the HTTP handlers, MCP tools and CLI call. It owns no state
 * beyond the catalog it was given.
 */

import type { ReagentConfig } from '../config/types.js';
import { formatPreparation } from './format.js';
import { parsePreparationInput } from './PreparationInput.js';
import type { PresetCatalog, PresetEntry } from './PresetCatalog.js';
import { prepare } from './ReagentCalculator.js';
import type { PreparationRequest, PreparationResult } from './types.js';

export type ReagentSettings = Pick<ReagentConfig, 'defaultVolumeMl' | 'defaultConcentrationMolar' | 'displayPrecision'>;

export interface PreparationReport {
  /** Normalized request (mL, mol/L) */
  request: PreparationRequest;
  result: PreparationResult;
  display: string;
  preset?: PresetEntry;
}

export class ReagentService {
  constructor(
    private readonly catalog: PresetCatalog,
    private readonly settings: ReagentSettings,
  ) {}

  get presetCount(): number {
    return this.catalog.size;
  }

  listPresets(): PresetEntry[] {
    return this.catalog.list();
  }

  /**
   * @throws PresetNotFoundError
   */
  getPreset(idOrFormula: string): PresetEntry {
    return this.catalog.require(idOrFormula);
  }

  /**
   * Parse a request body, run the calculator and format the result.
   *
   * @throws InvalidInputError
   * @throws PresetNotFoundError
   */
  prepare(body: unknown): PreparationReport {
    const { request, preset } = parsePreparationInput(body, this.catalog, {
      volumeMl: this.settings.defaultVolumeMl,
      concentrationMolar: this.settings.defaultConcentrationMolar,
    });
    const result = prepare(request);
    const display = formatPreparation(result, {
      label: preset?.formula ?? 'reagent',
      precision: this.settings.displayPrecision,
    });

    return preset ? { request, result, display, preset } : { request, result, display };
  }
}
