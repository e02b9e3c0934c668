/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { PresetEntry } from '../reagent/PresetCatalog.js';
import type { PreparationReport } from '../reagent/ReagentService.js';
import type { InvalidInput } from '../reagent/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

/**
 * Error response for a rejected preparation request.
 */
export interface InvalidInputResponse extends ApiError {
  error: 'INVALID_INPUT';
  details: InvalidInput;
}

// ============================================================================
// Reagent Endpoints
// ============================================================================

/**
 * Response for listing presets.
 */
export interface ListPresetsResponse {
  presets: PresetEntry[];
  total: number;
}

/**
 * Response for a single preset.
 */
export interface PresetResponse {
  preset: PresetEntry;
}

/**
 * Response for POST /reagents/prepare.
 */
export type PrepareResponse = PreparationReport;

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    presets?: { loaded: number };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration options.
 */
export interface ServerConfig {
  /** HTTP port (default: 3001) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Preset catalog path, overriding config.yaml */
  presetsPath?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Log level (default: 'info') */
  logLevel?: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}
