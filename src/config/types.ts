/**
 * Configuration types for the labprep server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerSettings;
  reagents: ReagentConfig;
}

/**
 * Server settings.
 */
export interface ServerSettings {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Reagent calculator settings.
 */
export interface ReagentConfig {
  /** Preset catalog, relative to the base path (default: './reagents/presets.yaml') */
  presetsPath: string;
  /** Volume used when a request omits one, in mL (default: 500) */
  defaultVolumeMl: number;
  /** Concentration used when a request omits one, in mol/L (default: 0.1) */
  defaultConcentrationMolar: number;
  /** Decimal places in formatted instructions (default: 2) */
  displayPrecision: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  reagents: {
    presetsPath: './reagents/presets.yaml',
    defaultVolumeMl: 500,
    defaultConcentrationMolar: 0.1,
    displayPrecision: 2,
  },
};
