/**
 * Server entry point for the labprep API.
 *
 * This module:
 * - Loads configuration and the preset catalog
 * - Creates Fastify server with routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import { DEFAULT_CONFIG as DEFAULT_APP_CONFIG, type AppConfig } from './config/types.js';
import { loadPresetCatalog, type PresetCatalog } from './reagent/PresetCatalog.js';
import { ReagentService } from './reagent/ReagentService.js';
import { createReagentHandlers, createMetaHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerConfig } from './api/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  appConfig: AppConfig;
  configPath: string;
  presets: PresetCatalog;
  /** Absolute path of the loaded preset catalog */
  presetsPath: string;
  reagents: ReagentService;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  config: ServerConfig = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  let appConfig: AppConfig;
  const configPath = process.env.CONFIG_PATH || resolve(basePath, 'config.yaml');

  try {
    appConfig = await loadConfig({ configPath });
  } catch (err) {
    console.warn(
      `Failed to load ${configPath}, using defaults: ${err instanceof Error ? err.message : String(err)}`
    );
    appConfig = structuredClone(DEFAULT_APP_CONFIG);
  }

  const presetsPath = resolve(basePath, config.presetsPath ?? appConfig.reagents.presetsPath);
  console.log(`Loading presets from: ${presetsPath}`);

  const presets = await loadPresetCatalog(presetsPath);
  console.log(`Loaded ${presets.size} presets`);

  const reagents = new ReagentService(presets, appConfig.reagents);

  console.log(`App initialized`);

  return {
    appConfig,
    configPath,
    presets,
    presetsPath,
    reagents,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  config: ServerConfig = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverSettings = ctx.appConfig.server;

  const fastify = Fastify({
    logger: {
      level: config.logLevel ?? serverSettings.logLevel,
    },
  });

  if (config.cors ?? serverSettings.cors.enabled) {
    const { origins } = serverSettings.cors;
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const reagentHandlers = createReagentHandlers(ctx.reagents);
  const metaHandlers = createMetaHandlers({
    presets: ctx.presets,
    presetsPath: ctx.presetsPath,
    reagentConfig: ctx.appConfig.reagents,
  });

  // Register MCP server on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', createMcpServer: () => createMcpServer(ctx) });

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      reagentHandlers,
      metaHandlers,
      presetCount: () => ctx.presets.size,
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  config: ServerConfig = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(basePath, config);
    const fastify = await createServer(ctx, config);

    const port = config.port ?? ctx.appConfig.server.port;
    const host = config.host ?? ctx.appConfig.server.host;

    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Presets loaded: ${ctx.presets.size}`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => { shutdown().catch(console.error); });
    process.on('SIGTERM', () => { shutdown().catch(console.error); });

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const config: ServerConfig = {};
  if (process.env.PORT) config.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) config.host = process.env.HOST;

  await startServer(basePath, config);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
