/**
 * Tool configuration.
 *
 * Loads config/config.{CLONE_CONFIG}.json (default: config.default.json),
 * validates it and applies environment overrides:
 *   CLONE_REPOSITORY_ROOT - repository to operate on
 *   PORT                  - HTTP port
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import { Paths } from './paths.js';
import { ConfigError } from './errors.js';
import { CloneLogger } from './logger.js';
import { CloneRequest } from './types.js';

export const XR_NAMESPACE = 'http://v8.1c.ru/8.3/xcf/readable';

const ConfigSchema = z.object({
  repositoryRoot: z.string().min(1).default('.'),
  configDir: z.string().default('Configuration'),
  encoding: z.enum(['utf-8', 'utf-8-bom']).default('utf-8'),
  identityAttribute: z.string().min(1).default('uuid'),
  regenerateNestedIdentities: z.boolean().default(true),
  namespaces: z.record(z.string()).default({ xr: XR_NAMESPACE }),
  port: z.number().int().positive().default(3000),

  // Default request for the command line
  type: z.string().optional(),
  donorName: z.string().optional(),
  cloneName: z.string().optional()
});

export type CloneConfig = z.infer<typeof ConfigSchema>;

export interface LoadConfigOptions {
  /** Directory holding config.*.json files (default: <code root>/config) */
  directory?: string;
  env?: NodeJS.ProcessEnv;
  logger?: CloneLogger;
}

function readConfigFile(file: string, logger?: CloneLogger): unknown {
  if (!fs.pathExistsSync(file)) {
    logger?.warn(`Config file ${path.basename(file)} not found, using defaults`);
    return {};
  }
  try {
    return fs.readJsonSync(file);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`, { file });
  }
}

/**
 * Load, validate and apply environment overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): CloneConfig {
  const env = options.env ?? process.env;
  const configName = env.CLONE_CONFIG ?? 'default';
  const file = path.join(options.directory ?? Paths.config, `config.${configName}.json`);

  const parsed = ConfigSchema.safeParse(readConfigFile(file, options.logger));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration in ${file}: ${issues.join('; ')}`, { file, issues });
  }

  const config = parsed.data;

  if (env.CLONE_REPOSITORY_ROOT) {
    config.repositoryRoot = env.CLONE_REPOSITORY_ROOT;
  }
  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port) || port <= 0) {
      throw new ConfigError(`PORT must be a positive integer: ${env.PORT}`, { port: env.PORT });
    }
    config.port = port;
  }

  return config;
}

/**
 * Default request from configuration, if all three names are set.
 */
export function requestFromConfig(config: CloneConfig): CloneRequest | null {
  const { type, donorName, cloneName } = config;
  if (!type || !donorName || !cloneName) return null;
  return { type, donorName, cloneName };
}
