/**
 * Project configuration, read from `attackgraph.config.yml`.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { GraphFormatError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const CONFIG_FILE = 'attackgraph.config.yml';

const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('warn'),
    })
    .default({}),
  output: z
    .object({
      attackGraphFile: z.string().min(1).default('attackgraph.yml'),
    })
    .default({}),
  evaluation: z
    .object({
      maxExpressionDepth: z.number().int().positive().default(64),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: EngineConfig = configSchema.parse({});

/**
 * Find the nearest config file by walking up from `startDir`.
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = join(dir, CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

/**
 * Validate raw config data and fill in defaults.
 */
export function parseConfig(data: unknown): EngineConfig {
  const result = configSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new GraphFormatError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Load the config file, or the defaults when there is none.
 */
export function loadConfig(filePath: string | null = findConfigFile()): EngineConfig {
  if (!filePath) return DEFAULT_CONFIG;
  return parseConfig(parse(readFileSync(filePath, 'utf-8')));
}
