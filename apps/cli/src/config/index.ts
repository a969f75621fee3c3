/**
 * CLI Configuration
 *
 * Environment for the linkgarden CLI. Loaded before any workspace package so
 * the logger picks up LOG_LEVEL and LOG_FILE from .env as well.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  LOG_FILE: z.string().optional(),
  // Directory holding config.json, links.json and filters.json
  LINKGARDEN_CONFIG_DIR: z.string().optional(),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

// The logger reads these when it is first imported
process.env['NODE_ENV'] = env.NODE_ENV;
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = {
  configDir: resolve(env.LINKGARDEN_CONFIG_DIR ?? process.cwd()),
} as const;
