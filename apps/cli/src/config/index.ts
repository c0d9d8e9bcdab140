/**
 * CLI Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_BOOT_VERSION } from '@jarsmith/packaging';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Bootstrap templates shipped with the CLI
const BUNDLED_TEMPLATE_DIR = resolve(__dirname, '../../templates');

// Load .env from the working directory
dotenvConfig();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  JARSMITH_TEMPLATE_DIR: z.string().min(1).optional(),
  JARSMITH_BOOT_VERSION: z.string().min(1).default(DEFAULT_BOOT_VERSION),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  logLevel: env.LOG_LEVEL,
  templateDir: env.JARSMITH_TEMPLATE_DIR ? resolve(env.JARSMITH_TEMPLATE_DIR) : BUNDLED_TEMPLATE_DIR,
  bootVersion: env.JARSMITH_BOOT_VERSION,
} as const;
