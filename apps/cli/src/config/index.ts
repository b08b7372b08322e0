/**
 * CLI Configuration
 *
 * Precedence: command-line flag > environment > config file > default.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { DEFAULT_INDENT, DEFAULT_PACK_DEFAULTS, ValidationError } from '@pack-doctor/core';
import { logger } from '@pack-doctor/utils';

// Load .env from the working directory
dotenvConfig();

// Config file location
const CONFIG_DIR = process.env['PACK_DOCTOR_CONFIG_DIR'] ?? join(homedir(), '.pack-doctor');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

// Environment schema
const envSchema = z.object({
  PACK_DOCTOR_AUTO_FIX: booleanFlag.optional(),
  PACK_DOCTOR_BACKUP: booleanFlag.optional(),
  PACK_DOCTOR_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  PACK_DOCTOR_DEBUG: booleanFlag.optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

// Config file schema
export const configFileSchema = z.object({
  packFormat: z.number().int().min(1).default(DEFAULT_PACK_DEFAULTS.packFormat),
  description: z.string().default(DEFAULT_PACK_DEFAULTS.description),
  indent: z.number().int().min(0).max(10).default(DEFAULT_INDENT),
  maxAttempts: z.number().int().min(1).default(5),
  backup: z.boolean().default(true),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

// Load config from file
export function loadConfigFile(): Partial<ConfigFile> {
  if (!existsSync(CONFIG_FILE)) {
    return {};
  }

  try {
    const parsed = configFileSchema.partial().safeParse(JSON.parse(readFileSync(CONFIG_FILE, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn({ path: CONFIG_FILE, issues: parsed.error.issues }, 'Ignoring invalid config file');
  } catch (error) {
    logger.warn({ path: CONFIG_FILE, err: error }, 'Ignoring unreadable config file');
  }
  return {};
}

// Save config to file
export function saveConfig(values: Partial<ConfigFile>): void {
  mkdirSync(CONFIG_DIR, { recursive: true });
  writeFileSync(CONFIG_FILE, JSON.stringify(values, null, 2));
}

function parseEnv(): z.infer<typeof envSchema> {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(
      first ? first.path.join('.') : 'environment',
      first?.message ?? 'invalid environment'
    );
  }
  return parsed.data;
}

const env = parseEnv();
const fileConfig = configFileSchema.parse(loadConfigFile());

export const config = {
  packFormat: fileConfig.packFormat,
  description: fileConfig.description,
  indent: fileConfig.indent,
  maxAttempts: env.PACK_DOCTOR_MAX_ATTEMPTS ?? fileConfig.maxAttempts,
  backup: env.PACK_DOCTOR_BACKUP ?? fileConfig.backup,
  autoFix: env.PACK_DOCTOR_AUTO_FIX,
  debug: env.PACK_DOCTOR_DEBUG ?? false,
  logLevel: env.LOG_LEVEL,
  configDir: CONFIG_DIR,
  configFile: CONFIG_FILE,
} as const;
