/**
 * Config Command
 *
 * View and manage the persisted defaults.
 */

import chalk from 'chalk';
import { ValidationError } from '@pack-doctor/core';
import { config, configFileSchema, loadConfigFile, saveConfig, type ConfigFile } from '../config/index.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  reset?: boolean;
}

export const configKeys = ['packFormat', 'description', 'indent', 'maxAttempts', 'backup'] as const;
type ConfigKey = typeof configKeys[number];

const configDescriptions: Record<ConfigKey, string> = {
  packFormat: 'pack_format written when pack.mcmeta is repaired',
  description: 'description written when pack.mcmeta is repaired',
  indent: 'Indentation used when rewriting JSON files',
  maxAttempts: 'Maximum number of checking passes per run',
  backup: 'Back up assets/ and pack.mcmeta before checking',
};

export function isValidKey(key: string): key is ConfigKey {
  return configKeys.some(candidate => candidate === key);
}

function toRawValue(key: ConfigKey, value: string): unknown {
  switch (key) {
    case 'description':
      return value;
    case 'backup':
      return value === 'true' ? true : value === 'false' ? false : value;
    default:
      return Number(value);
  }
}

/**
 * Convert a command-line value into the type stored for the key
 */
export function convertValue(key: ConfigKey, value: string): ConfigFile[ConfigKey] {
  const result = configFileSchema.shape[key].safeParse(toRawValue(key, value));
  if (!result.success) {
    throw new ValidationError(key, result.error.issues[0]?.message ?? 'invalid value');
  }
  return result.data;
}

export async function configCommand(
  key?: string,
  value?: string,
  options: ConfigOptions = {}
): Promise<void> {
  if (options.reset) {
    saveConfig({});
    printSuccess('Configuration reset to defaults');
    return;
  }

  if (!key) {
    listConfig();
    return;
  }

  if (!isValidKey(key)) {
    printError(`Unknown config key: ${key}`);
    console.log(chalk.gray(`Valid keys: ${configKeys.join(', ')}`));
    process.exitCode = 1;
    return;
  }

  if (value === undefined) {
    printKeyValue(key, config[key]);
    return;
  }

  try {
    const converted = convertValue(key, value);
    saveConfig({ ...loadConfigFile(), [key]: converted });
    printSuccess(`Set ${key} = ${String(converted)}`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    printError(error.message);
    process.exitCode = 1;
  }
}

function listConfig(): void {
  printHeader('Configuration');

  for (const key of configKeys) {
    console.log(`${chalk.cyan(key)}: ${String(config[key])}`);
    console.log(`  ${chalk.gray(configDescriptions[key])}`);
    console.log();
  }

  console.log(chalk.gray(`Stored in ${config.configFile}`));
  console.log(chalk.gray('Use "pack-doctor config <key> <value>" to set a value'));
}
