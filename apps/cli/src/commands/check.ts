/**
 * Check Command
 *
 * Check (and optionally repair) a resource pack. After a problem that
 * can't be fixed automatically, the operator may fix it by hand and
 * check again.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { ValidationError, type Confirmer } from '@pack-doctor/core';
import { PackDoctor, type RunOutcome } from '@pack-doctor/validation';
import { formatDuration, retry } from '@pack-doctor/utils';
import { config } from '../config/index.js';
import { ReadlineConfirmer, waitForEnter } from '../lib/prompt.js';
import {
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface CheckOptions {
  yes?: boolean;
  backup?: boolean;
  maxAttempts?: string;
  json?: boolean;
}

export const RETRY_QUESTION = 'Fix it yourself, then check again?';

export function parseMaxAttempts(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError('--max-attempts', `expected a positive whole number, got "${value}"`);
  }
  return parsed;
}

function printOutcome(outcome: RunOutcome): void {
  switch (outcome.status) {
    case 'clean':
      printSuccess("I couldn't find a single problem in this resource pack.");
      break;
    case 'fixed': {
      const accepted = outcome.findings.filter(finding => finding.accepted).length;
      const declined = outcome.findings.length - accepted;
      printSuccess(`Done: ${accepted} fix(es) applied, ${declined} declined.`);
      printInfo('Reload the resource pack in game (F3+T) to see the result.');
      break;
    }
    case 'no-quick-fix':
      printError(outcome.issue?.message ?? 'A problem was found that cannot be fixed automatically.');
      printWarning('No quick fix is available for this problem.');
      break;
    case 'unrecoverable':
      printError(outcome.issue?.message ?? 'The resource pack cannot be checked.');
      break;
  }
}

export async function runCheck(
  directory: string,
  options: CheckOptions,
  confirmer: Confirmer
): Promise<RunOutcome> {
  const root = resolve(directory);
  const maxAttempts = parseMaxAttempts(options.maxAttempts, config.maxAttempts);
  const autoFix = options.yes === true ? true : config.autoFix;

  let spinner: Ora | null = null;

  const doctor = new PackDoctor({
    root,
    confirmer,
    autoFix,
    backup: options.backup === false ? false : config.backup,
    defaults: { packFormat: config.packFormat, description: config.description },
    indent: config.indent,
    // Without auto-fix the question itself shows the finding.
    onFinding: ({ message }, applied) => {
      if (applied && !options.json) printWarning(message);
    },
    onStateChange: ({ from, to }) => {
      if (options.json) return;
      if (to === 'BACKUP') {
        spinner = ora('Backing up resource pack...').start();
      } else if (from === 'BACKUP') {
        if (to === 'ABORTED') {
          spinner?.fail('Backup failed');
        } else {
          spinner?.succeed('Backup created');
        }
        spinner = null;
      }
    },
  });

  if (!options.json) {
    printHeader('Resource Pack Check');
    printKeyValue('Pack', root);
    console.log();
  }

  return retry(
    async (attempt) => {
      const started = Date.now();
      const outcome = await doctor.run();
      if (!options.json) {
        const backup = doctor.getBackup();
        if (backup && attempt === 1) {
          printInfo(`Backup saved to ${backup.backupDir} (${backup.filesCopied} files)`);
        }
        printOutcome(outcome);
        console.log(chalk.gray(`Pass ${attempt} finished in ${formatDuration(Date.now() - started)}`));
      }
      return outcome;
    },
    {
      maxAttempts,
      retryIf: async (outcome) => outcome.status === 'no-quick-fix' && confirmer.confirm(RETRY_QUESTION),
    }
  );
}

/**
 * Prompts stay off stdout while it carries the JSON outcome
 */
export function promptOutput(options: CheckOptions): NodeJS.WritableStream {
  return options.json ? process.stderr : process.stdout;
}

export async function checkCommand(
  directory: string | undefined,
  options: CheckOptions
): Promise<void> {
  const output = promptOutput(options);
  const outcome = await runCheck(directory ?? process.cwd(), options, new ReadlineConfirmer(process.stdin, output));

  if (options.json) {
    printJson(outcome);
  }

  if (outcome.status === 'unrecoverable') {
    await waitForEnter('Press enter to exit...', process.stdin, output);
  }
  if (outcome.status === 'unrecoverable' || outcome.status === 'no-quick-fix') {
    process.exitCode = 1;
  }
}
