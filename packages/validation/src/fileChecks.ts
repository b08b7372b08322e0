/**
 * File Checks
 *
 * Extension and naming checks for files in the pack. Each check offers a
 * rename and returns the path the file lives at afterwards. A rename that
 * would replace another file is never offered.
 */

import { basename, dirname, join, relative } from 'node:path';
import { noQuickFix, ok, type CheckResult, type RunContext } from '@pack-doctor/core';
import { getBasename, getExtension, isOccupied, logger, moveFile, toPosixPath } from '@pack-doctor/utils';
import { displayPath } from './documentLoader.js';
import { fixName, normalizeName } from './nameNormalizer.js';

/**
 * Name a file should have to carry the expected extension. A stem that
 * already ends with it ("sword.png.bak") just loses the trailing part.
 */
export function withExpectedExtension(filePath: string, extension: string): string {
  const stem = getBasename(filePath);
  const name = stem.endsWith(extension) ? stem : `${stem}${extension}`;
  return join(dirname(filePath), name);
}

function renameBlocked(filePath: string, target: string): CheckResult<string> {
  return noQuickFix(
    'RENAME_TARGET_EXISTS',
    `Can't rename ${displayPath(filePath)} to ${displayPath(target)}: another file already has that name.`,
    filePath,
    { target }
  );
}

export async function ensureExtension(
  ctx: RunContext,
  filePath: string,
  extension: string
): Promise<CheckResult<string>> {
  if (getExtension(filePath) === extension) {
    return ok(filePath);
  }

  const target = withExpectedExtension(filePath, extension);
  if (await isOccupied(filePath, target)) {
    return renameBlocked(filePath, target);
  }

  const accepted = await ctx.prompter.ask(
    'WRONG_EXTENSION',
    `"${basename(filePath)}" is not a ${extension} file. Rename it to "${basename(target)}"?`,
    filePath
  );
  if (!accepted) {
    return ok(filePath);
  }

  await moveFile(filePath, target);
  logger.info({ from: filePath, to: target }, 'File renamed');
  return ok(target);
}

/**
 * Normalize the path of a file relative to the pack root
 */
export async function ensureFileName(ctx: RunContext, filePath: string): Promise<CheckResult<string>> {
  const { root } = ctx.paths;
  const relativePath = toPosixPath(relative(root, filePath));

  const { needsFix, normalized } = normalizeName(relativePath);
  if (needsFix && await isOccupied(filePath, join(root, normalized))) {
    return renameBlocked(filePath, join(root, normalized));
  }

  const result = await fixName(ctx.prompter, relativePath, filePath);
  if (!result.fixed) {
    return ok(filePath);
  }

  const target = join(root, result.value);
  await moveFile(filePath, target);
  logger.info({ from: filePath, to: target }, 'File renamed');
  return ok(target);
}
