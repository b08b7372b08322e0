/**
 * Run Context
 *
 * Everything a check needs for one pass, passed explicitly instead of
 * living in module state.
 */

import { join, resolve } from 'node:path';
import { createLogger, type Logger } from '@pack-doctor/utils';
import type { FixPrompter } from './services/fixPrompter.js';
import { PACK_META_FILE, type PackDefaults, type PackPaths } from './types/pack.js';

export const DEFAULT_PACK_DEFAULTS: PackDefaults = {
  packFormat: 8,
  description: 'Fixed by WingedSeal-Bot',
};

export const DEFAULT_INDENT = 4;

export interface RunContext {
  paths: PackPaths;
  prompter: FixPrompter;
  defaults: PackDefaults;
  indent: number;
  logger: Logger;
}

export interface RunContextOptions {
  defaults?: Partial<PackDefaults>;
  indent?: number;
  logger?: Logger;
}

/**
 * Resolve the well-known locations inside a pack root
 */
export function resolvePackPaths(root: string): PackPaths {
  const absoluteRoot = resolve(root);
  const assetsDir = join(absoluteRoot, 'assets');
  const minecraftDir = join(assetsDir, 'minecraft');
  const modelsDir = join(minecraftDir, 'models');

  return {
    root: absoluteRoot,
    packMeta: join(absoluteRoot, PACK_META_FILE),
    assetsDir,
    minecraftDir,
    modelsDir,
    itemModelsDir: join(modelsDir, 'item'),
    texturesDir: join(minecraftDir, 'textures'),
  };
}

export function createRunContext(
  root: string,
  prompter: FixPrompter,
  options: RunContextOptions = {}
): RunContext {
  const paths = resolvePackPaths(root);

  return {
    paths,
    prompter,
    defaults: { ...DEFAULT_PACK_DEFAULTS, ...options.defaults },
    indent: options.indent ?? DEFAULT_INDENT,
    logger: options.logger ?? createLogger({ pack: paths.root }),
  };
}
