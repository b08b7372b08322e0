/**
 * Pack layout preconditions. Nothing is checked or changed unless all hold.
 */

import { ok, unrecoverable, type CheckResult, type PackPaths } from '@pack-doctor/core';
import { isDirectory, isFile } from '@pack-doctor/utils';

export async function checkPackLayout(paths: PackPaths): Promise<CheckResult<PackPaths>> {
  if (!(await isFile(paths.packMeta))) {
    return unrecoverable(
      'MISSING_PACK_META',
      "Can't find `pack.mcmeta`. Are you sure this is the resource pack folder?",
      paths.packMeta
    );
  }

  if (!(await isDirectory(paths.minecraftDir))) {
    return unrecoverable(
      'MISSING_ASSETS_DIR',
      "Can't find `assets/minecraft`. Are you sure this is the resource pack folder?",
      paths.minecraftDir
    );
  }

  if (!(await isDirectory(paths.itemModelsDir))) {
    return unrecoverable(
      'MISSING_MODELS_DIR',
      "Can't find `assets/minecraft/models/item`. Only packs with item models can be checked.",
      paths.itemModelsDir
    );
  }

  if (!(await isDirectory(paths.texturesDir))) {
    return unrecoverable(
      'MISSING_TEXTURES_DIR',
      "Can't find `assets/minecraft/textures`.",
      paths.texturesDir
    );
  }

  return ok(paths);
}
