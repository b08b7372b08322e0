/**
 * Custom Model Validator
 *
 * Checks a model exported from a modelling tool: it needs geometry
 * ("elements"), a texture map, and no "#missing" placeholder textures.
 * Texture names are fixed together as one change to the texture map.
 */

import {
  MISSING_TEXTURE_MARKER,
  noQuickFix,
  ok,
  type CheckResult,
  type JsonObject,
  type RunContext,
} from '@pack-doctor/core';
import { isObject } from '@pack-doctor/utils';
import { displayPath, writeDocument } from './documentLoader.js';
import { normalizeName } from './nameNormalizer.js';

/**
 * Returns the texture identifiers the model uses (the map's values)
 */
export async function checkCustomModel(
  ctx: RunContext,
  filePath: string,
  document: JsonObject
): Promise<CheckResult<Set<string>>> {
  const textures = document['textures'];
  if (!isObject(textures)) {
    return noQuickFix(
      'TEXTURES_NOT_MAP',
      `"textures" is not an object in ${displayPath(filePath)}. The model was not exported properly.`,
      filePath
    );
  }

  const entries: Array<[string, string]> = [];
  for (const [slot, texture] of Object.entries(textures)) {
    if (typeof texture !== 'string') {
      return noQuickFix(
        'INVALID_TEXTURE_VALUE',
        `Texture "${slot}" in ${displayPath(filePath)} must be a string.`,
        filePath,
        { slot }
      );
    }
    entries.push([slot, texture]);
  }

  if (!('elements' in document)) {
    return noQuickFix(
      'MISSING_ELEMENTS',
      `Can't find the "elements" key in ${displayPath(filePath)}. The model was not exported properly.`,
      filePath
    );
  }

  if (JSON.stringify(document).includes(MISSING_TEXTURE_MARKER)) {
    return noQuickFix(
      'MISSING_TEXTURE_PLACEHOLDER',
      `A "#missing" texture was found in ${displayPath(filePath)}. A texture was not assigned before export.`,
      filePath
    );
  }

  const fixedEntries = entries.map(([slot, texture]): [string, string] => [slot, normalizeName(texture).normalized]);
  const needsFix = fixedEntries.some(([, texture], index) => texture !== entries[index]?.[1]);

  if (needsFix && await ctx.prompter.ask(
    'INVALID_TEXTURE_NAMES',
    `Invalid texture names in ${displayPath(filePath)}: names must be lowercase without spaces. Fix the texture map?`,
    filePath
  )) {
    document['textures'] = Object.fromEntries(fixedEntries);
    await writeDocument(filePath, document, ctx.indent);
    return ok(new Set(fixedEntries.map(([, texture]) => texture)));
  }

  return ok(new Set(entries.map(([, texture]) => texture)));
}
