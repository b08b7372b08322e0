/**
 * Model Document Classifier
 *
 * A standard document is a vanilla item model whose base layer points at
 * the item's own texture ("item/<stem>") and whose overrides route custom
 * model data to other models. Anything else is treated as a custom model.
 */

import { noQuickFix, ok, type CheckResult, type JsonObject, type ModelKind } from '@pack-doctor/core';
import { getBasename, isObject } from '@pack-doctor/utils';
import { displayPath } from './documentLoader.js';

export function classifyModel(filePath: string, document: JsonObject): CheckResult<ModelKind> {
  if (!('textures' in document)) {
    return noQuickFix(
      'MISSING_TEXTURES',
      `Can't find the "textures" key in ${displayPath(filePath)}. The model was not exported properly.`,
      filePath
    );
  }

  const textures = document['textures'];
  const isStandard = isObject(textures) &&
    'layer0' in textures &&
    textures['layer0'] === `item/${getBasename(filePath)}`;

  return ok(isStandard ? 'standard' : 'custom');
}
