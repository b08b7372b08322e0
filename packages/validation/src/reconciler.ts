/**
 * Reconciliation Engine
 *
 * Walks textures/ and models/item/, checks every file on the way, and
 * compares the identifiers the models declare with the files on disk:
 *
 * - model references without a model file
 * - model files nothing references
 * - texture references without a texture file
 * - texture files nothing references
 *
 * Mismatches are reported once, after the whole walk.
 */

import {
  MODEL_EXTENSION,
  TEXTURE_EXTENSION,
  noQuickFix,
  ok,
  type CheckResult,
  type ReconciliationReport,
  type ReconciliationSets,
  type RunContext,
} from '@pack-doctor/core';
import { listFiles, toRelativeStem } from '@pack-doctor/utils';
import { checkCustomModel } from './customModelValidator.js';
import { loadDocument } from './documentLoader.js';
import { ensureExtension, ensureFileName } from './fileChecks.js';
import { classifyModel } from './modelClassifier.js';
import { checkOverrides } from './overrideValidator.js';

export function createReconciliationSets(): ReconciliationSets {
  return {
    modelRefs: new Set(),
    modelFiles: new Set(),
    textureRefs: new Set(),
    textureFiles: new Set(),
  };
}

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter(value => !b.has(value)).sort();
}

export function compareSets(sets: ReconciliationSets): ReconciliationReport {
  return {
    danglingModelRefs: difference(sets.modelRefs, sets.modelFiles),
    unusedModelFiles: difference(sets.modelFiles, sets.modelRefs),
    danglingTextureRefs: difference(sets.textureRefs, sets.textureFiles),
    unusedTextureFiles: difference(sets.textureFiles, sets.textureRefs),
  };
}

export function hasMismatches(report: ReconciliationReport): boolean {
  return report.danglingModelRefs.length > 0 ||
    report.unusedModelFiles.length > 0 ||
    report.danglingTextureRefs.length > 0 ||
    report.unusedTextureFiles.length > 0;
}

const formatList = (values: readonly string[]): string => `[${values.join(', ')}]`;

export function formatReport(report: ReconciliationReport): string {
  const lines: string[] = [];

  if (report.danglingModelRefs.length > 0) {
    lines.push(`File not found for model keys: ${formatList(report.danglingModelRefs)}`);
  }
  if (report.unusedModelFiles.length > 0) {
    lines.push(`Unused model files: ${formatList(report.unusedModelFiles.map(id => `${id}${MODEL_EXTENSION}`))}`);
  }
  if (report.danglingTextureRefs.length > 0) {
    lines.push(`File not found for texture keys: ${formatList(report.danglingTextureRefs)}`);
  }
  if (report.unusedTextureFiles.length > 0) {
    lines.push(`Unused texture files: ${formatList(report.unusedTextureFiles.map(id => `${id}${TEXTURE_EXTENSION}`))}`);
  }

  return lines.join('\n');
}

export async function collectTextures(
  ctx: RunContext,
  sets: ReconciliationSets
): Promise<CheckResult<void>> {
  const { texturesDir } = ctx.paths;

  for (const original of await listFiles(texturesDir)) {
    const withExtension = await ensureExtension(ctx, original, TEXTURE_EXTENSION);
    if (!withExtension.ok) {
      return withExtension;
    }

    const named = await ensureFileName(ctx, withExtension.value);
    if (!named.ok) {
      return named;
    }
    sets.textureFiles.add(toRelativeStem(texturesDir, named.value));
  }

  return ok(undefined);
}

export async function collectModels(
  ctx: RunContext,
  sets: ReconciliationSets
): Promise<CheckResult<void>> {
  const { itemModelsDir, modelsDir } = ctx.paths;

  for (const original of await listFiles(itemModelsDir)) {
    const withExtension = await ensureExtension(ctx, original, MODEL_EXTENSION);
    if (!withExtension.ok) {
      return withExtension;
    }

    const loaded = await loadDocument(withExtension.value);
    if (!loaded.ok) {
      return loaded;
    }
    const document = loaded.value;

    const named = await ensureFileName(ctx, withExtension.value);
    if (!named.ok) {
      return named;
    }
    const filePath = named.value;

    const kind = classifyModel(filePath, document);
    if (!kind.ok) {
      return kind;
    }

    if (kind.value === 'standard') {
      const models = await checkOverrides(ctx, filePath, document);
      if (!models.ok) {
        return models;
      }
      models.value.forEach(model => sets.modelRefs.add(model));
    } else {
      sets.modelFiles.add(toRelativeStem(modelsDir, filePath));

      const textures = await checkCustomModel(ctx, filePath, document);
      if (!textures.ok) {
        return textures;
      }
      textures.value.forEach(texture => sets.textureRefs.add(texture));
    }

    ctx.logger.debug({ path: filePath, kind: kind.value }, 'Model checked');
  }

  return ok(undefined);
}

/**
 * Walk textures and models, filling the identifier sets
 */
export async function walkPack(
  ctx: RunContext,
  sets: ReconciliationSets = createReconciliationSets()
): Promise<CheckResult<ReconciliationSets>> {
  const textures = await collectTextures(ctx, sets);
  if (!textures.ok) {
    return textures;
  }

  const models = await collectModels(ctx, sets);
  if (!models.ok) {
    return models;
  }

  ctx.logger.info({
    modelRefs: sets.modelRefs.size,
    modelFiles: sets.modelFiles.size,
    textureRefs: sets.textureRefs.size,
    textureFiles: sets.textureFiles.size,
  }, 'Pack walked');

  return ok(sets);
}

/**
 * Turn the collected sets into the final report
 */
export function checkReferences(
  ctx: RunContext,
  sets: ReconciliationSets
): CheckResult<ReconciliationReport> {
  const report = compareSets(sets);

  if (hasMismatches(report)) {
    return noQuickFix(
      'UNMATCHED_REFERENCES',
      `Some names don't match:\n${formatReport(report)}`,
      ctx.paths.root,
      { report }
    );
  }

  return ok(report);
}

export async function reconcilePack(ctx: RunContext): Promise<CheckResult<ReconciliationReport>> {
  const walked = await walkPack(ctx);
  if (!walked.ok) {
    return walked;
  }

  return checkReferences(ctx, walked.value);
}
