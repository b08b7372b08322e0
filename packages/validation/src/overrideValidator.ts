/**
 * Override List Validator
 *
 * Checks the "overrides" list of a standard item model:
 *
 *   "overrides": [
 *     { "predicate": { "custom_model_data": 1 }, "model": "item/ruby_sword" },
 *     { "predicate": { "custom_model_data": 2 }, "model": "item/ruby_axe" }
 *   ]
 *
 * Equal custom_model_data values next to each other can't be resolved
 * automatically. Only neighbours are compared: [2, 1, 2] passes.
 */

import { z } from 'zod';
import { noQuickFix, ok, type CheckResult, type JsonObject, type RunContext } from '@pack-doctor/core';
import { isObject } from '@pack-doctor/utils';
import { displayPath, writeDocument } from './documentLoader.js';
import { fixName } from './nameNormalizer.js';

const overrideSchema = z.object({
  predicate: z.object({
    custom_model_data: z.number().int(),
  }).passthrough(),
  model: z.string(),
}).passthrough();

const overridesSchema = z.array(overrideSchema);

export type OverrideEntry = z.infer<typeof overrideSchema>;

/**
 * A validated entry next to the object it was read from. Rewrites go
 * through `source` so each entry keeps its key order.
 */
interface OverrideRecord {
  entry: OverrideEntry;
  source: JsonObject;
}

/**
 * Value of the first entry equal to its predecessor, if any
 */
export function findAdjacentDuplicate(values: readonly number[]): number | undefined {
  for (let i = 1; i < values.length; i++) {
    if (values[i] === values[i - 1]) {
      return values[i];
    }
  }
  return undefined;
}

/**
 * Stable sort by custom_model_data, ascending
 */
export function sortOverrides<T>(overrides: readonly T[], customModelData: (override: T) => number): T[] {
  return [...overrides].sort((a, b) => customModelData(a) - customModelData(b));
}

function describeIssuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, part) => (typeof part === 'number' ? `${acc}[${part}]` : `${acc}.${part}`),
    'overrides'
  );
}

/**
 * Returns the model identifiers the overrides point at
 */
export async function checkOverrides(
  ctx: RunContext,
  filePath: string,
  document: JsonObject
): Promise<CheckResult<Set<string>>> {
  if (!('overrides' in document)) {
    return noQuickFix(
      'MISSING_OVERRIDES',
      `Can't find the "overrides" key in ${displayPath(filePath)}.`,
      filePath
    );
  }

  if (!Array.isArray(document['overrides'])) {
    return noQuickFix(
      'OVERRIDES_NOT_LIST',
      `"overrides" is not a list in ${displayPath(filePath)}.`,
      filePath
    );
  }

  const parsed = overridesSchema.safeParse(document['overrides']);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? describeIssuePath(first.path) : 'overrides';
    return noQuickFix(
      'INVALID_OVERRIDE',
      `Invalid override entry in ${displayPath(filePath)}: ${where}: ${first?.message ?? 'invalid value'}.`,
      filePath,
      { issues: parsed.error.issues.map(issue => ({ path: describeIssuePath(issue.path), message: issue.message })) }
    );
  }

  const sources: unknown[] = document['overrides'];
  let records: OverrideRecord[] = [];
  parsed.data.forEach((entry, index) => {
    const source = sources[index];
    if (isObject(source)) {
      records.push({ entry, source });
    }
  });

  const values = records.map(record => record.entry.predicate.custom_model_data);

  const duplicate = findAdjacentDuplicate(values);
  if (duplicate !== undefined) {
    return noQuickFix(
      'DUPLICATE_CUSTOM_MODEL_DATA',
      `Duplicate custom_model_data (${duplicate}) in ${displayPath(filePath)}.`,
      filePath,
      { customModelData: duplicate }
    );
  }

  const sorted = sortOverrides(records, record => record.entry.predicate.custom_model_data);
  const outOfOrder = sorted.some((record, index) => record !== records[index]);
  if (outOfOrder && await ctx.prompter.ask(
    'UNSORTED_OVERRIDES',
    `custom_model_data is not in ascending order in ${displayPath(filePath)}. Rearrange the overrides?`,
    filePath
  )) {
    records = sorted;
    document['overrides'] = records.map(record => record.source);
    await writeDocument(filePath, document, ctx.indent);
  }

  let renamed = false;
  for (const record of records) {
    const result = await fixName(ctx.prompter, record.entry.model, filePath);
    if (result.fixed) {
      record.entry.model = result.value;
      record.source['model'] = result.value;
      renamed = true;
    }
  }

  if (renamed) {
    await writeDocument(filePath, document, ctx.indent);
  }

  return ok(new Set(records.map(record => record.entry.model)));
}
