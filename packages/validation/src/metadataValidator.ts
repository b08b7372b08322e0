/**
 * Metadata Validator
 *
 * Checks and repairs pack.mcmeta:
 *
 * {
 *   "pack": {
 *     "pack_format": 8,
 *     "description": "..."
 *   }
 * }
 *
 * A document that can't be parsed, or has no "pack" object, can only be
 * reset as a whole. Otherwise each field is fixed on its own and the
 * document is always written back.
 */

import { readFile } from 'node:fs/promises';
import type { JsonObject, PackDefaults, RunContext } from '@pack-doctor/core';
import { isInteger, isObject } from '@pack-doctor/utils';
import { parseJson, writeDocument } from './documentLoader.js';

export type MetadataCheckStatus = 'reset' | 'reset-declined' | 'checked';

export interface MetadataCheckResult {
  status: MetadataCheckStatus;
  document?: JsonObject;
}

export function createDefaultPackMeta(defaults: PackDefaults): JsonObject {
  return {
    pack: {
      pack_format: defaults.packFormat,
      description: defaults.description,
    },
  };
}

type PackMetaShape =
  | { valid: true; document: JsonObject; pack: JsonObject }
  | { valid: false; reason: string };

function inspectPackMeta(content: string): PackMetaShape {
  const parsed = parseJson(content);
  if (!parsed.ok) {
    return { valid: false, reason: `pack.mcmeta is not valid JSON (${parsed.error}).` };
  }

  const document = parsed.value;
  if (!isObject(document)) {
    return { valid: false, reason: 'pack.mcmeta must contain a JSON object.' };
  }

  const pack = document['pack'];
  if (!isObject(pack)) {
    return { valid: false, reason: 'pack.mcmeta has no "pack" object.' };
  }

  return { valid: true, document, pack };
}

const PACK_FORMAT_TOKEN = /"pack_format"\s*:\s*(-?\d[\d.eE+-]*)/;

/**
 * JSON.parse reads `8.0` and `8e0` as 8, so the number is checked as it
 * appears in the file. Non-numeric values are left to the type check.
 */
export function writtenAsInteger(content: string): boolean {
  const token = PACK_FORMAT_TOKEN.exec(content)?.[1];
  return token === undefined || /^-?\d+$/.test(token);
}

export async function checkPackMeta(ctx: RunContext): Promise<MetadataCheckResult> {
  const { packMeta } = ctx.paths;
  const { prompter, defaults } = ctx;

  const content = await readFile(packMeta, 'utf8');
  const shape = inspectPackMeta(content);

  if (!shape.valid) {
    const reset = await prompter.ask(
      'INVALID_PACK_META',
      `${shape.reason} Reset it to the default metadata?`,
      packMeta
    );
    if (!reset) {
      return { status: 'reset-declined' };
    }

    const document = createDefaultPackMeta(defaults);
    await writeDocument(packMeta, document, ctx.indent);
    return { status: 'reset', document };
  }

  const { document, pack } = shape;

  if (!('pack_format' in pack)) {
    if (await prompter.ask(
      'MISSING_PACK_FORMAT',
      `pack.mcmeta has no "pack_format". Set it to ${defaults.packFormat}?`,
      packMeta
    )) {
      pack['pack_format'] = defaults.packFormat;
    }
  } else if (!isInteger(pack['pack_format']) || !writtenAsInteger(content)) {
    if (await prompter.ask(
      'INVALID_PACK_FORMAT',
      `"pack_format" in pack.mcmeta must be a whole number. Set it to ${defaults.packFormat}?`,
      packMeta
    )) {
      pack['pack_format'] = defaults.packFormat;
    }
  }

  if (!('description' in pack)) {
    if (await prompter.ask(
      'MISSING_DESCRIPTION',
      `pack.mcmeta has no "description". Set it to "${defaults.description}"?`,
      packMeta
    )) {
      pack['description'] = defaults.description;
    }
  }

  await writeDocument(packMeta, document, ctx.indent);
  return { status: 'checked', document };
}
