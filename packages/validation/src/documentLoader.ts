/**
 * Document Loader
 *
 * Reads JSON documents from the pack and writes them back in full.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { noQuickFix, ok, type CheckResult, type JsonObject } from '@pack-doctor/core';
import { isObject, logger, safeWriteFile, toPosixPath } from '@pack-doctor/utils';

export type ParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function parseJson(content: string): ParseResult {
  try {
    const value: unknown = JSON.parse(content);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Resolved, forward-slash path used in every operator-facing message
 */
export function displayPath(filePath: string): string {
  return toPosixPath(resolve(filePath));
}

export function serializeDocument(document: unknown, indent: number): string {
  return `${JSON.stringify(document, null, indent)}\n`;
}

/**
 * Load a JSON object. Malformed content cannot be repaired automatically
 * because its intended content is unknown.
 */
export async function loadDocument(filePath: string): Promise<CheckResult<JsonObject>> {
  const content = await readFile(filePath, 'utf8');
  const parsed = parseJson(content);

  if (!parsed.ok) {
    return noQuickFix(
      'MALFORMED_JSON',
      `Can't read ${displayPath(filePath)}, the JSON is malformed: ${parsed.error}`,
      filePath,
      { error: parsed.error }
    );
  }

  if (!isObject(parsed.value)) {
    return noQuickFix(
      'NOT_AN_OBJECT',
      `${displayPath(filePath)} must contain a JSON object at the top level.`,
      filePath
    );
  }

  return ok(parsed.value);
}

export async function writeDocument(
  filePath: string,
  document: JsonObject,
  indent: number
): Promise<void> {
  await safeWriteFile(filePath, serializeDocument(document, indent));
  logger.info({ path: filePath }, 'Document rewritten');
}
