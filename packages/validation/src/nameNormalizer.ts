/**
 * Name Normalizer
 *
 * Resource locations must be lowercase and may not contain spaces.
 * Identifiers compare equal iff their normalized forms are equal.
 */

import type { FixPrompter } from '@pack-doctor/core';

export interface NormalizedName {
  needsFix: boolean;
  normalized: string;
}

export interface FixedName {
  fixed: boolean;
  value: string;
}

export function normalizeName(value: string): NormalizedName {
  const needsFix = value !== value.toLowerCase() || value.includes(' ');

  return {
    needsFix,
    normalized: needsFix ? value.replace(/ /g, '_').toLowerCase() : value,
  };
}

/**
 * Offer the normalized form of a name. The original value comes back
 * untouched when nothing is wrong or the fix is declined.
 */
export async function fixName(
  prompter: FixPrompter,
  value: string,
  path?: string
): Promise<FixedName> {
  const { needsFix, normalized } = normalizeName(value);
  if (!needsFix) {
    return { fixed: false, value };
  }

  const accepted = await prompter.ask(
    'INVALID_NAME',
    `Invalid name "${value}": names must be lowercase without spaces. Rename it to "${normalized}"?`,
    path
  );

  return accepted ? { fixed: true, value: normalized } : { fixed: false, value };
}
