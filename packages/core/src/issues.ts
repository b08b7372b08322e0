/**
 * Issues and check results
 *
 * Every check returns a CheckResult instead of throwing. A failed result
 * carries a PackIssue whose kind tells the caller how to proceed:
 *
 * - unrecoverable: a structural precondition is broken, the run aborts
 * - no-quick-fix: the content is invalid in a way that cannot be repaired
 *   automatically, the operator fixes it by hand and restarts
 *
 * Fixable problems never surface here; they go through the FixPrompter.
 */

export type IssueKind = 'unrecoverable' | 'no-quick-fix';

export type IssueCode =
  // Preconditions
  | 'MISSING_PACK_META'
  | 'MISSING_ASSETS_DIR'
  | 'MISSING_MODELS_DIR'
  | 'MISSING_TEXTURES_DIR'
  | 'BACKUP_FAILED'
  // Documents
  | 'MALFORMED_JSON'
  | 'NOT_AN_OBJECT'
  | 'MISSING_TEXTURES'
  | 'MISSING_OVERRIDES'
  | 'OVERRIDES_NOT_LIST'
  | 'INVALID_OVERRIDE'
  | 'DUPLICATE_CUSTOM_MODEL_DATA'
  | 'TEXTURES_NOT_MAP'
  | 'INVALID_TEXTURE_VALUE'
  | 'MISSING_ELEMENTS'
  | 'MISSING_TEXTURE_PLACEHOLDER'
  // Files
  | 'RENAME_TARGET_EXISTS'
  // Reconciliation
  | 'UNMATCHED_REFERENCES';

export interface PackIssue {
  kind: IssueKind;
  code: IssueCode;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
}

export type CheckResult<T> =
  | { ok: true; value: T }
  | { ok: false; issue: PackIssue };

export function ok<T>(value: T): CheckResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(issue: PackIssue): CheckResult<T> {
  return { ok: false, issue };
}

export function noQuickFix<T = never>(
  code: IssueCode,
  message: string,
  path?: string,
  details?: Record<string, unknown>
): CheckResult<T> {
  return fail({ kind: 'no-quick-fix', code, message, path, details });
}

export function unrecoverable<T = never>(
  code: IssueCode,
  message: string,
  path?: string,
  details?: Record<string, unknown>
): CheckResult<T> {
  return fail({ kind: 'unrecoverable', code, message, path, details });
}
