/**
 * @pack-doctor/core
 *
 * Core package containing:
 * - Run state machine
 * - Run context and fix prompting
 * - Issue and result types
 * - Backup service
 * - Error handling
 * - Shared types
 */

// State machine
export {
  RUN_STATES,
  RunStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  RunState,
  RunStateTransition,
} from './stateMachine.js';

// Types
export {
  PACK_META_FILE,
  TEXTURE_EXTENSION,
  MODEL_EXTENSION,
  MISSING_TEXTURE_MARKER,
} from './types/pack.js';

export type {
  JsonObject,
  ModelKind,
  PackPaths,
  PackDefaults,
  ReconciliationSets,
  ReconciliationReport,
} from './types/pack.js';

// Issues
export {
  ok,
  fail,
  noQuickFix,
  unrecoverable,
} from './issues.js';

export type {
  IssueKind,
  IssueCode,
  PackIssue,
  CheckResult,
} from './issues.js';

// Run context
export {
  DEFAULT_PACK_DEFAULTS,
  DEFAULT_INDENT,
  resolvePackPaths,
  createRunContext,
} from './context.js';

export type {
  RunContext,
  RunContextOptions,
} from './context.js';

// Services
export {
  FixPrompter,
  type Confirmer,
  type FixFinding,
  type FindingListener,
  type FixPrompterOptions,
} from './services/fixPrompter.js';
export { createBackup, type BackupResult } from './services/backupService.js';

// Errors
export {
  PackDoctorError,
  ValidationError,
  StateTransitionError,
} from './errors/index.js';
