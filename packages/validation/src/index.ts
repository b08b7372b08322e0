/**
 * @pack-doctor/validation
 *
 * Resource pack checks.
 *
 * Responsibilities:
 * - Normalize resource names
 * - Check and repair pack.mcmeta
 * - Load and classify item model documents
 * - Validate override lists and custom models
 * - Reconcile declared references against files on disk
 * - Run a complete checking pass
 */

// Names
export {
  normalizeName,
  fixName,
  type NormalizedName,
  type FixedName,
} from './nameNormalizer.js';

// Documents
export {
  parseJson,
  displayPath,
  serializeDocument,
  loadDocument,
  writeDocument,
  type ParseResult,
} from './documentLoader.js';

// Metadata
export {
  checkPackMeta,
  createDefaultPackMeta,
  type MetadataCheckResult,
  type MetadataCheckStatus,
} from './metadataValidator.js';

// Models
export { classifyModel } from './modelClassifier.js';
export {
  checkOverrides,
  findAdjacentDuplicate,
  sortOverrides,
  type OverrideEntry,
} from './overrideValidator.js';
export { checkCustomModel } from './customModelValidator.js';

// Files
export {
  ensureExtension,
  ensureFileName,
  withExpectedExtension,
} from './fileChecks.js';
export { checkPackLayout } from './preconditions.js';

// Reconciliation
export {
  createReconciliationSets,
  compareSets,
  hasMismatches,
  formatReport,
  collectTextures,
  collectModels,
  walkPack,
  checkReferences,
  reconcilePack,
} from './reconciler.js';

// Complete pass
export {
  PackDoctor,
  AUTO_FIX_QUESTION,
  type PackDoctorOptions,
  type RunOutcome,
  type RunStatus,
} from './packDoctor.js';
