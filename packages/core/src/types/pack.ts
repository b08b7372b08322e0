/**
 * Resource Pack Types
 */

/**
 * A parsed JSON object as read from disk
 */
export type JsonObject = Record<string, unknown>;

/**
 * Item model documents come in two shapes:
 * - standard: a vanilla item whose overrides point at custom models
 * - custom: explicit geometry with its own texture map
 */
export type ModelKind = 'standard' | 'custom';

/**
 * Absolute locations inside a pack root
 */
export interface PackPaths {
  root: string;
  packMeta: string;
  assetsDir: string;
  minecraftDir: string;
  modelsDir: string;
  itemModelsDir: string;
  texturesDir: string;
}

/**
 * Values written when the metadata file has to be repaired
 */
export interface PackDefaults {
  packFormat: number;
  description: string;
}

/**
 * Identifiers collected while walking the pack. Add-only.
 */
export interface ReconciliationSets {
  modelRefs: Set<string>;
  modelFiles: Set<string>;
  textureRefs: Set<string>;
  textureFiles: Set<string>;
}

/**
 * Differences between declared references and files on disk, sorted
 */
export interface ReconciliationReport {
  danglingModelRefs: string[];
  unusedModelFiles: string[];
  danglingTextureRefs: string[];
  unusedTextureFiles: string[];
}

export const PACK_META_FILE = 'pack.mcmeta';
export const TEXTURE_EXTENSION = '.png';
export const MODEL_EXTENSION = '.json';
export const MISSING_TEXTURE_MARKER = '"#missing';
