/**
 * Backup Service
 *
 * Copies the assets tree and the metadata file into
 * <root>/backup/<YYYYMMDD-HHmmss>/ before anything is modified.
 */

import { join } from 'node:path';
import { copyDir, copyFile, formatTimestamp, logger } from '@pack-doctor/utils';
import { ok, unrecoverable, type CheckResult } from '../issues.js';
import { PACK_META_FILE, type PackPaths } from '../types/pack.js';

export interface BackupResult {
  backupDir: string;
  filesCopied: number;
}

export async function createBackup(
  paths: PackPaths,
  now: Date = new Date()
): Promise<CheckResult<BackupResult>> {
  const backupDir = join(paths.root, 'backup', formatTimestamp(now));

  try {
    const assetFiles = await copyDir(paths.assetsDir, join(backupDir, 'assets'));
    await copyFile(paths.packMeta, join(backupDir, PACK_META_FILE));

    logger.info({ backupDir, files: assetFiles + 1 }, 'Backup created');
    return ok({ backupDir, filesCopied: assetFiles + 1 });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error({ backupDir, err: error }, 'Backup failed');
    return unrecoverable(
      'BACKUP_FAILED',
      `I couldn't back up the resource pack into ${backupDir}: ${reason}`,
      backupDir
    );
  }
}
