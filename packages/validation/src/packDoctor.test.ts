import { rm } from 'node:fs/promises';
import path from 'node:path';
import type { RunStateTransition } from '@pack-doctor/core';
import { isFile } from '@pack-doctor/utils';
import { afterEach, describe, expect, it } from 'vitest';

import { AUTO_FIX_QUESTION, PackDoctor } from './packDoctor.js';
import {
  ITEM_MODELS,
  ScriptedConfirmer,
  TEXTURES,
  VALID_PACK_META,
  createTempPack,
  customModel,
  readJsonFile,
  removeTempPack,
  standardModel,
} from './test-helpers.js';

const statesOf = (history: RunStateTransition[]): string[] => history.map(transition => transition.to);

const consistentPack = {
  'pack.mcmeta': VALID_PACK_META,
  [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [[1, 'item/ruby_sword']]),
  [`${ITEM_MODELS}/ruby_sword.json`]: customModel({ 0: 'item/ruby' }),
  [`${TEXTURES}/item/ruby.png`]: 'png',
};

describe('PackDoctor', () => {
  let root: string;

  afterEach(async () => {
    await removeTempPack(root);
  });

  it('aborts before asking anything when pack.mcmeta is missing', async () => {
    root = await createTempPack({ [`${TEXTURES}/item/ruby.png`]: 'png' });
    const confirmer = new ScriptedConfirmer();

    const outcome = await new PackDoctor({ root, confirmer }).run();

    expect(outcome.status).toBe('unrecoverable');
    expect(outcome.issue?.code).toBe('MISSING_PACK_META');
    expect(statesOf(outcome.history)).toEqual(['PRECONDITION_CHECK', 'ABORTED']);
    expect(confirmer.questions).toHaveLength(0);
    expect(await isFile(path.join(root, 'pack.mcmeta'))).toBe(false);
  });

  it('names the missing textures directory', async () => {
    root = await createTempPack(consistentPack);
    await rm(path.join(root, TEXTURES), { recursive: true });

    const outcome = await new PackDoctor({ root, confirmer: new ScriptedConfirmer() }).run();

    expect(outcome.status).toBe('unrecoverable');
    expect(outcome.issue).toMatchObject({
      code: 'MISSING_TEXTURES_DIR',
      path: path.join(root, TEXTURES),
    });
  });

  it('backs up the pack and reports a clean pass', async () => {
    root = await createTempPack(consistentPack);
    const confirmer = new ScriptedConfirmer([false]);

    const outcome = await new PackDoctor({
      root,
      confirmer,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    }).run();

    expect(outcome.status).toBe('clean');
    expect(outcome.findings).toEqual([]);
    expect(confirmer.questions).toEqual([AUTO_FIX_QUESTION]);
    expect(statesOf(outcome.history)).toEqual([
      'PRECONDITION_CHECK',
      'BACKUP',
      'CONFIRM_AUTO_FIX',
      'METADATA_CHECK',
      'TREE_WALK',
      'REPORT',
      'DONE',
    ]);
    expect(outcome.backup).toEqual({
      backupDir: path.join(root, 'backup', '20240102-030405'),
      filesCopied: 4,
    });
    expect(await isFile(path.join(root, 'backup', '20240102-030405', 'pack.mcmeta'))).toBe(true);
    expect(await isFile(path.join(root, 'backup', '20240102-030405', TEXTURES, 'item', 'ruby.png'))).toBe(true);
  });

  it('fixes a pack and finds nothing on the next pass', async () => {
    root = await createTempPack({
      'pack.mcmeta': { pack: { pack_format: 8 } },
      [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [
        [2, 'item/Jade Sword'],
        [1, 'item/ruby_sword'],
      ]),
      [`${ITEM_MODELS}/jade_sword.json`]: customModel({ 0: 'item/jade' }),
      [`${ITEM_MODELS}/ruby_sword.json`]: customModel({ 0: 'item/Ruby' }),
      [`${TEXTURES}/item/jade.png`]: 'png',
      [`${TEXTURES}/item/Ruby.png`]: 'png',
    });

    const first = await new PackDoctor({
      root,
      confirmer: new ScriptedConfirmer(),
      autoFix: true,
      backup: false,
    }).run();

    expect(first.status).toBe('fixed');
    expect(first.findings.map(finding => finding.code)).toEqual([
      'MISSING_DESCRIPTION',
      'INVALID_NAME',
      'UNSORTED_OVERRIDES',
      'INVALID_NAME',
      'INVALID_TEXTURE_NAMES',
    ]);
    expect(first.findings.every(finding => finding.accepted)).toBe(true);
    expect(await readJsonFile(path.join(root, ITEM_MODELS, 'diamond_sword.json'))).toEqual(
      standardModel('diamond_sword', [[1, 'item/ruby_sword'], [2, 'item/jade_sword']])
    );

    const confirmer = new ScriptedConfirmer();
    const second = await new PackDoctor({ root, confirmer, autoFix: false, backup: false }).run();

    expect(second.status).toBe('clean');
    expect(second.findings).toEqual([]);
    expect(confirmer.questions).toHaveLength(0);
  });

  it('stops on a problem it cannot fix', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [[1, 'item/ruby_sword'], [1, 'item/other']]),
    });

    const outcome = await new PackDoctor({
      root,
      confirmer: new ScriptedConfirmer(),
      autoFix: false,
      backup: false,
    }).run();

    expect(outcome.status).toBe('no-quick-fix');
    expect(outcome.issue?.code).toBe('DUPLICATE_CUSTOM_MODEL_DATA');
    expect(statesOf(outcome.history)).toEqual([
      'PRECONDITION_CHECK',
      'CONFIRM_AUTO_FIX',
      'METADATA_CHECK',
      'TREE_WALK',
      'FAILED',
    ]);
  });

  it('fails in the report state when references do not match', async () => {
    root = await createTempPack({ ...consistentPack, [`${TEXTURES}/item/foo.png`]: 'png' });

    const outcome = await new PackDoctor({
      root,
      confirmer: new ScriptedConfirmer(),
      autoFix: false,
      backup: false,
    }).run();

    expect(outcome.status).toBe('no-quick-fix');
    expect(outcome.issue?.code).toBe('UNMATCHED_REFERENCES');
    expect(statesOf(outcome.history).slice(-2)).toEqual(['REPORT', 'FAILED']);
  });

  it('takes the backup only on the first pass of an instance', async () => {
    root = await createTempPack(consistentPack);
    const doctor = new PackDoctor({
      root,
      confirmer: new ScriptedConfirmer(),
      autoFix: false,
      now: () => new Date(2024, 5, 1, 12, 0, 0),
    });

    const first = await doctor.run();
    const second = await doctor.run();

    expect(statesOf(first.history)).toContain('BACKUP');
    expect(statesOf(second.history)).not.toContain('BACKUP');
    expect(second.backup).toEqual(first.backup);
    expect(doctor.getBackup()?.backupDir).toBe(path.join(root, 'backup', '20240601-120000'));
  });

  it('reports findings and state changes to its listeners', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${TEXTURES}/item/Ruby.png`]: 'png',
    });
    await rm(path.join(root, TEXTURES, 'item', 'ruby.png'));
    const findings: string[] = [];
    const states: string[] = [];

    const outcome = await new PackDoctor({
      root,
      confirmer: new ScriptedConfirmer([true]),
      autoFix: false,
      backup: false,
      onFinding: finding => findings.push(finding.code),
      onStateChange: transition => states.push(transition.to),
    }).run();

    expect(outcome.status).toBe('fixed');
    expect(findings).toEqual(['INVALID_NAME']);
    expect(states).toEqual(statesOf(outcome.history));
  });
});
