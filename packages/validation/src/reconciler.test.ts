import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { isFile } from '@pack-doctor/utils';
import { afterEach, describe, expect, it } from 'vitest';

import {
  compareSets,
  createReconciliationSets,
  formatReport,
  hasMismatches,
  reconcilePack,
  walkPack,
} from './reconciler.js';
import {
  ITEM_MODELS,
  TEXTURES,
  createTempPack,
  createTestContext,
  customModel,
  removeTempPack,
  standardModel,
  type PackFiles,
} from './test-helpers.js';

const consistentPack: PackFiles = {
  [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [[1, 'item/ruby_sword']]),
  [`${ITEM_MODELS}/ruby_sword.json`]: customModel({ 0: 'item/ruby' }),
  [`${TEXTURES}/item/ruby.png`]: 'png',
};

describe('compareSets', () => {
  it('computes the four sorted differences', () => {
    const sets = createReconciliationSets();
    ['item/b', 'item/a', 'item/shared'].forEach(id => sets.modelRefs.add(id));
    ['item/shared', 'item/unused'].forEach(id => sets.modelFiles.add(id));
    ['item/gone'].forEach(id => sets.textureRefs.add(id));
    ['item/spare'].forEach(id => sets.textureFiles.add(id));

    expect(compareSets(sets)).toEqual({
      danglingModelRefs: ['item/a', 'item/b'],
      unusedModelFiles: ['item/unused'],
      danglingTextureRefs: ['item/gone'],
      unusedTextureFiles: ['item/spare'],
    });
  });

  it('reports nothing for matching sets', () => {
    const sets = createReconciliationSets();
    sets.modelRefs.add('item/a');
    sets.modelFiles.add('item/a');

    expect(hasMismatches(compareSets(sets))).toBe(false);
  });
});

describe('formatReport', () => {
  it('writes one line per non-empty difference with file extensions on unused files', () => {
    expect(formatReport({
      danglingModelRefs: ['item/a'],
      unusedModelFiles: ['item/b', 'item/c'],
      danglingTextureRefs: [],
      unusedTextureFiles: ['item/d'],
    })).toBe(
      'File not found for model keys: [item/a]\n' +
      'Unused model files: [item/b.json, item/c.json]\n' +
      'Unused texture files: [item/d.png]'
    );
  });
});

describe('reconcilePack', () => {
  let root: string;

  afterEach(async () => {
    await removeTempPack(root);
  });

  it('accepts a pack whose references all resolve', async () => {
    root = await createTempPack(consistentPack);
    const { ctx, confirmer } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result).toEqual({
      ok: true,
      value: { danglingModelRefs: [], unusedModelFiles: [], danglingTextureRefs: [], unusedTextureFiles: [] },
    });
    expect(confirmer.questions).toHaveLength(0);
  });

  it('reports a texture file nothing references', async () => {
    root = await createTempPack({ ...consistentPack, [`${TEXTURES}/item/foo.png`]: 'png' });
    const { ctx } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue.code).toBe('UNMATCHED_REFERENCES');
    expect(result.issue.message).toBe("Some names don't match:\nUnused texture files: [item/foo.png]");
  });

  it('reports a texture reference without a file', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${ITEM_MODELS}/ruby_sword.json`]: customModel({ 0: 'item/ruby', 1: 'item/bar' }),
    });
    const { ctx } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue.message).toBe("Some names don't match:\nFile not found for texture keys: [item/bar]");
  });

  it('reports model references without a file and model files nothing references', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [[1, 'item/jade_sword']]),
    });
    const { ctx } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue.message).toBe(
      "Some names don't match:\n" +
      'File not found for model keys: [item/jade_sword]\n' +
      'Unused model files: [item/ruby_sword.json]'
    );
    expect(result.issue.details).toEqual({
      report: {
        danglingModelRefs: ['item/jade_sword'],
        unusedModelFiles: ['item/ruby_sword'],
        danglingTextureRefs: [],
        unusedTextureFiles: [],
      },
    });
  });

  it('stops at the first model that cannot be fixed', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${ITEM_MODELS}/broken.json`]: '{ "textures": ',
      [`${TEXTURES}/item/foo.png`]: 'png',
    });
    const { ctx } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue.code).toBe('MALFORMED_JSON');
    expect(result.issue.path).toBe(path.join(root, ITEM_MODELS, 'broken.json'));
  });

  it('rejects a custom model with a "#missing" texture without offering a fix', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${ITEM_MODELS}/ruby_sword.json`]: {
        textures: { 0: 'item/ruby' },
        elements: [{ from: [0, 0, 0], to: [1, 1, 1], faces: { down: { texture: '#missing' } } }],
      },
    });
    const { ctx, confirmer } = createTestContext(root);

    const result = await reconcilePack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue).toMatchObject({
      kind: 'no-quick-fix',
      code: 'MISSING_TEXTURE_PLACEHOLDER',
      path: path.join(root, ITEM_MODELS, 'ruby_sword.json'),
    });
    expect(confirmer.questions).toHaveLength(0);
  });

  it('collects renamed files under their new names', async () => {
    root = await createTempPack({
      [`${ITEM_MODELS}/diamond_sword.json`]: standardModel('diamond_sword', [[1, 'item/ruby_sword']]),
      [`${ITEM_MODELS}/Ruby Sword.json.txt`]: customModel({ 0: 'item/ruby' }),
      [`${TEXTURES}/item/Ruby.png`]: 'png',
    });
    const { ctx, confirmer } = createTestContext(root, { autoFix: true });

    const result = await walkPack(ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.textureFiles]).toEqual(['item/ruby']);
    expect([...result.value.modelFiles]).toEqual(['item/ruby_sword']);
    expect(confirmer.questions).toHaveLength(0);
    expect(await isFile(path.join(root, ITEM_MODELS, 'ruby_sword.json'))).toBe(true);
    expect(await isFile(path.join(root, TEXTURES, 'item', 'ruby.png'))).toBe(true);
  });

  it('stops when a texture rename would replace another texture', async () => {
    root = await createTempPack({
      ...consistentPack,
      [`${TEXTURES}/item/Ruby.png`]: 'other png',
    });
    const { ctx, confirmer } = createTestContext(root, { autoFix: true });

    const result = await walkPack(ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue).toMatchObject({
      kind: 'no-quick-fix',
      code: 'RENAME_TARGET_EXISTS',
      path: path.join(root, TEXTURES, 'item', 'Ruby.png'),
    });
    expect(confirmer.questions).toHaveLength(0);
    expect(await readFile(path.join(root, TEXTURES, 'item', 'ruby.png'), 'utf8')).toBe('png');
    expect(await readFile(path.join(root, TEXTURES, 'item', 'Ruby.png'), 'utf8')).toBe('other png');
  });
});
