import { describe, expect, it } from 'vitest';

import { classifyModel } from './modelClassifier.js';

const standard = {
  parent: 'item/handheld',
  textures: { layer0: 'item/sword' },
  overrides: [],
};

describe('classifyModel', () => {
  it('classifies a model whose layer0 matches its own name as standard', () => {
    expect(classifyModel('/pack/models/item/sword.json', standard)).toEqual({ ok: true, value: 'standard' });
  });

  it('classifies the same document under another name as custom', () => {
    expect(classifyModel('/pack/models/item/blade.json', standard)).toEqual({ ok: true, value: 'custom' });
  });

  it('classifies a texture map without layer0 as custom', () => {
    expect(classifyModel('/pack/models/item/sword.json', { textures: { 0: 'item/sword' } }))
      .toEqual({ ok: true, value: 'custom' });
  });

  it('classifies a non-object texture value as custom', () => {
    expect(classifyModel('/pack/models/item/sword.json', { textures: 'item/sword' }))
      .toEqual({ ok: true, value: 'custom' });
  });

  it('does not need a parent to be standard', () => {
    expect(classifyModel('/pack/models/item/sword.json', { textures: { layer0: 'item/sword' } }))
      .toEqual({ ok: true, value: 'standard' });
  });

  it('reports a model without textures', () => {
    const result = classifyModel('/pack/models/item/sword.json', { elements: [] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issue).toMatchObject({ kind: 'no-quick-fix', code: 'MISSING_TEXTURES', path: '/pack/models/item/sword.json' });
  });
});
