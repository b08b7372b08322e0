import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FixPrompter, createRunContext, type Confirmer, type RunContext } from '@pack-doctor/core';

/**
 * Confirmer answering from a fixed script. Runs out → throws, so a test
 * fails loudly when more questions are asked than expected.
 */
export class ScriptedConfirmer implements Confirmer {
  readonly questions: string[] = [];

  constructor(private readonly answers: boolean[] = []) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected question: ${question}`);
    }
    return answer;
  }
}

export type PackFiles = Record<string, string | object>;

export const ITEM_MODELS = 'assets/minecraft/models/item';
export const TEXTURES = 'assets/minecraft/textures';

export const VALID_PACK_META = {
  pack: { pack_format: 8, description: 'Test pack' },
};

/**
 * Write a pack under a fresh temp dir. Object values are written as
 * 4-space JSON, strings as-is.
 */
export async function createTempPack(files: PackFiles): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'pack-doctor-'));

  await mkdir(path.join(root, ITEM_MODELS), { recursive: true });
  await mkdir(path.join(root, TEXTURES), { recursive: true });

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(
      filePath,
      typeof content === 'string' ? content : `${JSON.stringify(content, null, 4)}\n`,
      'utf8'
    );
  }

  return root;
}

export async function removeTempPack(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf8'));
}

export function createTestContext(
  root: string,
  options: { answers?: boolean[]; autoFix?: boolean } = {}
): { ctx: RunContext; confirmer: ScriptedConfirmer } {
  const confirmer = new ScriptedConfirmer(options.answers);
  const prompter = new FixPrompter({ confirmer, autoFix: options.autoFix });
  return { ctx: createRunContext(root, prompter), confirmer };
}

export function standardModel(stem: string, overrides: Array<[number, string]>): object {
  return {
    parent: 'item/handheld',
    textures: { layer0: `item/${stem}` },
    overrides: overrides.map(([customModelData, model]) => ({
      predicate: { custom_model_data: customModelData },
      model,
    })),
  };
}

export function customModel(textures: Record<string, string>): object {
  return {
    textures,
    elements: [
      { from: [0, 0, 0], to: [16, 16, 16], faces: { north: { texture: '#0' } } },
    ],
  };
}
