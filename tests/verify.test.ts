import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { verifyLayout } from '../src/detection/verify.js';
import { InputMissingError } from '../src/pipeline/errors.js';
import { makeTempDir, removeDir, writeTree } from './helpers.js';

describe('verifyLayout', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('passes when train and validation hold images and annotations, counting exact extensions only', async () => {
    await writeTree(root, {
      'train/image/000001.jpg': '',
      'train/image/000002.JPG': '',
      'train/annos/000001.json': '{}',
      'validation/image/000001.png': '',
      'validation/annos/000001.json': '{}',
      'validation/annos/readme.txt': '',
    });

    const report = await verifyLayout(root);
    expect(report.exitCode).toBe(0);
    expect(report.splits).toEqual({
      train: { images: 1, annos: 1 },
      validation: { images: 1, annos: 1 },
      test: { images: 0, annos: 0 },
    });
  });

  it('fails when a required split is incomplete', async () => {
    await writeTree(root, {
      'train/image/000001.jpg': '',
      'train/annos/000001.json': '{}',
      'validation/image/000001.jpg': '',
    });

    expect((await verifyLayout(root)).exitCode).toBe(1);
  });

  it('accepts an already converted detection bundle', async () => {
    await writeTree(root, {
      'out/instances_train.json': JSON.stringify({ images: [{}], annotations: [], categories: [{}, {}] }),
      'out/classes.json': '{}',
    });

    const report = await verifyLayout(root);
    expect(report).toEqual({
      exitCode: 0,
      archives: [],
      bundle: { file: 'out/instances_train.json', images: 1, annotations: 0, categories: 2 },
    });
  });

  it('notes zip bundles that are not extracted', async () => {
    await writeTree(root, { 'train.zip': '', 'other.zip': '' });

    expect(await verifyLayout(root)).toEqual({ exitCode: 1, archives: ['train.zip'] });
  });

  it('rejects a missing root', async () => {
    await expect(verifyLayout(path.join(root, 'missing'))).rejects.toBeInstanceOf(InputMissingError);
  });
});
