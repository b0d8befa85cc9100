import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InputMissingError } from '../src/pipeline/errors.js';
import { inferSplit, ingestSop } from '../src/sop/ingest.js';
import { makeTempDir, readLines, removeDir, writeTree } from './helpers.js';

describe('inferSplit', () => {
  it('reads the split from the file suffix', () => {
    expect(inferSplit('user_outfit_pos_train.csv')).toBe('train');
    expect(inferSplit('user_outfit_neg_testing100.csv')).toBe('testing100');
    expect(inferSplit('user_outfit_pos_all.csv')).toBeNull();
  });
});

describe('ingestSop', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('writes one interaction per row across matching files', async () => {
    await writeTree(root, {
      'sop/user_outfit_pos_val.csv': 'user_id,user_idx,outfit_id,matched\nu2,8,o2,0\n',
      'sop/user_outfit_pos_train.csv': 'user_idx,outfit_id,matched\n7,o1,1\n,,\n',
      'sop/user_outfit.csv': 'user_id,outfit_id\nu9,o9\n',
      'sop/readme.csv': 'a,b\n1,2\n',
    });
    const out = path.join(root, 'out/sop.jsonl');

    const result = await ingestSop({ sopDir: path.join(root, 'sop'), out });

    expect(result).toEqual({ files: 2, written: 2, dropped: 1 });
    expect(await readLines(out)).toEqual([
      {
        source: 'sop',
        split: 'train',
        file: 'user_outfit_pos_train.csv',
        user_id: '7',
        outfit_id: 'o1',
        matched: '1',
      },
      {
        source: 'sop',
        split: 'val',
        file: 'user_outfit_pos_val.csv',
        user_id: 'u2',
        outfit_id: 'o2',
        matched: '0',
      },
    ]);
  });

  it('fills absent columns with null', async () => {
    await writeTree(root, { 'sop/user_outfit_x_all.csv': 'outfit_id\no5\n' });
    const out = path.join(root, 'sop.jsonl');

    await ingestSop({ sopDir: path.join(root, 'sop'), out });
    expect(await readLines(out)).toEqual([
      { source: 'sop', split: null, file: 'user_outfit_x_all.csv', user_id: null, outfit_id: 'o5', matched: null },
    ]);
  });

  it('fails when no interaction files are present', async () => {
    await writeTree(root, { 'sop/readme.csv': 'a\n1\n' });

    await expect(ingestSop({ sopDir: path.join(root, 'sop'), out: path.join(root, 'sop.jsonl') })).rejects.toBeInstanceOf(
      InputMissingError,
    );
  });
});
