import fs from 'node:fs/promises';
import path from 'node:path';
import { InputMissingError } from '../pipeline/errors.js';
import { isDirectory, listSorted, toPosixPath } from '../pipeline/utils.js';
import { readJsonFile } from '../store/fs.js';
import { createLogger } from '../utils/logger.js';
import { REQUIRED_ARCHIVES } from '../archive/check.js';

const logger = createLogger('verify');

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];
const BUNDLE_NAME_HINTS = ['coco', 'instances', 'annotations', 'train', 'val', 'test'];

export interface SplitCounts {
  images: number;
  annos: number;
}

export interface LayoutReport {
  exitCode: 0 | 1;
  archives: string[];
  splits?: Record<'train' | 'validation' | 'test', SplitCounts>;
  bundle?: { file: string; images: number; annotations: number; categories: number };
}

async function countFiles(dirPath: string, extensions: string[]): Promise<number> {
  if (!(await isDirectory(dirPath))) return 0;
  return (await listSorted(dirPath, { kind: 'file', extensions })).length;
}

async function countSplit(root: string, split: string): Promise<SplitCounts> {
  return {
    images: await countFiles(path.join(root, split, 'image'), IMAGE_EXTENSIONS),
    annos: await countFiles(path.join(root, split, 'annos'), ['.json']),
  };
}

async function findBundleCandidates(root: string): Promise<string[]> {
  const entries = await fs.readdir(root, { recursive: true, withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.json')
    .filter((entry) => BUNDLE_NAME_HINTS.some((hint) => entry.name.toLowerCase().includes(hint)))
    .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
    .sort();
}

function arrayLength(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return Array.isArray(field) ? field.length : undefined;
}

/**
 * Checks an extracted DeepFashion2 tree. Falls back to looking for an
 * already converted detection bundle when no native layout is present.
 */
export async function verifyLayout(rootDir: string): Promise<LayoutReport> {
  const root = path.resolve(rootDir);
  if (!(await isDirectory(root))) {
    throw new InputMissingError('Not found', root);
  }
  logger.log(`DeepFashion2 root: ${root}`);

  const zips = await listSorted(root, { kind: 'file', extensions: ['.zip'] });
  const bundles = new Set<string>(REQUIRED_ARCHIVES);
  const archives = zips.filter((name) => bundles.has(name));
  if (archives.length > 0) {
    logger.warn(`Detected zip bundles that are not extracted yet: ${zips.join(', ')}`);
    logger.warn('Extract them with the dataset password, then re-run this check.');
  }

  const splits = {
    train: await countSplit(root, 'train'),
    validation: await countSplit(root, 'validation'),
    test: await countSplit(root, 'test'),
  };
  const anyFound = Object.values(splits).some((counts) => counts.images > 0 || counts.annos > 0);
  if (anyFound) {
    for (const [split, counts] of Object.entries(splits)) {
      logger.log(`${split}: images=${counts.images} annos=${counts.annos}`);
    }
    const complete = splits.train.images > 0 && splits.train.annos > 0
      && splits.validation.images > 0 && splits.validation.annos > 0;
    if (!complete) logger.warn('Some splits look incomplete (images/annos missing).');
    return { exitCode: complete ? 0 : 1, archives, splits };
  }

  for (const candidate of await findBundleCandidates(root)) {
    let data: unknown;
    try {
      data = await readJsonFile(candidate);
    } catch (error) {
      logger.warn(`Skipping unreadable JSON ${candidate}`, error);
      continue;
    }
    const images = arrayLength(data, 'images');
    const annotations = arrayLength(data, 'annotations');
    if (images === undefined || annotations === undefined) continue;
    const bundle = {
      file: toPosixPath(path.relative(root, candidate)),
      images,
      annotations,
      categories: arrayLength(data, 'categories') ?? 0,
    };
    logger.log(`Detection bundle detected: ${bundle.file} images=${images} annotations=${annotations} categories=${bundle.categories}`);
    return { exitCode: 0, archives, bundle };
  }

  logger.warn('No extracted DeepFashion2 folders detected yet (and no detection bundle found).');
  return { exitCode: 1, archives };
}
