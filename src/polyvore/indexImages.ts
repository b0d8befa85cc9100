import path from 'node:path';
import { InputMissingError } from '../pipeline/errors.js';
import type { ImageIndexEntry } from '../pipeline/types.js';
import { fileStem, isDirectory, listSorted, toPosixPath } from '../pipeline/utils.js';
import { JsonlWriter } from '../store/jsonl.js';
import { createLogger } from '../utils/logger.js';
import { composeItemUid } from './itemUid.js';

const logger = createLogger('polyvore-index');

const IMAGES_DIR_NAME = 'images';

/** `<root>/images`, or the root itself when it already is the `images` folder. */
export async function resolveImagesBase(imagesRoot: string): Promise<string> {
  if (!(await isDirectory(imagesRoot))) {
    throw new InputMissingError('Not found', imagesRoot);
  }
  const nested = path.join(imagesRoot, IMAGES_DIR_NAME);
  if (await isDirectory(nested)) return nested;
  if (path.basename(imagesRoot) === IMAGES_DIR_NAME) return imagesRoot;
  throw new InputMissingError('Missing expected folder', nested);
}

export interface IndexWalkStats {
  duplicates: number;
}

/**
 * Walks `<set_id>/<index>.jpg` in sorted order at both levels. A UID that was
 * already produced in this walk is skipped so each UID maps to one file.
 */
export async function* walkImageIndex(imagesRoot: string, stats: IndexWalkStats = { duplicates: 0 }): AsyncGenerator<ImageIndexEntry> {
  const base = await resolveImagesBase(imagesRoot);
  const seen = new Set<string>();
  for (const setId of await listSorted(base, { kind: 'directory' })) {
    const setDir = path.join(base, setId);
    for (const fileName of await listSorted(setDir, { kind: 'file', extensions: ['.jpg'] })) {
      const index = fileStem(fileName);
      const itemUid = composeItemUid(setId, index);
      if (seen.has(itemUid)) {
        stats.duplicates += 1;
        logger.warn(`Duplicate item uid ${itemUid} at ${path.join(setDir, fileName)}`);
        continue;
      }
      seen.add(itemUid);
      yield {
        item_uid: itemUid,
        set_id: setId,
        index,
        image_relpath: toPosixPath(path.relative(imagesRoot, path.join(setDir, fileName))),
        exists: true,
      };
    }
  }
}

export interface IndexImagesOptions {
  imagesRoot: string;
  out: string;
}

export interface IndexImagesResult {
  written: number;
  duplicates: number;
}

/** Rebuilds the index file from scratch; an existing index is overwritten, not merged. */
export async function indexPolyvoreImages(options: IndexImagesOptions): Promise<IndexImagesResult> {
  const stats: IndexWalkStats = { duplicates: 0 };
  const entries = walkImageIndex(options.imagesRoot, stats);
  // Resolve the layout before truncating a previous index.
  const first = await entries.next();

  const writer = await JsonlWriter.open(options.out);
  try {
    if (!first.done) {
      await writer.write(first.value);
      for await (const entry of entries) {
        await writer.write(entry);
      }
    }
  } finally {
    await writer.close();
  }

  logger.log(`Wrote ${writer.written} item image mappings -> ${options.out}`);
  return { written: writer.written, duplicates: stats.duplicates };
}
