import path from 'node:path';
import type { JoinSummary, OutfitRecord } from '../pipeline/types.js';
import { InputMissingError } from '../pipeline/errors.js';
import { isDirectory, isFile } from '../pipeline/utils.js';
import { JsonlWriter, readJsonLines } from '../store/jsonl.js';
import { createLogger } from '../utils/logger.js';
import { parseOutfitRecord, serializeOutfitRecord } from './records.js';

const logger = createLogger('polyvore-join');

export type ItemImageIndex = Map<string, string>;

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field ? field : undefined;
}

/** Loads `item_uid -> image_relpath` from an index manifest. */
export async function loadItemImageIndex(filePath: string): Promise<ItemImageIndex> {
  const index: ItemImageIndex = new Map();
  for await (const line of readJsonLines(filePath)) {
    if (!line.ok) {
      logger.warn(`Skipping unreadable index line ${line.lineNumber} in ${filePath}: ${line.error}`);
      continue;
    }
    const uid = readString(line.value, 'item_uid');
    const relpath = readString(line.value, 'image_relpath');
    if (uid && relpath) index.set(uid, relpath);
  }
  return index;
}

/**
 * Adds local paths to every item whose UID is in the index. Unresolved
 * items are left as they are.
 */
export function joinOutfit(record: OutfitRecord, index: ItemImageIndex, imagesRoot: string): { items: number; resolved: number } {
  let resolved = 0;
  for (const item of record.items) {
    const relpath = item.item_uid === undefined ? undefined : index.get(item.item_uid);
    if (!relpath) continue;
    item.local_image_relpath = relpath;
    item.local_image_abspath = path.resolve(imagesRoot, relpath);
    resolved += 1;
  }
  return { items: record.items.length, resolved };
}

export function resolutionPercent(resolved: number, items: number): number {
  return items > 0 ? (resolved / items) * 100 : 0;
}

export interface AugmentOptions {
  outfitsIn: string;
  itemImages: string;
  imagesRoot: string;
  outfitsOut: string;
}

export async function augmentOutfits(options: AugmentOptions): Promise<JoinSummary> {
  const imagesRoot = path.resolve(options.imagesRoot);
  if (!(await isDirectory(imagesRoot))) throw new InputMissingError('Not found', imagesRoot);
  if (!(await isFile(options.itemImages))) throw new InputMissingError('Missing item image index', options.itemImages);
  if (!(await isFile(options.outfitsIn))) throw new InputMissingError('Missing outfits manifest', options.outfitsIn);

  const index = await loadItemImageIndex(options.itemImages);
  const summary: JoinSummary = { outfits: 0, items: 0, resolved: 0, percent: 0, skipped: 0 };

  const writer = await JsonlWriter.open(options.outfitsOut);
  try {
    for await (const line of readJsonLines(options.outfitsIn)) {
      const record = line.ok ? parseOutfitRecord(line.value) : undefined;
      if (!record) {
        summary.skipped += 1;
        logger.warn(`Skipping unreadable outfit line ${line.lineNumber} in ${options.outfitsIn}`);
        continue;
      }
      const { items, resolved } = joinOutfit(record, index, imagesRoot);
      summary.outfits += 1;
      summary.items += items;
      summary.resolved += resolved;
      await writer.write(serializeOutfitRecord(record));
    }
  } finally {
    await writer.close();
  }

  summary.percent = resolutionPercent(summary.resolved, summary.items);
  logger.log(`Outfits: ${summary.outfits}`);
  logger.log(`Items: ${summary.items}`);
  logger.log(`Resolved images: ${summary.resolved} (${summary.percent.toFixed(1)}%)`);
  logger.log(`Wrote: ${options.outfitsOut}`);
  return summary;
}
