import path from 'node:path';
import fs from 'node:fs/promises';
import { readRepairedTable } from '../pipeline/csv.js';
import { InputMissingError } from '../pipeline/errors.js';
import type { DeepFashionImage, DeepFashionRecord, DeepFashionStats, TableRow } from '../pipeline/types.js';
import { compareStrings, fileStem, isDirectory, isFile, listSorted, toPosixPath } from '../pipeline/utils.js';
import { writeJsonFile } from '../store/fs.js';
import { JsonlWriter } from '../store/jsonl.js';
import { createLogger } from '../utils/logger.js';
import { FrequencyCounter } from './stats.js';

const logger = createLogger('deep-fashion');

export const DEEP_FASHION_SPLITS = ['train', 'val', 'test'] as const;
const METADATA_FILE = 'purchase_history.csv';
const TOP_N = 30;

/**
 * One entry per `images/<split>/*.jpg`. Exports reuse file names across
 * splits, so the outfit uid carries the split to keep such images apart.
 */
export async function listDeepFashionImages(datasetRoot: string): Promise<DeepFashionImage[]> {
  const images: DeepFashionImage[] = [];
  for (const split of DEEP_FASHION_SPLITS) {
    const splitDir = path.join(datasetRoot, 'images', split);
    if (!(await isDirectory(splitDir))) continue;
    for (const fileName of await listSorted(splitDir, { kind: 'file', extensions: ['.jpg'] })) {
      const imageId = fileStem(fileName);
      images.push({
        outfit_uid: `${split}:${imageId}`,
        image_id: imageId,
        split,
        image_relpath: toPosixPath(path.relative(datasetRoot, path.join(splitDir, fileName))),
      });
    }
  }
  return images;
}

export function groupRowsByImage(rows: TableRow[]): Map<string, TableRow[]> {
  const grouped = new Map<string, TableRow[]>();
  for (const row of rows) {
    const imageId = row.image_id ?? '';
    if (!imageId) continue;
    const bucket = grouped.get(imageId);
    if (bucket) bucket.push(row);
    else grouped.set(imageId, [row]);
  }
  return grouped;
}

export function sortImages(images: DeepFashionImage[]): DeepFashionImage[] {
  return [...images].sort((a, b) => compareStrings(a.split, b.split) || compareStrings(a.image_id, b.image_id));
}

export interface ManifestTallies {
  categories: FrequencyCounter;
  styles: FrequencyCounter;
}

export function assembleRecord(
  image: DeepFashionImage,
  metaRows: TableRow[],
  datasetRoot: string,
  tallies: ManifestTallies,
): DeepFashionRecord {
  const record: DeepFashionRecord = {
    source: 'deep_fashion',
    ...image,
    dataset_root: datasetRoot,
    user_ids: [],
    items: [],
    seasons: [],
    occasions: [],
    ratings: [],
  };

  for (const row of metaRows) {
    const userId = row.user_id ?? '';
    if (userId && !record.user_ids.includes(userId)) record.user_ids.push(userId);

    const category = row.category ?? '';
    const style = row.style ?? '';
    if (category || style) record.items.push({ category, style });
    if (category) tallies.categories.add(category);
    if (style) tallies.styles.add(style);

    if (row.season) record.seasons.push(row.season);
    if (row.occasion) record.occasions.push(row.occasion);
    if (row.rating) record.ratings.push(row.rating);
  }
  return record;
}

export interface DeepFashionOptions {
  datasetRoot: string;
  outManifest: string;
  outStats?: string;
}

export async function buildDeepFashionManifest(options: DeepFashionOptions): Promise<DeepFashionStats> {
  const datasetRoot = path.resolve(options.datasetRoot);
  if (!(await isDirectory(datasetRoot))) {
    throw new InputMissingError('Dataset root not found', datasetRoot);
  }

  const images = await listDeepFashionImages(datasetRoot);
  if (images.length === 0) {
    throw new InputMissingError('No images found under', path.join(datasetRoot, 'images'));
  }

  const metadataPath = path.join(datasetRoot, METADATA_FILE);
  if (!(await isFile(metadataPath))) {
    throw new InputMissingError('Missing metadata file', metadataPath);
  }
  const table = readRepairedTable(await fs.readFile(metadataPath));
  if (table.repair === 'unrepaired') {
    logger.warn(`Header of ${metadataPath} could not be repaired; rows may be incomplete`);
  }
  if (table.dropped > 0) {
    logger.warn(`Dropped ${table.dropped} malformed rows from ${metadataPath}`);
  }
  const byImage = groupRowsByImage(table.rows);

  const splitCounts = new FrequencyCounter();
  const tallies: ManifestTallies = { categories: new FrequencyCounter(), styles: new FrequencyCounter() };
  let withMetadata = 0;
  let missingMetadata = 0;

  const writer = await JsonlWriter.open(options.outManifest);
  try {
    for (const image of sortImages(images)) {
      const metaRows = byImage.get(image.image_id) ?? [];
      splitCounts.add(image.split);
      if (metaRows.length > 0) withMetadata += 1;
      else missingMetadata += 1;
      await writer.write(assembleRecord(image, metaRows, datasetRoot, tallies));
    }
  } finally {
    await writer.close();
  }

  const stats: DeepFashionStats = {
    dataset_root: datasetRoot,
    images_total: splitCounts.total,
    images_by_split: splitCounts.toRecord(),
    records_with_metadata: withMetadata,
    records_missing_metadata: missingMetadata,
    top_categories: tallies.categories.top(TOP_N),
    top_styles: tallies.styles.top(TOP_N),
  };

  if (options.outStats) {
    await writeJsonFile(options.outStats, stats, 2);
  }
  logger.log(JSON.stringify(stats, null, 2));
  logger.log(`Wrote manifest: ${options.outManifest}`);
  return stats;
}
