import fs from 'node:fs/promises';
import path from 'node:path';
import { readImageSize } from '../img/size.js';
import { InputMissingError } from '../pipeline/errors.js';
import type {
  BoundingBox,
  CanonicalAnnotation,
  CanonicalImage,
  DetectionBundle,
  Df2Split,
  ImageSize,
  ImageSizeReader,
  ItemAnnotation,
  JsonObject,
} from '../pipeline/types.js';
import { fileStem, isDirectory, isFile, listSorted } from '../pipeline/utils.js';
import { writeJsonFile, writeTextFile } from '../store/fs.js';
import { createLogger } from '../utils/logger.js';
import { CategoryRegistry } from './registry.js';

const logger = createLogger('convert');

const ITEM_KEY_PREFIX = 'item';
/** Paired image extensions, in the order they are tried. */
const IMAGE_EXTENSIONS = ['.jpg', '.png'] as const;
const MIN_BOX_SIDE = 1;

export interface SplitSource {
  annosDir: string;
  imagesDir: string;
  split: Df2Split;
  limit?: number;
  readSize?: ImageSizeReader;
  registry?: CategoryRegistry;
}

export interface ConversionCounts {
  documents: number;
  missingImages: number;
  unreadableImages: number;
  unreadableDocuments: number;
  skippedItems: number;
}

export interface SplitConversion {
  bundle: DetectionBundle;
  registry: CategoryRegistry;
  counts: ConversionCounts;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBoundingBox(value: unknown): value is BoundingBox {
  return (
    Array.isArray(value)
    && value.length === 4
    && value.every((coordinate) => typeof coordinate === 'number' && Number.isFinite(coordinate))
  );
}

/** Item slots whose value carries a four-number box and an integral category id. */
export function extractItems(document: JsonObject): { items: ItemAnnotation[]; skipped: number } {
  const items: ItemAnnotation[] = [];
  let skipped = 0;
  for (const [key, value] of Object.entries(document)) {
    if (!key.startsWith(ITEM_KEY_PREFIX) || !isJsonObject(value)) continue;
    const box = value.bounding_box;
    const categoryId = value.category_id;
    if (!isBoundingBox(box) || typeof categoryId !== 'number' || !Number.isInteger(categoryId)) {
      skipped += 1;
      continue;
    }
    const name = value.category_name;
    items.push({
      bounding_box: box,
      category_id: categoryId,
      category_name: typeof name === 'string' ? name : undefined,
    });
  }
  return { items, skipped };
}

/** Converts corner form to `[x, y, width, height]`, or undefined when a side is at most one pixel. */
export function toDetectionBox([x1, y1, x2, y2]: BoundingBox): BoundingBox | undefined {
  const width = Math.max(0, x2 - x1);
  const height = Math.max(0, y2 - y1);
  if (width <= MIN_BOX_SIDE || height <= MIN_BOX_SIDE) return undefined;
  return [x1, y1, width, height];
}

async function resolvePairedImage(imagesDir: string, stem: string): Promise<string | undefined> {
  for (const extension of IMAGE_EXTENSIONS) {
    const candidate = path.join(imagesDir, `${stem}${extension}`);
    if (await isFile(candidate)) return candidate;
  }
  return undefined;
}

async function loadDocument(filePath: string): Promise<JsonObject | undefined> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    return isJsonObject(parsed) ? parsed : undefined;
  } catch (error) {
    logger.warn(`Unreadable annotation ${filePath}`, error);
    return undefined;
  }
}

async function readSizeOrSkip(readSize: ImageSizeReader, imagePath: string): Promise<ImageSize | undefined> {
  try {
    return await readSize(imagePath);
  } catch (error) {
    logger.warn(`Unreadable image ${imagePath}`, error);
    return undefined;
  }
}

function declaredSize(document: JsonObject): ImageSize | undefined {
  const { width, height } = document;
  if (typeof width === 'number' && Number.isInteger(width) && typeof height === 'number' && Number.isInteger(height)) {
    return { width, height };
  }
  return undefined;
}

/**
 * Builds the detection bundle for one split. Documents are visited in
 * file-name order, which fixes the sequential image and annotation ids.
 */
export async function convertSplit(source: SplitSource): Promise<SplitConversion> {
  const readSize = source.readSize ?? readImageSize;
  const registry = source.registry ?? new CategoryRegistry();
  const limit = source.limit ?? 0;
  const images: CanonicalImage[] = [];
  const annotations: CanonicalAnnotation[] = [];
  const counts: ConversionCounts = {
    documents: 0,
    missingImages: 0,
    unreadableImages: 0,
    unreadableDocuments: 0,
    skippedItems: 0,
  };

  const annotationFiles = await listSorted(source.annosDir, { kind: 'file', extensions: ['.json'] });
  for (const fileName of annotationFiles) {
    counts.documents += 1;
    const stem = fileStem(fileName);
    const imagePath = await resolvePairedImage(source.imagesDir, stem);
    if (!imagePath) {
      counts.missingImages += 1;
      continue;
    }
    const document = await loadDocument(path.join(source.annosDir, fileName));
    if (!document) {
      counts.unreadableDocuments += 1;
      continue;
    }

    const size = declaredSize(document) ?? (await readSizeOrSkip(readSize, imagePath));
    if (!size) {
      counts.unreadableImages += 1;
      continue;
    }
    const image: CanonicalImage = {
      id: images.length,
      file_name: path.basename(imagePath),
      width: size.width,
      height: size.height,
    };
    images.push(image);

    const { items, skipped } = extractItems(document);
    counts.skippedItems += skipped;
    for (const item of items) {
      if (item.category_name !== undefined) {
        registry.register(item.category_id, item.category_name);
      }
      const bbox = toDetectionBox(item.bounding_box);
      if (!bbox) {
        counts.skippedItems += 1;
        continue;
      }
      annotations.push({
        id: annotations.length,
        image_id: image.id,
        category_id: item.category_id,
        bbox,
        area: bbox[2] * bbox[3],
        iscrowd: 0,
        segmentation: [],
      });
    }

    if (limit > 0 && images.length >= limit) break;
  }

  return {
    bundle: {
      info: { description: `DeepFashion2 ${source.split} -> detection` },
      licenses: [],
      images,
      annotations,
      categories: registry.toCategories(),
    },
    registry,
    counts,
  };
}

export interface ConvertOptions {
  df2Root: string;
  outDir: string;
  split: Df2Split;
  limit?: number;
  readSize?: ImageSizeReader;
}

export interface ConvertResult extends SplitConversion {
  bundlePath: string;
  classesPath: string;
}

export async function convertDeepFashion2(options: ConvertOptions): Promise<ConvertResult> {
  const annosDir = path.join(options.df2Root, options.split, 'annos');
  const imagesDir = path.join(options.df2Root, options.split, 'image');

  if (options.split === 'test' && !(await isDirectory(annosDir))) {
    throw new InputMissingError('Test annotations not present; cannot build detection labels', annosDir);
  }
  if (!(await isDirectory(annosDir))) {
    throw new InputMissingError('Missing annos dir', annosDir);
  }
  if (!(await isDirectory(imagesDir))) {
    throw new InputMissingError('Missing image dir', imagesDir);
  }

  const conversion = await convertSplit({
    annosDir,
    imagesDir,
    split: options.split,
    limit: options.limit,
    readSize: options.readSize,
  });

  const bundlePath = path.join(options.outDir, `instances_${options.split}.json`);
  const classesPath = path.join(options.outDir, 'classes.txt');
  await writeJsonFile(bundlePath, conversion.bundle);
  await writeTextFile(classesPath, conversion.registry.toListing());

  const { images, annotations, categories } = conversion.bundle;
  logger.log(`Wrote: ${bundlePath}`);
  logger.log(`Images: ${images.length}  Annotations: ${annotations.length}  Categories: ${categories.length}`);
  const { missingImages, unreadableImages, unreadableDocuments, skippedItems } = conversion.counts;
  if (missingImages + unreadableImages + unreadableDocuments + skippedItems > 0) {
    logger.warn(
      `Skipped ${missingImages} documents without images, ${unreadableImages} with unreadable images, `
        + `${unreadableDocuments} unreadable documents and ${skippedItems} items`,
    );
  }
  logger.log(`Wrote: ${classesPath}`);

  return { ...conversion, bundlePath, classesPath };
}
