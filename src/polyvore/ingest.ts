import path from 'node:path';
import { InputMissingError, PipelineError } from '../pipeline/errors.js';
import type { FitbQuestion, JsonObject, OutfitItemRef, OutfitRecord } from '../pipeline/types.js';
import { isFile, requireDirectory } from '../pipeline/utils.js';
import { readJsonFile } from '../store/fs.js';
import { JsonlWriter } from '../store/jsonl.js';
import { createLogger } from '../utils/logger.js';
import { composeItemUid, composeOutfitUid } from './itemUid.js';
import { serializeOutfitRecord } from './records.js';

const logger = createLogger('polyvore');

export const SPLIT_FILES = {
  train: 'train_no_dup.json',
  val: 'valid_no_dup.json',
  test: 'test_no_dup.json',
} as const;

const FITB_FILES = ['fill_in_blank_test.json', 'fill_in_the_blank_test.json'];
const COMPATIBILITY_FILES = ['fashion_compatibility_prediction.txt', 'fashion-compatibility-prediction.txt'];
const MAX_ITEMS_PER_OUTFIT = 8;

export interface IngestPolyvoreOptions {
  polyvoreDir: string;
  outOutfits: string;
  outFitb: string;
}

export interface IngestPolyvoreResult {
  outfits: number;
  items: number;
  fitbQuestions: number;
  skippedOutfits: number;
  skippedItems: number;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function pickFirstExisting(root: string, names: string[], label: string): Promise<string> {
  for (const name of names) {
    const candidate = path.join(root, name);
    if (await isFile(candidate)) return candidate;
  }
  throw new InputMissingError(`Missing ${label} (${names.join(' or ')})`, root);
}

async function readJsonArray(filePath: string): Promise<unknown[]> {
  const data = await readJsonFile(filePath);
  if (!Array.isArray(data)) {
    throw new PipelineError(`Unexpected JSON structure in ${filePath}`);
  }
  return data;
}

function normalizeSetId(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/** Item refs for the first eight items; items without an index cannot get a UID and are dropped. */
export function normalizeItems(setId: string, rawItems: unknown): { items: OutfitItemRef[]; skipped: number } {
  const list = Array.isArray(rawItems) ? rawItems.slice(0, MAX_ITEMS_PER_OUTFIT) : [];
  const items: OutfitItemRef[] = [];
  let skipped = 0;
  for (const raw of list) {
    const index = isJsonObject(raw) ? raw.index : undefined;
    if (!isJsonObject(raw) || (typeof index !== 'string' && typeof index !== 'number')) {
      skipped += 1;
      continue;
    }
    items.push({
      item_uid: composeItemUid(setId, index),
      extra: {
        set_id: setId,
        index,
        categoryid: raw.categoryid ?? null,
        name: raw.name ?? null,
        price: raw.price ?? null,
        likes: raw.likes ?? null,
        image_url: raw.image ?? null,
      },
    });
  }
  return { items, skipped };
}

export function toOutfitRecord(split: string, raw: unknown): { record?: OutfitRecord; skippedItems: number } {
  if (!isJsonObject(raw)) return { skippedItems: 0 };
  const setId = normalizeSetId(raw.set_id);
  if (!setId) return { skippedItems: 0 };

  const { items, skipped } = normalizeItems(setId, raw.items);
  return {
    record: {
      source: 'polyvore',
      split,
      outfit_uid: composeOutfitUid(setId),
      set_id: setId,
      set_url: typeof raw.set_url === 'string' ? raw.set_url : null,
      date: typeof raw.date === 'string' ? raw.date : null,
      desc: typeof raw.desc === 'string' ? raw.desc : null,
      items,
      extra: {},
    },
    skippedItems: skipped,
  };
}

export function toFitbQuestion(raw: unknown): FitbQuestion | undefined {
  if (!isJsonObject(raw)) return undefined;
  const answers = Array.isArray(raw.answers) ? raw.answers : [];
  return {
    source: 'polyvore',
    question_id: raw.question ?? null,
    blank_position: raw.blank_position ?? null,
    answers,
    correct_answer: answers.length > 0 ? answers[0] : null,
  };
}

export async function ingestPolyvore(options: IngestPolyvoreOptions): Promise<IngestPolyvoreResult> {
  await requireDirectory(options.polyvoreDir, 'Not found');

  const splitPaths = Object.entries(SPLIT_FILES).map(([split, name]) => ({
    split,
    filePath: path.join(options.polyvoreDir, name),
  }));
  for (const { filePath } of splitPaths) {
    if (!(await isFile(filePath))) throw new InputMissingError('Missing split file', filePath);
  }
  const fitbPath = await pickFirstExisting(options.polyvoreDir, FITB_FILES, 'FITB json');
  // Only presence is checked; the compatibility file comes in several formats.
  await pickFirstExisting(options.polyvoreDir, COMPATIBILITY_FILES, 'compatibility txt');

  const result: IngestPolyvoreResult = { outfits: 0, items: 0, fitbQuestions: 0, skippedOutfits: 0, skippedItems: 0 };

  const outfitWriter = await JsonlWriter.open(options.outOutfits);
  try {
    for (const { split, filePath } of splitPaths) {
      for (const raw of await readJsonArray(filePath)) {
        const { record, skippedItems } = toOutfitRecord(split, raw);
        result.skippedItems += skippedItems;
        if (!record) {
          result.skippedOutfits += 1;
          continue;
        }
        await outfitWriter.write(serializeOutfitRecord(record));
        result.outfits += 1;
        result.items += record.items.length;
      }
    }
  } finally {
    await outfitWriter.close();
  }

  const fitbWriter = await JsonlWriter.open(options.outFitb);
  try {
    for (const raw of await readJsonArray(fitbPath)) {
      const question = toFitbQuestion(raw);
      if (!question) continue;
      await fitbWriter.write(question);
      result.fitbQuestions += 1;
    }
  } finally {
    await fitbWriter.close();
  }

  logger.log(`Wrote outfits: ${result.outfits} -> ${options.outOutfits}`);
  logger.log(`Wrote FITB questions: ${result.fitbQuestions} -> ${options.outFitb}`);
  logger.log(`Total items referenced (first ${MAX_ITEMS_PER_OUTFIT} per outfit): ${result.items}`);
  if (result.skippedOutfits > 0 || result.skippedItems > 0) {
    logger.warn(`Skipped ${result.skippedOutfits} outfits without set_id and ${result.skippedItems} items without index`);
  }
  return result;
}
