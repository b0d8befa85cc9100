import { z } from 'zod';
import type { JsonObject, OutfitItemRef, OutfitRecord } from '../pipeline/types.js';

const outfitCoreSchema = z
  .object({ items: z.array(z.record(z.unknown())).nullish() })
  .passthrough();

const OUTFIT_ID_KEYS = ['source', 'split', 'outfit_uid', 'set_id'] as const;
const OUTFIT_TEXT_KEYS = ['set_url', 'date', 'desc'] as const;

type OutfitIdKey = (typeof OUTFIT_ID_KEYS)[number];
type OutfitTextKey = (typeof OUTFIT_TEXT_KEYS)[number];

function isOptionalText(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function parseItemRef(raw: JsonObject): OutfitItemRef {
  const item: OutfitItemRef = { extra: {} };
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'item_uid' && typeof value === 'string') item.item_uid = value;
    else if (key === 'local_image_relpath' && typeof value === 'string') item.local_image_relpath = value;
    else if (key === 'local_image_abspath' && typeof value === 'string') item.local_image_abspath = value;
    else item.extra[key] = value;
  }
  return item;
}

/**
 * Reads one outfit line. Any JSON object whose `items`, when present, is a
 * list of objects is accepted; fields of an unexpected type, and every
 * unmodeled field, are kept in `extra`.
 */
export function parseOutfitRecord(value: unknown): OutfitRecord | undefined {
  const core = outfitCoreSchema.safeParse(value);
  if (!core.success) return undefined;

  const record: OutfitRecord = { items: (core.data.items ?? []).map(parseItemRef), extra: {} };
  for (const [key, field] of Object.entries(core.data)) {
    if (key === 'items') continue;
    const idKey = OUTFIT_ID_KEYS.find((candidate): candidate is OutfitIdKey => candidate === key);
    const textKey = OUTFIT_TEXT_KEYS.find((candidate): candidate is OutfitTextKey => candidate === key);
    if (idKey && typeof field === 'string') {
      record[idKey] = field;
    } else if (textKey && isOptionalText(field)) {
      record[textKey] = field;
    } else {
      record.extra[key] = field;
    }
  }
  return record;
}

export function serializeItemRef(item: OutfitItemRef): JsonObject {
  return {
    ...(item.item_uid !== undefined ? { item_uid: item.item_uid } : {}),
    ...item.extra,
    ...(item.local_image_relpath !== undefined ? { local_image_relpath: item.local_image_relpath } : {}),
    ...(item.local_image_abspath !== undefined ? { local_image_abspath: item.local_image_abspath } : {}),
  };
}

export function serializeOutfitRecord(record: OutfitRecord): JsonObject {
  const fields: JsonObject = {};
  for (const key of [...OUTFIT_ID_KEYS, ...OUTFIT_TEXT_KEYS]) {
    if (record[key] !== undefined) fields[key] = record[key];
  }
  return {
    ...fields,
    items: record.items.map(serializeItemRef),
    ...record.extra,
  };
}
