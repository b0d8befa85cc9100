import path from 'node:path';
import { loadTable } from '../pipeline/csv.js';
import { InputMissingError } from '../pipeline/errors.js';
import type { InteractionRecord, TableRow } from '../pipeline/types.js';
import { listSorted, requireDirectory } from '../pipeline/utils.js';
import { JsonlWriter } from '../store/jsonl.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sop');

const INTERACTION_FILE_PATTERN = /^user_outfit_.*_.*\.csv$/;
export const SPLIT_VOCABULARY = ['train', 'val', 'test', 'testing', 'testing100'] as const;

/** Split named by the `_<split>.csv` suffix, or null when the suffix is not in the vocabulary. */
export function inferSplit(fileName: string): string | null {
  return SPLIT_VOCABULARY.find((split) => fileName.endsWith(`_${split}.csv`)) ?? null;
}

export function toInteractionRecord(row: TableRow, fileName: string, split: string | null): InteractionRecord {
  return {
    source: 'sop',
    split,
    file: fileName,
    user_id: row.user_id || row.user_idx || null,
    outfit_id: row.outfit_id ?? null,
    matched: row.matched ?? null,
  };
}

export interface IngestSopOptions {
  sopDir: string;
  out: string;
}

export interface IngestSopResult {
  files: number;
  written: number;
  dropped: number;
}

export async function ingestSop(options: IngestSopOptions): Promise<IngestSopResult> {
  await requireDirectory(options.sopDir, 'Not found');

  const candidates = await listSorted(options.sopDir, { kind: 'file', pattern: INTERACTION_FILE_PATTERN });
  if (candidates.length === 0) {
    throw new InputMissingError('No SOP CSVs found under', options.sopDir);
  }

  let dropped = 0;
  const writer = await JsonlWriter.open(options.out);
  try {
    for (const fileName of candidates) {
      const split = inferSplit(fileName);
      const table = await loadTable(path.join(options.sopDir, fileName));
      dropped += table.dropped;
      for (const row of table.rows) {
        await writer.write(toInteractionRecord(row, fileName, split));
      }
    }
  } finally {
    await writer.close();
  }

  logger.log(`Wrote SOP interactions: ${writer.written} -> ${options.out}`);
  if (dropped > 0) logger.warn(`Dropped ${dropped} malformed rows`);
  return { files: candidates.length, written: writer.written, dropped };
}
