import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { TableRow } from './types.js';

/** Column-name fragments every usable purchase-history header contains. */
export const PURCHASE_HISTORY_MARKERS = ['user_id', 'image_id', 'rating', 'occasion'] as const;

const SPLIT_FRAGMENT = 'rati\nng';
const REJOINED_FRAGMENT = 'rating';
const HEADER_SCAN_LIMIT = 5;

export type RepairStrategyName = 'intact' | 'literal-rejoin' | 'bounded-scan';

export type HeaderRepair =
  | { strategy: RepairStrategyName; text: string }
  | { strategy: 'unrepaired'; text: string };

interface RepairStrategy {
  name: RepairStrategyName;
  attempt(text: string, markers: readonly string[]): string | undefined;
}

export interface TableParseResult {
  header: string[];
  rows: TableRow[];
  dropped: number;
}

export interface RepairedTable extends TableParseResult {
  repair: HeaderRepair['strategy'];
}

function firstLine(text: string): string {
  const end = text.indexOf('\n');
  return end === -1 ? text : text.slice(0, end);
}

function hasMarkers(candidate: string, markers: readonly string[]): boolean {
  return markers.every((marker) => candidate.includes(marker));
}

function rejoinSplitFragment(text: string): string {
  return text.split(SPLIT_FRAGMENT).join(REJOINED_FRAGMENT);
}

const strategies: RepairStrategy[] = [
  {
    name: 'intact',
    attempt: (text, markers) => (hasMarkers(firstLine(text), markers) ? text : undefined),
  },
  {
    name: 'literal-rejoin',
    attempt: (text, markers) => {
      const rejoined = rejoinSplitFragment(text);
      if (rejoined === text) return undefined;
      return hasMarkers(firstLine(rejoined), markers) ? rejoined : undefined;
    },
  },
  {
    // The header may be broken somewhere other than the known fragment, or
    // with CRLF endings; glue up to HEADER_SCAN_LIMIT raw lines back together.
    name: 'bounded-scan',
    attempt: (text, markers) => {
      const source = rejoinSplitFragment(text);
      if (!source) return undefined;
      const lines = source.split(/(?<=\n)/);
      const bound = Math.min(HEADER_SCAN_LIMIT, lines.length);
      for (let taken = 1; taken <= bound; taken += 1) {
        const header = lines.slice(0, taken).join('').replace(/[\r\n]/g, '');
        if (hasMarkers(header, markers)) {
          return `${header}\n${lines.slice(taken).join('')}`;
        }
      }
      return undefined;
    },
  },
];

/** Decodes bytes as UTF-8, substituting U+FFFD for invalid sequences. */
export function decodeTable(raw: Uint8Array): string {
  return Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('utf8');
}

/**
 * Tries each header strategy in order. When none produces a header holding
 * every marker, the original text is returned untouched.
 */
export function repairHeader(
  text: string,
  markers: readonly string[] = PURCHASE_HISTORY_MARKERS,
): HeaderRepair {
  for (const strategy of strategies) {
    const repaired = strategy.attempt(text, markers);
    if (repaired !== undefined) {
      return { strategy: strategy.name, text: repaired };
    }
  }
  return { strategy: 'unrepaired', text };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * Parses header-first CSV text into rows keyed by trimmed header names.
 * Rows without any non-blank field, and rows with more fields than the
 * header, are dropped; short rows are padded with empty strings.
 */
export function parseTable(text: string): TableParseResult {
  if (!text.trim()) {
    return { header: [], rows: [], dropped: 0 };
  }

  const parsed: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
  });
  const records = Array.isArray(parsed) ? parsed.filter(isStringArray) : [];
  const [headerRecord, ...body] = records;
  if (!headerRecord) {
    return { header: [], rows: [], dropped: 0 };
  }

  const header = headerRecord.map((name) => name.trim());
  const rows: TableRow[] = [];
  let dropped = 0;
  for (const record of body) {
    const blank = record.every((field) => field.trim() === '');
    if (blank || record.length > header.length) {
      dropped += 1;
      continue;
    }
    const row: TableRow = {};
    header.forEach((name, index) => {
      row[name] = (record[index] ?? '').trim();
    });
    rows.push(row);
  }
  return { header, rows, dropped };
}

export function readRepairedTable(
  raw: Uint8Array,
  markers: readonly string[] = PURCHASE_HISTORY_MARKERS,
): RepairedTable {
  const repair = repairHeader(decodeTable(raw), markers);
  return { ...parseTable(repair.text), repair: repair.strategy };
}

export async function loadTable(filePath: string): Promise<TableParseResult> {
  const raw = await fs.readFile(filePath);
  return parseTable(decodeTable(raw));
}
