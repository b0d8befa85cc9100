import { openAsBlob } from 'node:fs';
import path from 'node:path';
import { BlobReader, Uint8ArrayWriter, ZipReader, configure } from '@zip.js/zip.js';
import type { Entry } from '@zip.js/zip.js';
import type { ArchiveCheckResult, ArchiveEntryInfo, ArchiveReportLine } from '../pipeline/types.js';
import { describeError } from '../pipeline/errors.js';
import { isFile, requireDirectory } from '../pipeline/utils.js';

configure({ useWebWorkers: false });

export const REQUIRED_ARCHIVES = ['train.zip', 'validation.zip', 'test.zip'] as const;
export const OPTIONAL_ARCHIVES = ['json_for_validation.zip'] as const;

const ANNOTATION_EXTENSION = '.json';
/** zip.js wording for a wrong password or a checksum mismatch. */
const DECRYPT_FAILURE = /invalid (password|signature)|(crc|checksum|signature) (mismatch|error)/i;

/** First file entry that is an encrypted annotation document. */
export function selectSampleEntry(entries: ArchiveEntryInfo[]): ArchiveEntryInfo | undefined {
  return entries.find(
    (entry) => !entry.directory && entry.name.endsWith(ANNOTATION_EXTENSION) && entry.encrypted,
  );
}

function toEntryInfo(entry: Entry): ArchiveEntryInfo {
  return { name: entry.filename, directory: entry.directory, encrypted: entry.encrypted };
}

function isJsonWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0b || byte === 0x0c;
}

export function looksLikeJson(data: Uint8Array): boolean {
  const head = data.find((byte) => !isJsonWhitespace(byte));
  return head === 0x7b || head === 0x5b;
}

async function readSample(entry: Entry, password: string): Promise<Uint8Array> {
  if (!('getData' in entry) || !entry.getData) {
    throw new Error(`entry ${entry.filename} has no readable data`);
  }
  // Older releases call the checksum option checkSignature, newer ones checkCrc32.
  const readOptions = { password, checkSignature: true, checkCrc32: true };
  return entry.getData(new Uint8ArrayWriter(), readOptions);
}

export function classifyFailure(error: unknown): ArchiveCheckResult {
  if (error instanceof Error && DECRYPT_FAILURE.test(error.message)) {
    return { ok: false, message: `decrypt/read failed: ${error.message}` };
  }
  return { ok: false, message: `error: ${describeError(error)}` };
}

/**
 * Opens the archive directory and decrypts a single encrypted JSON entry.
 * Every outcome is reported through the result; nothing is thrown.
 */
export async function checkArchive(archivePath: string, password: string): Promise<ArchiveCheckResult> {
  if (!(await isFile(archivePath))) {
    return { ok: false, message: `missing: ${path.basename(archivePath)}` };
  }

  try {
    const reader = new ZipReader(new BlobReader(await openAsBlob(archivePath)));
    try {
      const entries = await reader.getEntries();
      const sample = selectSampleEntry(entries.map(toEntryInfo));
      const entry = sample && entries.find((candidate) => candidate.filename === sample.name);
      if (!entry) {
        return { ok: false, message: 'no encrypted json entries found (unexpected)' };
      }

      const data = await readSample(entry, password);
      if (data.byteLength === 0) {
        return { ok: false, message: `read 0 bytes from ${entry.filename}` };
      }
      if (!looksLikeJson(data)) {
        return { ok: false, message: `decrypted bytes do not look like JSON for ${entry.filename}` };
      }
      return { ok: true, message: `ok (sample=${entry.filename})` };
    } finally {
      await reader.close();
    }
  } catch (error) {
    return classifyFailure(error);
  }
}

export interface ArchiveReport {
  lines: ArchiveReportLine[];
  failed: boolean;
}

export async function checkArchiveDirectory(sourceDir: string, password: string): Promise<ArchiveReport> {
  await requireDirectory(sourceDir, 'Not a directory');

  const lines: ArchiveReportLine[] = [];
  const optional = new Set<string>(OPTIONAL_ARCHIVES);
  for (const name of [...REQUIRED_ARCHIVES, ...OPTIONAL_ARCHIVES]) {
    const archivePath = path.join(sourceDir, name);
    if (optional.has(name) && !(await isFile(archivePath))) {
      lines.push({ name, status: 'SKIP', reason: 'not present' });
      continue;
    }
    const result = await checkArchive(archivePath, password);
    lines.push({ name, status: result.ok ? 'OK' : 'FAIL', reason: result.message });
  }

  return { lines, failed: lines.some((line) => line.status === 'FAIL') };
}

export function formatReportLine(line: ArchiveReportLine): string {
  return `${line.name}: ${line.status} - ${line.reason}`;
}
