import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TextReader, Uint8ArrayWriter, ZipWriter } from '@zip.js/zip.js';
import {
  checkArchive,
  checkArchiveDirectory,
  classifyFailure,
  formatReportLine,
  looksLikeJson,
  selectSampleEntry,
} from '../src/archive/check.js';
import { InputMissingError } from '../src/pipeline/errors.js';
import { makeTempDir, removeDir } from './helpers.js';

const PASSWORD = 'test-secret';

interface ZipFixtureEntry {
  name: string;
  content?: string;
  directory?: boolean;
}

async function writeZip(
  filePath: string,
  entries: ZipFixtureEntry[],
  options: { password?: string; zipCrypto?: boolean } = {},
): Promise<void> {
  const writer = new ZipWriter(new Uint8ArrayWriter(), {
    password: options.password,
    zipCrypto: options.zipCrypto,
    level: 0,
  });
  for (const entry of entries) {
    if (entry.directory) {
      await writer.add(entry.name, undefined, { directory: true });
    } else {
      await writer.add(entry.name, new TextReader(entry.content ?? ''));
    }
  }
  await fs.writeFile(filePath, await writer.close());
}

const ANNOTATION = '  {"item1": {"category_id": 1}}';

describe('selectSampleEntry', () => {
  it('picks the first encrypted json file', () => {
    const sample = selectSampleEntry([
      { name: 'train/', directory: true, encrypted: false },
      { name: 'train/readme.txt', directory: false, encrypted: true },
      { name: 'train/annos/plain.json', directory: false, encrypted: false },
      { name: 'train/annos/000002.json', directory: false, encrypted: true },
      { name: 'train/annos/000003.json', directory: false, encrypted: true },
    ]);
    expect(sample?.name).toBe('train/annos/000002.json');
  });

  it('returns undefined without encrypted json entries', () => {
    expect(selectSampleEntry([{ name: 'a.json', directory: false, encrypted: false }])).toBeUndefined();
  });
});

describe('looksLikeJson', () => {
  it('accepts objects and arrays after whitespace', () => {
    expect(looksLikeJson(new TextEncoder().encode('\n\t {"a":1}'))).toBe(true);
    expect(looksLikeJson(new TextEncoder().encode('[1]'))).toBe(true);
  });

  it('rejects other content', () => {
    expect(looksLikeJson(new TextEncoder().encode('hello'))).toBe(false);
    expect(looksLikeJson(new TextEncoder().encode('   '))).toBe(false);
  });
});

describe('classifyFailure', () => {
  it('reports password and checksum errors as decrypt failures', () => {
    expect(classifyFailure(new Error('Invalid password'))).toEqual({
      ok: false,
      message: 'decrypt/read failed: Invalid password',
    });
    expect(classifyFailure(new Error('Invalid signature')).message).toBe('decrypt/read failed: Invalid signature');
  });

  it('reports anything else with the error name', () => {
    expect(classifyFailure(new TypeError('bad input'))).toEqual({ ok: false, message: 'error: TypeError: bad input' });
    expect(classifyFailure('boom')).toEqual({ ok: false, message: 'error: boom' });
  });
});

describe('checkArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('decrypts a sample entry with the right password', async () => {
    const archive = path.join(dir, 'train.zip');
    await writeZip(
      archive,
      [
        { name: 'train/', directory: true },
        { name: 'train/annos/000001.json', content: ANNOTATION },
      ],
      { password: PASSWORD },
    );

    expect(await checkArchive(archive, PASSWORD)).toEqual({
      ok: true,
      message: 'ok (sample=train/annos/000001.json)',
    });
  });

  it('decrypts ZipCrypto entries', async () => {
    const archive = path.join(dir, 'validation.zip');
    await writeZip(archive, [{ name: 'validation/annos/000001.json', content: '[]' }], {
      password: PASSWORD,
      zipCrypto: true,
    });

    const result = await checkArchive(archive, PASSWORD);
    expect(result.ok).toBe(true);
  });

  it('reports a wrong password as a decrypt failure', async () => {
    const archive = path.join(dir, 'train.zip');
    await writeZip(archive, [{ name: 'train/annos/000001.json', content: ANNOTATION }], { password: PASSWORD });

    const result = await checkArchive(archive, 'not-the-password');
    expect(result.ok).toBe(false);
    expect(result.message).toMatch(/^decrypt\/read failed: .*Invalid password/);
  });

  it('fails when no entry is encrypted', async () => {
    const archive = path.join(dir, 'train.zip');
    await writeZip(archive, [{ name: 'train/annos/000001.json', content: ANNOTATION }]);

    expect(await checkArchive(archive, PASSWORD)).toEqual({
      ok: false,
      message: 'no encrypted json entries found (unexpected)',
    });
  });

  it('fails when the decrypted bytes are not json', async () => {
    const archive = path.join(dir, 'train.zip');
    await writeZip(archive, [{ name: 'train/annos/000001.json', content: 'not json' }], { password: PASSWORD });

    expect(await checkArchive(archive, PASSWORD)).toEqual({
      ok: false,
      message: 'decrypted bytes do not look like JSON for train/annos/000001.json',
    });
  });

  it('fails on an empty entry', async () => {
    const archive = path.join(dir, 'train.zip');
    await writeZip(archive, [{ name: 'train/annos/000001.json', content: '' }], { password: PASSWORD });

    expect(await checkArchive(archive, PASSWORD)).toEqual({
      ok: false,
      message: 'read 0 bytes from train/annos/000001.json',
    });
  });

  it('reports files that are not zips without throwing', async () => {
    const archive = path.join(dir, 'train.zip');
    await fs.writeFile(archive, 'this is not a zip archive');

    const result = await checkArchive(archive, PASSWORD);
    expect(result.ok).toBe(false);
    expect(result.message.startsWith('error: ')).toBe(true);
  });

  it('reports missing archives by name', async () => {
    expect(await checkArchive(path.join(dir, 'test.zip'), PASSWORD)).toEqual({
      ok: false,
      message: 'missing: test.zip',
    });
  });
});

describe('checkArchiveDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('passes when every required archive decrypts and skips the optional one', async () => {
    for (const name of ['train', 'validation', 'test']) {
      await writeZip(path.join(dir, `${name}.zip`), [{ name: `${name}/annos/000001.json`, content: ANNOTATION }], {
        password: PASSWORD,
      });
    }

    const report = await checkArchiveDirectory(dir, PASSWORD);
    expect(report.failed).toBe(false);
    expect(report.lines.map(formatReportLine)).toEqual([
      'train.zip: OK - ok (sample=train/annos/000001.json)',
      'validation.zip: OK - ok (sample=validation/annos/000001.json)',
      'test.zip: OK - ok (sample=test/annos/000001.json)',
      'json_for_validation.zip: SKIP - not present',
    ]);
  });

  it('fails when a required archive is missing', async () => {
    for (const name of ['train', 'validation']) {
      await writeZip(path.join(dir, `${name}.zip`), [{ name: `${name}/annos/000001.json`, content: ANNOTATION }], {
        password: PASSWORD,
      });
    }

    const report = await checkArchiveDirectory(dir, PASSWORD);
    expect(report.failed).toBe(true);
    expect(report.lines[2]).toEqual({ name: 'test.zip', status: 'FAIL', reason: 'missing: test.zip' });
  });

  it('rejects a source that is not a directory', async () => {
    await expect(checkArchiveDirectory(path.join(dir, 'nowhere'), PASSWORD)).rejects.toBeInstanceOf(
      InputMissingError,
    );
  });
});
