import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import fsExtra from 'fs-extra';
import { InputMissingError } from './errors.js';

export async function ensureDir(dirPath: string): Promise<void> {
  await fsExtra.ensureDir(dirPath);
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function requireDirectory(dirPath: string, label: string): Promise<void> {
  if (!(await isDirectory(dirPath))) {
    throw new InputMissingError(label, dirPath);
  }
}

/** Expands a leading `~` and resolves against the working directory. */
export function resolveUserPath(input: string): string {
  const expanded = input === '~' || input.startsWith('~/')
    ? path.join(os.homedir(), input.slice(1))
    : input;
  return path.resolve(expanded);
}

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/** Code-unit ordering, independent of the host locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface ListOptions {
  kind: 'file' | 'directory';
  extensions?: string[];
  pattern?: RegExp;
}

/** Lists direct children of a directory, sorted by name. Extensions match case-sensitively. */
export async function listSorted(dirPath: string, options: ListOptions): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const { extensions } = options;
  return entries
    .filter((entry) => (options.kind === 'file' ? entry.isFile() : entry.isDirectory()))
    .map((entry) => entry.name)
    .filter((name) => !extensions || extensions.includes(path.extname(name)))
    .filter((name) => !options.pattern || options.pattern.test(name))
    .sort(compareStrings);
}

export function fileStem(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}
