import fs from 'node:fs/promises';
import { ensureParentDir } from '../pipeline/utils.js';

export async function readJsonFile(filePath: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  return parsed;
}

export async function writeJsonFile(filePath: string, value: unknown, indent?: number): Promise<void> {
  await ensureParentDir(filePath);
  const body = indent === undefined ? JSON.stringify(value) : `${JSON.stringify(value, null, indent)}\n`;
  await fs.writeFile(filePath, body, 'utf-8');
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureParentDir(filePath);
  await fs.writeFile(filePath, content, 'utf-8');
}
