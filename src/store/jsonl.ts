import { createReadStream, createWriteStream } from 'node:fs';
import type { WriteStream } from 'node:fs';
import { once } from 'node:events';
import readline from 'node:readline';
import { finished } from 'node:stream/promises';
import { ensureParentDir } from '../pipeline/utils.js';

/**
 * Incremental line-delimited JSON writer. The target file is truncated on
 * open, so a stage always replaces its previous output in full.
 */
export class JsonlWriter {
  private readonly stream: WriteStream;
  private count = 0;
  /** First write error reported by the stream; surfaces on the next write or close. */
  private failure: Error | undefined;

  private constructor(stream: WriteStream) {
    this.stream = stream;
    stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  static async open(filePath: string): Promise<JsonlWriter> {
    await ensureParentDir(filePath);
    const stream = createWriteStream(filePath, { encoding: 'utf-8', flags: 'w' });
    await once(stream, 'open');
    return new JsonlWriter(stream);
  }

  get written(): number {
    return this.count;
  }

  async write(record: unknown): Promise<void> {
    if (this.failure) throw this.failure;
    this.count += 1;
    if (!this.stream.write(`${JSON.stringify(record)}\n`)) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    if (this.failure) throw this.failure;
    this.stream.end();
    await finished(this.stream);
    if (this.failure) throw this.failure;
  }
}

export type JsonLine =
  | { ok: true; lineNumber: number; value: unknown }
  | { ok: false; lineNumber: number; error: string };

/** Yields every non-blank line of a JSONL file, parsed or with its parse error. */
export async function* readJsonLines(filePath: string): AsyncGenerator<JsonLine> {
  const input = createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  for await (const raw of lines) {
    lineNumber += 1;
    const line = raw.trim();
    if (!line) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      yield { ok: false, lineNumber, error: error instanceof Error ? error.message : String(error) };
      continue;
    }
    yield { ok: true, lineNumber, value };
  }
}
