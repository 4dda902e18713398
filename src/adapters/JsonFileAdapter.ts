/**
 * JSON files holding an array of flat records (`{json:data/sales.json}`).
 * Relative paths resolve against the adapter's base directory.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Cell } from '../sql/ast-types';
import { Relation, type RecordRow } from '../internals/relation';
import type { LoadOptions, SourceAdapter } from './types';

export interface JsonFileAdapterOptions {
  baseDir?: string;
}

function isCell(value: unknown): value is Cell {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Validate parsed JSON as an array of records with scalar values */
export function toRecords(data: unknown): RecordRow[] {
  if (!Array.isArray(data)) {
    throw new Error('expected a JSON array of records');
  }
  return data.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new Error(`item ${index} is not an object`);
    }
    const record: RecordRow = {};
    for (const [key, value] of Object.entries(item)) {
      if (!isCell(value)) {
        throw new Error(`item ${index} field '${key}' is not a string, number, boolean or null`);
      }
      record[key] = value;
    }
    return record;
  });
}

export class JsonFileAdapter implements SourceAdapter {
  readonly sourceType = 'json';
  readonly baseDir: string;

  constructor(options: JsonFileAdapterOptions = {}) {
    this.baseDir = path.resolve(options.baseDir ?? process.cwd());
  }

  resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  async extract(filePath: string): Promise<Relation> {
    const text = await readFile(this.resolve(filePath), 'utf8');
    return Relation.fromRecords(toRecords(JSON.parse(text)));
  }

  async load(relation: Relation, destination: string, options: LoadOptions): Promise<void> {
    const target = this.resolve(destination);
    let output = relation;

    if (options.mode === 'append') {
      try {
        const existing = Relation.fromRecords(toRecords(JSON.parse(await readFile(target, 'utf8'))));
        output = existing.width === 0 ? relation : existing.append(relation, options.byPosition);
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
    }

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, `${JSON.stringify(output.toRecords(), null, 2)}\n`, 'utf8');
  }
}
