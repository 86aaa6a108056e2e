import path from 'node:path';
import { createReadStream, promises as fsp } from 'node:fs';
import { parse } from 'csv-parse';
import { missingDirectory } from '../errors.js';
import { resolveCategory } from './categories.js';
import type { CatalogFile, CsvRow, RawRow } from './types.js';

export async function assertDirectory(dir: string): Promise<void> {
  try {
    const stats = await fsp.stat(dir);
    if (!stats.isDirectory()) {
      throw missingDirectory(dir);
    }
  } catch (error) {
    if (isNotFound(error)) {
      throw missingDirectory(dir);
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export async function* listCatalogFiles(dir: string): AsyncGenerator<CatalogFile> {
  await assertDirectory(dir);
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.csv')
    .map((entry) => entry.name)
    .sort(compareNames);

  for (const fileName of names) {
    const stem = path.basename(fileName, path.extname(fileName));
    yield {
      path: path.join(dir, fileName),
      fileName,
      stem,
      category: resolveCategory(stem),
    };
  }
}

type ParsedRecord = {
  record: string[];
  info: { lines: number; empty_lines: number };
};

// Repeated header names keep their first non-empty cell, as aliased columns do.
function zipRecord(headers: string[], cells: string[]): RawRow {
  const values = new Map<string, string>();
  headers.forEach((header, index) => {
    const value = cells[index];
    if (value === undefined) return;
    const current = values.get(header);
    if (current === undefined || (!current.trim() && value.trim())) {
      values.set(header, value);
    }
  });
  return Object.fromEntries(values);
}

/**
 * Reads a catalog file into header-keyed rows. `line` is the physical line
 * a record starts on, so quoted multi-line cells do not shift it.
 */
export function readCatalogFile(filePath: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    const rows: CsvRow[] = [];
    let headers: string[] | undefined;
    let previousEnd = 0;
    let previousEmpty = 0;

    createReadStream(filePath, { encoding: 'utf8' })
      .on('error', reject)
      .pipe(
        parse({
          columns: false,
          bom: true,
          skip_empty_lines: true,
          relax_column_count: true,
          info: true,
        })
      )
      .on('data', ({ record, info }: ParsedRecord) => {
        const line = previousEnd + 1 + (info.empty_lines - previousEmpty);
        previousEnd = info.lines;
        previousEmpty = info.empty_lines;
        if (!headers) {
          headers = record;
          return;
        }
        rows.push({ line, values: zipRecord(headers, record) });
      })
      .on('error', reject)
      .on('end', () => resolve(rows));
  });
}
