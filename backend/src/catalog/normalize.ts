import { createHash } from 'node:crypto';
import { RowDataError } from '../errors.js';
import { STANDARD_FIELDS, normalizeRecord } from './fields.js';
import type {
  AttributeRecord,
  ComponentRecord,
  CsvRow,
  NormalizedRow,
  RawRow,
  RowRejection,
  TagRecord,
} from './types.js';

const TRUE_VALUES = new Set(['true', 't', '1', 'yes', 'y', 'available', 'in stock']);
const FALSE_VALUES = new Set(['false', 'f', '0', 'no', 'n', 'out of stock', 'unavailable']);

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export function componentId(category: string, name: string, productUrl: string | null): string {
  return createHash('sha1').update(`${category}|${name}|${productUrl ?? ''}`, 'utf8').digest('hex');
}

export function parseBoolean(value: string | null | undefined): boolean | null {
  if (value == null) return null;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

export function parseDecimal(value: string | undefined, field = 'price'): number | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  if (!DECIMAL_PATTERN.test(trimmed) || !Number.isFinite(parsed)) {
    throw new RowDataError(field, trimmed, 'a decimal number');
  }
  return parsed;
}

export function parseInteger(value: string | undefined, field = 'stock_units'): number | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  if (!INTEGER_PATTERN.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new RowDataError(field, trimmed, 'an integer');
  }
  return parsed;
}

// A missing or blank in_stock column never reaches the parser.
export function resolveInStock(value: string | undefined): boolean {
  if (!value) return true;
  return parseBoolean(value) ?? true;
}

function nonEmpty(value: string | undefined): string | null {
  return value ? value : null;
}

export function normalizeRow(raw: RawRow, category: string, lastUpdated: Date): NormalizedRow | null {
  const fields = normalizeRecord(raw);
  const name = fields.get('name');
  if (!name) return null;

  const brand = nonEmpty(fields.get('brand'));
  const productUrl = nonEmpty(fields.get('product_url'));
  const id = componentId(category, name, productUrl);

  const component: ComponentRecord = {
    id,
    category,
    name,
    brand,
    price: parseDecimal(fields.get('price'), 'price'),
    previousPrice: parseDecimal(fields.get('previous_price'), 'previous_price'),
    imageUrl: nonEmpty(fields.get('image_url')),
    productUrl,
    inStock: resolveInStock(fields.get('in_stock')),
    stockUnits: parseInteger(fields.get('stock_units'), 'stock_units') ?? 0,
    lastUpdated,
  };

  const attributes: AttributeRecord[] = [];
  for (const [key, value] of fields) {
    if (STANDARD_FIELDS.has(key) || !value) continue;
    attributes.push({ componentId: id, key, value });
  }

  const tagSet = new Set<string>();
  if (brand) tagSet.add(brand);
  tagSet.add(category);
  const tags: TagRecord[] = [...tagSet].map((tag) => ({ componentId: id, tag }));

  return { component, attributes, tags };
}

export type NormalizeOptions = {
  strict?: boolean;
};

export type NormalizedBatch = {
  rows: NormalizedRow[];
  skipped: number;
  rejected: RowRejection[];
};

/**
 * Normalizes every row of one file. Rows without a name are counted as
 * skipped. A row with an unparseable number is collected as a rejection,
 * or rethrown when `strict` is set.
 */
export function normalizeRows(
  rows: CsvRow[],
  category: string,
  lastUpdated: Date,
  { strict = false }: NormalizeOptions = {}
): NormalizedBatch {
  const batch: NormalizedBatch = { rows: [], skipped: 0, rejected: [] };

  for (const { line, values } of rows) {
    let normalized: NormalizedRow | null;
    try {
      normalized = normalizeRow(values, category, lastUpdated);
    } catch (error) {
      if (!(error instanceof RowDataError)) {
        throw error;
      }
      if (strict) {
        throw error.atLine(line);
      }
      batch.rejected.push({ line, message: error.message });
      continue;
    }

    if (normalized) {
      batch.rows.push(normalized);
    } else {
      batch.skipped += 1;
    }
  }

  return batch;
}
