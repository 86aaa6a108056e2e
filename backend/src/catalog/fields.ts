import type { RawRow } from './types.js';

export const STANDARD_FIELDS = new Set([
  'name',
  'brand',
  'price',
  'previous_price',
  'image_url',
  'product_url',
  'in_stock',
  'stock_units',
]);

export const FIELD_ALIASES: Readonly<Record<string, string>> = {
  url: 'product_url',
  link: 'product_url',
  image: 'image_url',
  img: 'image_url',
  current_price: 'price',
  price_usd: 'price',
  last_price: 'previous_price',
  stock: 'in_stock',
  available: 'in_stock',
};

export function normalizeFieldName(name: string): string {
  const key = name.trim().toLowerCase();
  return Object.hasOwn(FIELD_ALIASES, key) ? FIELD_ALIASES[key] : key;
}

/**
 * Maps raw CSV columns onto normalized field names and trims every value.
 *
 * When several columns land on the same field, a column already named after
 * the field wins if it has a value; otherwise the first non-empty column in
 * header order does. Columns with a blank header are dropped.
 */
export function normalizeRecord(raw: RawRow): Map<string, string> {
  const result = new Map<string, string>();
  const explicit = new Set<string>();

  for (const [header, rawValue] of Object.entries(raw)) {
    if (!header.trim()) continue;
    const field = normalizeFieldName(header);
    const value = (rawValue ?? '').trim();
    const isExplicit = header.trim().toLowerCase() === field;
    const current = result.get(field);

    if (current === undefined) {
      result.set(field, value);
    } else if (value && (!current || (isExplicit && !explicit.has(field)))) {
      result.set(field, value);
    } else {
      continue;
    }

    if (isExplicit && value) {
      explicit.add(field);
    }
  }

  return result;
}
