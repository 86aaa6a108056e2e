import type { Database, Queryable } from '../db.js';
import { SchemaMissingError } from '../errors.js';
import type { AttributeRecord, ComponentRecord, NormalizedRow, TagRecord } from '../catalog/types.js';

export const COMPONENT_BATCH_SIZE = 100;
export const ATTRIBUTE_BATCH_SIZE = 500;
export const TAG_BATCH_SIZE = 500;

export const CATALOG_TABLES = ['components', 'component_attributes', 'component_tags'] as const;

export type CatalogPayload = {
  components: ComponentRecord[];
  attributes: AttributeRecord[];
  tags: TagRecord[];
};

export type WriteCounts = {
  components: number;
  attributes: number;
  tags: number;
};

export interface CatalogWriter {
  upsertComponents(components: ComponentRecord[]): Promise<number>;
  upsertAttributes(attributes: AttributeRecord[]): Promise<number>;
  insertTags(tags: TagRecord[]): Promise<number>;
}

export interface CatalogStore {
  ensureSchema(): Promise<void>;
  withTransaction<T>(fn: (writer: CatalogWriter) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * Flattens one file's rows into write payloads where no key repeats, so a
 * single multi-row upsert never touches the same row twice. Components and
 * attributes keep their last occurrence, tags their first.
 */
export function buildPayload(rows: NormalizedRow[]): CatalogPayload {
  const components = new Map<string, ComponentRecord>();
  const attributes = new Map<string, AttributeRecord>();
  const tags = new Map<string, TagRecord>();

  for (const row of rows) {
    components.delete(row.component.id);
    components.set(row.component.id, row.component);

    for (const attribute of row.attributes) {
      const key = `${attribute.componentId}\u0000${attribute.key}`;
      attributes.delete(key);
      attributes.set(key, attribute);
    }

    for (const tag of row.tags) {
      const key = `${tag.componentId}\u0000${tag.tag.toLowerCase()}`;
      if (!tags.has(key)) {
        tags.set(key, tag);
      }
    }
  }

  return {
    components: [...components.values()],
    attributes: [...attributes.values()],
    tags: [...tags.values()],
  };
}

export async function writePayload(writer: CatalogWriter, payload: CatalogPayload): Promise<WriteCounts> {
  const components = await writer.upsertComponents(payload.components);
  const attributes = await writer.upsertAttributes(payload.attributes);
  const tags = await writer.insertTags(payload.tags);
  return { components, attributes, tags };
}

function placeholders(rowCount: number, columnCount: number): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const columns: string[] = [];
    for (let column = 0; column < columnCount; column += 1) {
      columns.push(`$${row * columnCount + column + 1}`);
    }
    rows.push(`(${columns.join(', ')})`);
  }
  return rows.join(',\n       ');
}

export class ComponentWriter implements CatalogWriter {
  constructor(private readonly client: Queryable) {}

  async upsertComponents(components: ComponentRecord[]): Promise<number> {
    for (const batch of chunk(components, COMPONENT_BATCH_SIZE)) {
      const values = batch.flatMap((component) => [
        component.id,
        component.category,
        component.name,
        component.brand,
        component.price,
        component.previousPrice,
        component.imageUrl,
        component.productUrl,
        component.inStock,
        component.stockUnits,
        component.lastUpdated,
      ]);
      await this.client.query(
        `insert into components (id, category, name, brand, price, previous_price, image_url, product_url, in_stock, stock_units, last_updated)
       values ${placeholders(batch.length, 11)}
       on conflict (id) do update set
         brand = excluded.brand,
         price = excluded.price,
         previous_price = excluded.previous_price,
         image_url = excluded.image_url,
         product_url = excluded.product_url,
         in_stock = excluded.in_stock,
         stock_units = excluded.stock_units,
         last_updated = excluded.last_updated,
         updated_at = now()`,
        values
      );
    }
    return components.length;
  }

  async upsertAttributes(attributes: AttributeRecord[]): Promise<number> {
    for (const batch of chunk(attributes, ATTRIBUTE_BATCH_SIZE)) {
      const values = batch.flatMap((attribute) => [attribute.componentId, attribute.key, attribute.value]);
      await this.client.query(
        `insert into component_attributes (component_id, attribute_key, attribute_value)
       values ${placeholders(batch.length, 3)}
       on conflict (component_id, attribute_key) do update set
         attribute_value = excluded.attribute_value`,
        values
      );
    }
    return attributes.length;
  }

  async insertTags(tags: TagRecord[]): Promise<number> {
    for (const batch of chunk(tags, TAG_BATCH_SIZE)) {
      const values = batch.flatMap((tag) => [tag.componentId, tag.tag]);
      await this.client.query(
        `insert into component_tags (component_id, tag)
       values ${placeholders(batch.length, 2)}
       on conflict (component_id, normalized_tag) do nothing`,
        values
      );
    }
    return tags.length;
  }
}

export class PgCatalogStore implements CatalogStore {
  constructor(private readonly db: Database) {}

  async ensureSchema(): Promise<void> {
    const { rows } = await this.db.query<{ table_name: string }>(
      `select table_name
       from information_schema.tables
       where table_schema = any(current_schemas(false))
         and table_name = any($1::text[])`,
      [[...CATALOG_TABLES]]
    );
    const present = new Set(rows.map((row) => row.table_name));
    const missing = CATALOG_TABLES.filter((table) => !present.has(table));
    if (missing.length) {
      throw new SchemaMissingError(missing);
    }
  }

  withTransaction<T>(fn: (writer: CatalogWriter) => Promise<T>): Promise<T> {
    return this.db.withTransaction((client) => fn(new ComponentWriter(client)));
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
