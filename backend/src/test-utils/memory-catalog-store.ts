import type { AttributeRecord, ComponentRecord, TagRecord } from '../catalog/types.js';
import { SchemaMissingError } from '../errors.js';
import type { CatalogStore, CatalogWriter } from '../repositories/component-store.js';

export type StoredComponent = ComponentRecord & { updatedAt: number };

type Tables = {
  components: Map<string, StoredComponent>;
  attributes: Map<string, AttributeRecord>;
  tags: Map<string, TagRecord>;
};

function cloneTables(tables: Tables): Tables {
  return {
    components: new Map(tables.components),
    attributes: new Map(tables.attributes),
    tags: new Map(tables.tags),
  };
}

/**
 * In-process stand-in for the Postgres tables, applying the same conflict
 * rules as the SQL in ComponentWriter. Writes inside `withTransaction` only
 * become visible when the callback resolves.
 */
export class MemoryCatalogStore implements CatalogStore {
  tables: Tables = { components: new Map(), attributes: new Map(), tags: new Map() };
  schemaPresent = true;
  closed = false;
  transactions = 0;
  failOnComponentWrite?: (component: ComponentRecord) => boolean;
  private clock = 0;

  async ensureSchema(): Promise<void> {
    if (!this.schemaPresent) {
      throw new SchemaMissingError(['components', 'component_attributes', 'component_tags']);
    }
  }

  async withTransaction<T>(fn: (writer: CatalogWriter) => Promise<T>): Promise<T> {
    this.transactions += 1;
    const working = cloneTables(this.tables);
    const result = await fn(this.writer(working));
    this.tables = working;
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private writer(tables: Tables): CatalogWriter {
    return {
      upsertComponents: async (components) => {
        for (const component of components) {
          if (this.failOnComponentWrite?.(component)) {
            throw Object.assign(new Error('value too long for type character varying(50)'), { code: '22001' });
          }
          this.clock += 1;
          const existing = tables.components.get(component.id);
          tables.components.set(component.id, {
            ...component,
            category: existing?.category ?? component.category,
            name: existing?.name ?? component.name,
            updatedAt: this.clock,
          });
        }
        return components.length;
      },
      upsertAttributes: async (attributes) => {
        for (const attribute of attributes) {
          tables.attributes.set(`${attribute.componentId}|${attribute.key}`, attribute);
        }
        return attributes.length;
      },
      insertTags: async (tags) => {
        for (const tag of tags) {
          const key = `${tag.componentId}|${tag.tag.toLowerCase()}`;
          if (!tables.tags.has(key)) {
            tables.tags.set(key, tag);
          }
        }
        return tags.length;
      },
    };
  }

  counts(): { components: number; attributes: number; tags: number } {
    return {
      components: this.tables.components.size,
      attributes: this.tables.attributes.size,
      tags: this.tables.tags.size,
    };
  }
}
