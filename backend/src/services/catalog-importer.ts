import { listCatalogFiles, readCatalogFile } from '../catalog/csv-source.js';
import { normalizeRows } from '../catalog/normalize.js';
import type { CatalogFile, CsvRow, RowRejection } from '../catalog/types.js';
import { ImportError, PersistenceError, noCatalogFiles } from '../errors.js';
import type { Logger } from '../logger.js';
import {
  buildPayload,
  writePayload,
  type CatalogStore,
  type WriteCounts,
} from '../repositories/component-store.js';

export type ImportOptions = {
  connectionString: string;
  datasetDir: string;
  strict?: boolean;
  now?: () => Date;
};

export type ImportDependencies = {
  openStore: (connectionString: string) => CatalogStore;
  readFile?: (filePath: string) => Promise<CsvRow[]>;
  logger: Logger;
};

export type FileSummary = {
  fileName: string;
  category: string;
  rows: number;
  components: number;
  attributes: number;
  tags: number;
  skipped: number;
  rejected: RowRejection[];
};

export type ImportSummary = {
  startedAt: Date;
  files: FileSummary[];
  emptyFiles: string[];
  totals: {
    rows: number;
    components: number;
    attributes: number;
    tags: number;
    skipped: number;
    rejected: number;
  };
};

async function discover(datasetDir: string): Promise<CatalogFile[]> {
  const files: CatalogFile[] = [];
  for await (const file of listCatalogFiles(datasetDir)) {
    files.push(file);
  }
  if (!files.length) {
    throw noCatalogFiles(datasetDir);
  }
  return files;
}

function summarize(startedAt: Date, files: FileSummary[], emptyFiles: string[]): ImportSummary {
  const totals = { rows: 0, components: 0, attributes: 0, tags: 0, skipped: 0, rejected: 0 };
  for (const file of files) {
    totals.rows += file.rows;
    totals.components += file.components;
    totals.attributes += file.attributes;
    totals.tags += file.tags;
    totals.skipped += file.skipped;
    totals.rejected += file.rejected.length;
  }
  return { startedAt, files, emptyFiles, totals };
}

/**
 * Loads every CSV file of the dataset directory, one transaction per file.
 * The first failing file rolls back alone and stops the run; files written
 * before it stay committed.
 */
export async function importCatalog(options: ImportOptions, deps: ImportDependencies): Promise<ImportSummary> {
  const { logger } = deps;
  const readFile = deps.readFile ?? readCatalogFile;
  const startedAt = (options.now ?? (() => new Date()))();

  const files = await discover(options.datasetDir);
  logger.info(`Found ${files.length} CSV files in ${options.datasetDir}`);

  const store = deps.openStore(options.connectionString);
  const completed: FileSummary[] = [];
  const emptyFiles: string[] = [];
  let current: CatalogFile | undefined;

  try {
    await store.ensureSchema();

    for (const file of files) {
      current = file;
      logger.info(`Processing ${file.fileName}`, { category: file.category });

      const rows = await readFile(file.path);
      if (!rows.length) {
        logger.warn(`${file.fileName} has no data rows; skipping`);
        emptyFiles.push(file.fileName);
        continue;
      }

      const batch = normalizeRows(rows, file.category, startedAt, { strict: options.strict });
      const payload = buildPayload(batch.rows);

      let counts: WriteCounts;
      try {
        counts = await store.withTransaction((writer) => writePayload(writer, payload));
      } catch (error) {
        throw error instanceof ImportError ? error : new PersistenceError(file.fileName, error);
      }

      if (batch.rejected.length) {
        logger.warn(`${file.fileName}: rejected ${batch.rejected.length} rows`);
        for (const rejection of batch.rejected) {
          logger.warn(`${file.fileName}:${rejection.line} ${rejection.message}`);
        }
      }

      logger.info(
        `${file.fileName}: ${counts.components} components, ${counts.attributes} attributes, ${counts.tags} tags`
      );

      completed.push({
        fileName: file.fileName,
        category: file.category,
        rows: rows.length,
        ...counts,
        skipped: batch.skipped,
        rejected: batch.rejected,
      });
    }
  } catch (error) {
    if (current) {
      logger.error(`Import aborted while processing ${current.fileName}`);
    }
    if (completed.length) {
      logger.error(`Committed before the failure: ${completed.map((file) => file.fileName).join(', ')}`);
    }
    throw error;
  } finally {
    await store.close();
  }

  const summary = summarize(startedAt, completed, emptyFiles);
  logger.info(`Import completed: ${summary.totals.components} components from ${summary.totals.rows} rows`);
  return summary;
}
