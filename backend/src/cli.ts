import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import { DEFAULT_DATASET_DIR, resolveImportConfig, type ImportArgs } from './config.js';
import { createDatabase } from './db.js';
import { ImportError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { PgCatalogStore, type CatalogStore } from './repositories/component-store.js';
import { importCatalog, type ImportSummary } from './services/catalog-importer.js';

export const USAGE = `Usage: import-catalog [options]

Loads the component catalog CSV files into PostgreSQL.

Options:
  --dsn <url>           connection string (default: built from PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD)
  --dataset-dir <path>  directory holding the CSV files (default: ${DEFAULT_DATASET_DIR})
  --strict              abort on the first row with an unparseable number
  -h, --help            show this message`;

export type CliArgs = ImportArgs & { help: boolean };

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      dsn: { type: 'string' },
      'dataset-dir': { type: 'string' },
      strict: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    dsn: values.dsn,
    datasetDir: values['dataset-dir'],
    strict: values.strict ?? false,
    help: values.help ?? false,
  };
}

export type CliDependencies = {
  env: NodeJS.ProcessEnv;
  openStore?: (connectionString: string) => CatalogStore;
  logger?: Logger;
  print?: (line: string) => void;
};

function openPgStore(connectionString: string): CatalogStore {
  return new PgCatalogStore(createDatabase(connectionString));
}

function reportSummary(summary: ImportSummary, logger: Logger): void {
  const { totals } = summary;
  logger.info(
    `Summary: ${summary.files.length} files, ${totals.rows} rows, ${totals.components} components, ` +
      `${totals.attributes} attributes, ${totals.tags} tags, ${totals.skipped} skipped, ${totals.rejected} rejected`
  );
  if (summary.emptyFiles.length) {
    logger.warn(`Empty files skipped: ${summary.emptyFiles.join(', ')}`);
  }
}

export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    print(error instanceof Error ? error.message : String(error));
    print(USAGE);
    return 1;
  }

  if (args.help) {
    print(USAGE);
    return 0;
  }

  let logger = deps.logger;
  try {
    const config = resolveImportConfig(args, deps.env);
    logger ??= createLogger(config.logLevel);

    logger.info('Component catalog import', { datasetDir: config.datasetDir, strict: config.strict });
    const summary = await importCatalog(
      {
        connectionString: config.connectionString,
        datasetDir: config.datasetDir,
        strict: config.strict,
      },
      { openStore: deps.openStore ?? openPgStore, logger }
    );
    reportSummary(summary, logger);
    return 0;
  } catch (error) {
    logger ??= createLogger();
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.error('Invalid configuration', { issues });
      return 1;
    }
    if (error instanceof ImportError) {
      logger.error(error.message, error.details === undefined ? undefined : { details: error.details });
      return error.exitCode;
    }
    logger.error(`Import failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
