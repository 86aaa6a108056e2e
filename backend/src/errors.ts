export class ImportError extends Error {
  readonly exitCode: number;
  readonly details?: unknown;

  constructor(message: string, details?: unknown, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export class ConfigurationError extends ImportError {}

export class SchemaMissingError extends ImportError {
  readonly tables: string[];

  constructor(tables: string[]) {
    super(`missing tables: ${tables.join(', ')}; apply the catalog schema before importing`, { tables });
    this.tables = tables;
  }
}

export class RowDataError extends ImportError {
  readonly field: string;
  readonly value: string;
  readonly expected: string;
  readonly line?: number;

  constructor(field: string, value: string, expected: string, line?: number) {
    const prefix = line === undefined ? '' : `line ${line}: `;
    super(`${prefix}invalid ${field} "${value}": expected ${expected}`, { field, value, line });
    this.field = field;
    this.value = value;
    this.expected = expected;
    this.line = line;
  }

  atLine(line: number): RowDataError {
    return new RowDataError(this.field, this.value, this.expected, line);
  }
}

export class PersistenceError extends ImportError {
  readonly fileName: string;
  readonly code?: string;

  constructor(fileName: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    const code = pgErrorCode(cause);
    super(`failed to write ${fileName}: ${message}`, code ? { code } : undefined);
    this.fileName = fileName;
    this.code = code;
  }
}

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function missingDirectory(dir: string): ConfigurationError {
  return new ConfigurationError(`dataset directory ${dir} does not exist`, { dir });
}

export function noCatalogFiles(dir: string): ConfigurationError {
  return new ConfigurationError(`no CSV files found in ${dir}`, { dir });
}
