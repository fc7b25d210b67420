export class SourceUnreadableError extends Error {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read ${source}: ${reason}`, { cause });
    this.name = 'SourceUnreadableError';
    this.source = source;
  }
}

// row is the 1-based data row, header excluded.
export class MalformedRowError extends Error {
  readonly row: number;
  readonly field: string;
  readonly source?: string;

  constructor(row: number, field: string, detail: string, source?: string) {
    const where = source ? `${source} row ${row}` : `row ${row}`;
    super(`Malformed inventory ${where}: ${field} ${detail}`);
    this.name = 'MalformedRowError';
    this.row = row;
    this.field = field;
    this.source = source;
  }
}
