import type { SourceFormat, SourceRow, SourceSchema, SourceTable } from '../types.js';
import { UnknownTableError } from '../utils/errors.js';

/** A source file after parsing: its schema plus repeatable row access. */
export interface ParsedSource {
  readonly format: SourceFormat;
  discover(): SourceSchema;
  rows(table: string): Iterable<SourceRow>;
}

export interface SourceParser {
  readonly format: SourceFormat;
  parse(content: Buffer, filename: string): Promise<ParsedSource>;
}

export interface TableData {
  table: SourceTable;
  rows: SourceRow[];
}

export class InMemoryParsedSource implements ParsedSource {
  private readonly byName = new Map<string, TableData>();

  constructor(
    readonly format: SourceFormat,
    private readonly tables: TableData[],
  ) {
    for (const data of tables) this.byName.set(data.table.name.toLowerCase(), data);
  }

  discover(): SourceSchema {
    return {
      format: this.format,
      tables: this.tables.map(({ table }) => structuredClone(table)),
    };
  }

  rows(table: string): Iterable<SourceRow> {
    const data = this.byName.get(table.toLowerCase());
    if (!data) throw new UnknownTableError(table);
    return data.rows;
  }
}
