import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { SourceRow } from '../types.js';
import { SourceParseError } from '../utils/errors.js';
import { inferColumn, uniqueHeaders } from './inferType.js';
import { InMemoryParsedSource, type ParsedSource, type SourceParser } from './types.js';

export const CSV_DELIMITERS = [',', ';', '|', '\t'] as const;

const RecordsSchema = z.array(z.array(z.string()));

/** Picks the candidate delimiter that occurs most often in the header line; comma on a tie. */
export function detectDelimiter(text: string): string {
  const header = text.split(/\r?\n/, 1)[0] ?? '';
  let best: string = ',';
  let bestCount = 0;
  for (const delimiter of CSV_DELIMITERS) {
    const count = header.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

export interface CsvParserOptions {
  delimiter?: string;
  encoding?: BufferEncoding;
}

/** One CSV file is one table, named after the file. */
export class CsvParser implements SourceParser {
  readonly format = 'csv' as const;

  constructor(private readonly options: CsvParserOptions = {}) {}

  async parse(content: Buffer, filename: string): Promise<ParsedSource> {
    const text = content.toString(this.options.encoding ?? 'utf8');
    const delimiter = this.options.delimiter ?? detectDelimiter(text);

    let records: string[][];
    try {
      const raw: unknown = parse(text, {
        columns: false,
        delimiter,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
      });
      records = RecordsSchema.parse(raw);
    } catch (err) {
      throw new SourceParseError(filename, err instanceof Error ? err.message : String(err));
    }

    if (records.length === 0) {
      throw new SourceParseError(filename, 'file has no header row');
    }

    const [headerRow, ...body] = records;
    const headers = uniqueHeaders(headerRow);
    const rows: SourceRow[] = body.map((record) =>
      Object.fromEntries(headers.map((header, i) => [header, record[i] ?? ''])),
    );
    const columns = headers.map((header) => inferColumn(header, rows.map((row) => row[header])));

    console.log(`[CsvParser] ${filename}: ${columns.length} columns, ${rows.length} rows (delimiter ${JSON.stringify(delimiter)})`);
    return new InMemoryParsedSource('csv', [
      {
        table: { name: tableNameFor(filename), columns, estimatedRows: rows.length },
        rows,
      },
    ]);
  }
}

export function tableNameFor(filename: string): string {
  const base = path.basename(filename, path.extname(filename));
  return base.replace(/[^A-Za-z0-9_]+/g, '_').replace(/^_+|_+$/g, '') || 'data';
}
