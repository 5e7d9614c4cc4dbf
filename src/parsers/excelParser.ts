import ExcelJS from 'exceljs';
import type { CellValue } from 'exceljs';
import type { SourceRow } from '../types.js';
import { SourceParseError } from '../utils/errors.js';
import { inferColumn, uniqueHeaders } from './inferType.js';
import { InMemoryParsedSource, type ParsedSource, type SourceParser, type TableData } from './types.js';

function cellValue(value: CellValue): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value !== 'object') return value;
  if ('result' in value) return cellValue(value.result ?? null);
  if ('richText' in value) return value.richText.map((rt) => rt.text).join('');
  if ('hyperlink' in value) return value.text;
  return null;
}

/** Every non-empty worksheet becomes a table; row 1 holds the headers. */
export class ExcelParser implements SourceParser {
  readonly format = 'excel' as const;

  async parse(content: Buffer, filename: string): Promise<ParsedSource> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(content);
    } catch (err) {
      throw new SourceParseError(filename, err instanceof Error ? err.message : String(err));
    }

    const tables: TableData[] = [];
    for (const sheet of workbook.worksheets) {
      const rawHeaders: string[] = [];
      sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
        rawHeaders[colNumber - 1] = String(cellValue(cell.value) ?? '');
      });
      if (rawHeaders.length === 0) continue;
      const headers = uniqueHeaders(Array.from(rawHeaders, (h) => h ?? ''));

      const rows: SourceRow[] = [];
      sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        if (rowNumber === 1) return;
        const record: SourceRow = Object.fromEntries(headers.map((h) => [h, null]));
        let hasData = false;
        row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
          const header = headers[colNumber - 1];
          if (!header) return;
          const value = cellValue(cell.value);
          if (value !== null && value !== '') hasData = true;
          record[header] = value;
        });
        if (hasData) rows.push(record);
      });

      const columns = headers.map((header) => inferColumn(header, rows.map((row) => row[header])));
      tables.push({ table: { name: sheet.name, columns, estimatedRows: rows.length }, rows });
    }

    if (tables.length === 0) {
      throw new SourceParseError(filename, 'workbook has no sheet with a header row');
    }
    console.log(`[ExcelParser] ${filename}: ${tables.length} sheets`);
    return new InMemoryParsedSource('excel', tables);
  }
}
