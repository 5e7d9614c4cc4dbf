import type { SourceColumn, SourceRow } from '../types.js';
import { SourceParseError } from '../utils/errors.js';
import { normalizeSqlType } from '../utils/typeUtils.js';
import { inferDataType, sampleValues } from './inferType.js';
import { InMemoryParsedSource, type ParsedSource, type SourceParser } from './types.js';

const IDENT = String.raw`[\`"\[]?(\w+)[\`"\]]?`;
const QUALIFIED = String.raw`(?:[\`"\[]?\w+[\`"\]]?\.)?${IDENT}`;
const CREATE_TABLE = new RegExp(String.raw`CREATE\s+(?:TEMPORARY\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?${QUALIFIED}\s*\(`, 'gi');
const INSERT_INTO = new RegExp(String.raw`INSERT\s+INTO\s+${QUALIFIED}\s*(?:\(([^)]*)\))?\s*VALUES\s*`, 'gi');
const COLUMN_DEF = new RegExp(
  String.raw`^${IDENT}\s+([a-z]+(?:\s+(?:varying|precision|unsigned))?(?:\s*\([^)]*\))?(?:\s+with(?:out)?\s+time\s+zone)?)(.*)$`,
  'is',
);
const TABLE_CONSTRAINT = /^(PRIMARY\s+KEY|FOREIGN\s+KEY|UNIQUE|CHECK|CONSTRAINT|KEY|INDEX|FULLTEXT)\b/i;

interface TableDef {
  name: string;
  columns: SourceColumn[];
  rows: SourceRow[];
}

/** Splits on commas outside parentheses and quotes. */
export function splitTopLevel(body: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = '';
  for (let i = 0; i < body.length; i += 1) {
    const char = body[i];
    if (quote) {
      if (char === '\\' && i + 1 < body.length) {
        current += char + body[i + 1];
        i += 1;
        continue;
      }
      if (char === quote) quote = null;
    } else if (char === "'" || char === '"' || char === '`') {
      quote = char;
    } else if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      depth -= 1;
    } else if (char === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }
  if (current.trim()) parts.push(current.trim());
  return parts;
}

/** Index just past the parenthesis closing the one opened before `start`. */
function closingParen(text: string, start: number): number {
  let depth = 1;
  let quote: string | null = null;
  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (quote) {
      if (char === '\\') i += 1;
      else if (char === quote) quote = null;
    } else if (char === "'" || char === '"' || char === '`') {
      quote = char;
    } else if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      depth -= 1;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

export function parseColumnDefinition(line: string): SourceColumn | null {
  if (TABLE_CONSTRAINT.test(line)) return null;
  const match = COLUMN_DEF.exec(line.trim());
  if (!match) return null;
  const [, name, rawType, flags] = match;
  return {
    name,
    type: normalizeSqlType(rawType),
    rawType: rawType.replace(/\s+/g, ' ').trim(),
    nullable: !/NOT\s+NULL/i.test(flags) && !/PRIMARY\s+KEY/i.test(flags),
    primaryKey: /PRIMARY\s+KEY/i.test(flags),
    sampleValues: [],
  };
}

function parseCreateTables(sql: string): Map<string, TableDef> {
  const tables = new Map<string, TableDef>();
  for (const match of sql.matchAll(CREATE_TABLE)) {
    const bodyStart = (match.index ?? 0) + match[0].length;
    const end = closingParen(sql, bodyStart);
    if (end < 0) continue;

    const definitions = splitTopLevel(sql.slice(bodyStart, end - 1));
    const columns = definitions.flatMap((line) => parseColumnDefinition(line) ?? []);

    for (const line of definitions) {
      const pk = /^(?:CONSTRAINT\s+\S+\s+)?PRIMARY\s+KEY\s*\(([^)]*)\)/i.exec(line);
      if (!pk) continue;
      const keys = new Set(pk[1].split(',').map((c) => c.trim().replace(/[`"[\]]/g, '').toLowerCase()));
      for (const column of columns) {
        if (keys.has(column.name.toLowerCase())) {
          column.primaryKey = true;
          column.nullable = false;
        }
      }
    }

    tables.set(match[1].toLowerCase(), { name: match[1], columns, rows: [] });
  }
  return tables;
}

function parseLiteral(token: string): unknown {
  const text = token.trim();
  if (/^NULL$/i.test(text)) return null;
  if (/^TRUE$/i.test(text)) return true;
  if (/^FALSE$/i.test(text)) return false;
  if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(text)) {
    // Codes with leading zeros and BIGINT keys past 2^53 stay text.
    if (/^-?0\d/.test(text)) return text;
    if (/^-?\d+$/.test(text) && !Number.isSafeInteger(Number(text))) return text;
    return Number(text);
  }
  const quoted = /^[nN]?'([\s\S]*)'$/.exec(text);
  if (quoted) {
    return quoted[1].replace(/''/g, "'").replace(/\\(.)/g, (_, c: string) => {
      if (c === 'n') return '\n';
      if (c === 't') return '\t';
      if (c === 'r') return '\r';
      return c;
    });
  }
  return text;
}

/** Reads the `(…), (…)` tuples of one VALUES clause starting at `start`. */
function readTuples(sql: string, start: number): string[][] {
  const tuples: string[][] = [];
  let i = start;
  while (i < sql.length) {
    while (i < sql.length && /[\s,]/.test(sql[i])) i += 1;
    if (sql[i] !== '(') break;
    const close = closingParen(sql, i + 1);
    if (close < 0) break;
    tuples.push(splitTopLevel(sql.slice(i + 1, close - 1)));
    i = close;
  }
  return tuples;
}

function parseInserts(sql: string, tables: Map<string, TableDef>): void {
  for (const match of sql.matchAll(INSERT_INTO)) {
    const table = tables.get(match[1].toLowerCase());
    if (!table) {
      console.warn(`[SqlDumpParser] INSERT into undeclared table "${match[1]}" ignored`);
      continue;
    }
    const columnNames = match[2]
      ? match[2].split(',').map((c) => c.trim().replace(/[`"[\]]/g, ''))
      : table.columns.map((c) => c.name);

    const tuples = readTuples(sql, (match.index ?? 0) + match[0].length);
    for (const tuple of tuples) {
      const row: SourceRow = {};
      columnNames.forEach((name, i) => {
        const column = table.columns.find((c) => c.name.toLowerCase() === name.toLowerCase());
        row[column?.name ?? name] = i < tuple.length ? parseLiteral(tuple[i]) : null;
      });
      table.rows.push(row);
    }
  }
}

/**
 * Regex-based reader for plain-text SQL dumps (MySQL, PostgreSQL, SQL Server
 * flavoured). Declared types come from CREATE TABLE; INSERT rows supply
 * samples and fill in columns whose declared type is unknown.
 */
export class SqlDumpParser implements SourceParser {
  readonly format = 'sql_dump' as const;

  async parse(content: Buffer, filename: string): Promise<ParsedSource> {
    const sql = stripComments(content.toString('utf8'));
    const tables = parseCreateTables(sql);
    if (tables.size === 0) {
      throw new SourceParseError(filename, 'no CREATE TABLE statements found');
    }
    parseInserts(sql, tables);

    const data = [...tables.values()].map(({ name, columns, rows }) => {
      const enriched = columns.map((column) => {
        const values = rows.map((row) => row[column.name]);
        return {
          ...column,
          type: column.type === 'unknown' && values.length > 0 ? inferDataType(values) : column.type,
          sampleValues: sampleValues(values),
        };
      });
      return { table: { name, columns: enriched, estimatedRows: rows.length }, rows };
    });

    console.log(`[SqlDumpParser] ${filename}: ${data.length} tables, ${data.reduce((n, d) => n + d.rows.length, 0)} rows`);
    return new InMemoryParsedSource('sql_dump', data);
  }
}

function stripComments(sql: string): string {
  return sql.replace(/\/\*[\s\S]*?\*\//g, ' ').replace(/^\s*--.*$/gm, '');
}
