import type { SourceFormat } from '../types.js';
import { MappingEngineError, SourceParseError, UnsupportedFormatError } from '../utils/errors.js';
import { CsvParser } from './csvParser.js';
import { detectSourceFormat } from './detectFormat.js';
import { ExcelParser } from './excelParser.js';
import { SqlDumpParser } from './sqlDumpParser.js';
import type { ParsedSource, SourceParser } from './types.js';

export type ParserFactory = () => SourceParser;

/**
 * ParserRegistry: maps each source format to a parser factory.
 *
 * Usage:
 *   registry.register('access', () => new MyAccessParser());
 *   const parsed = await registry.parse(buffer, 'legacy.mdb');
 */
export class ParserRegistry {
  private readonly factories = new Map<SourceFormat, ParserFactory>();

  register(format: SourceFormat, factory: ParserFactory): this {
    this.factories.set(format, factory);
    return this;
  }

  has(format: SourceFormat): boolean {
    return this.factories.has(format);
  }

  formats(): SourceFormat[] {
    return [...this.factories.keys()];
  }

  create(format: SourceFormat, filename: string): SourceParser {
    const factory = this.factories.get(format);
    if (!factory) {
      throw new UnsupportedFormatError(
        filename,
        `no parser registered for ${format} sources (registered: ${this.formats().join(', ') || 'none'})`,
      );
    }
    return factory();
  }

  async parse(content: Buffer, filename: string): Promise<ParsedSource> {
    const format = detectSourceFormat(content, filename);
    const parser = this.create(format, filename);
    console.log(`[ParserRegistry] ${filename} detected as ${format}`);
    try {
      return await parser.parse(content, filename);
    } catch (err) {
      if (err instanceof MappingEngineError) throw err;
      throw new SourceParseError(filename, err instanceof Error ? err.message : String(err));
    }
  }
}

/** Built-in parsers. Access databases need an externally registered parser. */
export function createDefaultParserRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register('csv', () => new CsvParser())
    .register('sql_dump', () => new SqlDumpParser())
    .register('excel', () => new ExcelParser());
}
