import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';
import { ExcelParser } from '../parsers/excelParser.js';
import { SourceParseError } from '../utils/errors.js';

async function workbookBuffer(): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const clientes = workbook.addWorksheet('Clientes');
  clientes.addRow(['Nome', 'Idade', 'Ativo', 'Total']);
  clientes.addRow(['Ana', 34, true, { formula: 'B2*2', result: 68 }]);
  clientes.addRow(['Bruno', null, false, 10]);
  workbook.addWorksheet('Vazia');
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe('ExcelParser', () => {
  it('reads each sheet with a header row as a table', async () => {
    const source = await new ExcelParser().parse(await workbookBuffer(), 'clientes.xlsx');
    const schema = source.discover();

    expect(schema.format).toBe('excel');
    expect(schema.tables.map((t) => t.name)).toEqual(['Clientes']);
    expect(schema.tables[0].columns.map((c) => [c.name, c.type, c.nullable])).toEqual([
      ['Nome', 'string', false],
      ['Idade', 'integer', true],
      ['Ativo', 'boolean', false],
      ['Total', 'integer', false],
    ]);
    expect([...source.rows('clientes')]).toEqual([
      { Nome: 'Ana', Idade: 34, Ativo: true, Total: 68 },
      { Nome: 'Bruno', Idade: null, Ativo: false, Total: 10 },
    ]);
  });

  it('rejects content that is not a workbook', async () => {
    await expect(new ExcelParser().parse(Buffer.from('not a zip'), 'broken.xlsx')).rejects.toThrow(SourceParseError);
  });

  it('rejects a workbook without headers', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Vazia');
    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
    await expect(new ExcelParser().parse(buffer, 'vazio.xlsx')).rejects.toThrow(
      'Failed to parse "vazio.xlsx": workbook has no sheet with a header row',
    );
  });
});
