import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  buildCsvExport,
  buildJsonExport,
  parseJsonExport,
  parseMappingSet,
  readMappingSetFile,
  writeMappingSetFile,
} from '../services/exporter.js';
import type { MappingSet } from '../types.js';
import { MappingSetFormatError } from '../utils/errors.js';
import { engine } from './fixtures.js';

function reviewSet(): MappingSet {
  return {
    schemaVersion: 1,
    tables: [
      {
        sourceTable: 'contacts',
        endpoint: '/v1/contacts',
        skipped: false,
        confidence: 1,
        rationale: 'exact',
        columns: [
          {
            type: 'many_to_one',
            sourceColumns: ['first_name', 'last_name'],
            targetField: 'full_name',
            combine: { kind: 'concat', separator: ' ' },
            confidence: 0.85,
            rationale: 'containment',
          },
        ],
        unmappedColumns: ['nickname'],
        status: 'draft',
      },
      {
        sourceTable: 'staff',
        endpoint: '/v1/employees',
        skipped: false,
        confidence: 0.7,
        rationale: 'synonym',
        columns: [
          {
            type: 'one_to_many',
            sourceColumn: 'full_name',
            targetFields: ['first_name', 'last_name'],
            split: { kind: 'whitespace' },
            transformers: { first_name: 'TRIM' },
            confirmed: false,
            confidence: 0.85,
            rationale: 'containment',
          },
        ],
        unmappedColumns: [],
        status: 'draft',
      },
      {
        sourceTable: 'xyz',
        skipped: true,
        skipReason: 'no endpoint match',
        confidence: 0.18,
        rationale: 'none',
        columns: [],
        unmappedColumns: [],
        status: 'validated',
      },
    ],
  };
}

describe('JSON export', () => {
  it('reads back exactly what it wrote', () => {
    const set = engine().builder.autoMap();
    expect(parseJsonExport(buildJsonExport(set))).toEqual(set);
    expect(parseJsonExport(buildJsonExport(reviewSet()))).toEqual(reviewSet());
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseJsonExport('{')).toThrow(/^Mapping set is not valid JSON: /);
  });

  it('names the first invalid path', () => {
    const set = reviewSet();
    set.tables[0].sourceTable = '';
    expect(() => parseMappingSet(set)).toThrow(/^Invalid mapping set at tables\.0\.sourceTable: /);
    expect(() => parseMappingSet({ schemaVersion: 2, tables: [] })).toThrow(MappingSetFormatError);
  });

  it('rejects a combined mapping with one column', () => {
    const set = reviewSet();
    const [mapping] = set.tables[0].columns;
    if (mapping.type !== 'many_to_one') throw new Error('fixture changed');
    mapping.sourceColumns = ['first_name'];
    expect(() => parseMappingSet(set)).toThrow(/at tables\.0\.columns\.0\.sourceColumns/);
  });

  it('rejects the same table twice, whatever the case', () => {
    const set = reviewSet();
    set.tables[1].sourceTable = 'CONTACTS';
    expect(() => parseMappingSet(set)).toThrow('Duplicate table mapping "CONTACTS"');
  });
});

describe('mapping set files', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes into missing directories and reads the file back', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mapping-set-'));
    const file = path.join(dir, 'nested', 'mapping.json');
    writeMappingSetFile(file, reviewSet());
    expect(fs.readFileSync(file, 'utf8').endsWith('}\n')).toBe(true);
    expect(readMappingSetFile(file)).toEqual(reviewSet());
  });
});

describe('CSV export', () => {
  it('writes one row per mapping, unmapped column and skipped table', () => {
    expect(buildCsvExport(reviewSet()).split('\n')).toEqual([
      'sourceTable,endpoint,status,mappingType,sourceColumns,targetFields,rule,transformer,confidence,rationale',
      'contacts,/v1/contacts,draft,many_to_one,first_name+last_name,full_name,"concat("" "")",,0.850,containment',
      'contacts,/v1/contacts,draft,unmapped,nickname,,,,,',
      'staff,/v1/employees,draft,one_to_many,full_name,first_name+last_name,split(whitespace) unconfirmed,first_name=TRIM,0.850,containment',
      'xyz,,validated,skip,,,,,,no endpoint match',
    ]);
  });
});
