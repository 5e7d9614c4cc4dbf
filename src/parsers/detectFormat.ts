import path from 'node:path';
import type { SourceFormat } from '../types.js';
import { UnsupportedFormatError } from '../utils/errors.js';

const EXTENSIONS: Record<string, SourceFormat> = {
  '.sql': 'sql_dump',
  '.dump': 'sql_dump',
  '.csv': 'csv',
  '.tsv': 'csv',
  '.txt': 'csv',
  '.xlsx': 'excel',
  '.xlsm': 'excel',
  '.mdb': 'access',
  '.accdb': 'access',
};

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);
const SNIFF_BYTES = 64 * 1024;

/**
 * Decides the source format from the content first and the file extension
 * second. Unrecognized text falls back to CSV.
 */
export function detectSourceFormat(content: Buffer, filename: string): SourceFormat {
  if (content.subarray(0, 4).equals(ZIP_MAGIC)) return 'excel';

  const jet = content.subarray(4, 19).toString('latin1');
  if (jet === 'Standard Jet DB' || jet === 'Standard ACE DB') return 'access';

  if (content.subarray(0, 4).equals(OLE_MAGIC)) {
    throw new UnsupportedFormatError(filename, 'legacy binary workbooks (.xls) are not supported; save the file as .xlsx');
  }

  const head = content.subarray(0, SNIFF_BYTES);
  if (head.includes(0)) {
    throw new UnsupportedFormatError(filename, 'binary content of an unknown format');
  }
  if (/\b(CREATE\s+TABLE|INSERT\s+INTO)\b/i.test(head.toString('utf8'))) return 'sql_dump';

  return EXTENSIONS[path.extname(filename).toLowerCase()] ?? 'csv';
}
