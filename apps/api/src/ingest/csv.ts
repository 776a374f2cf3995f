import Papa from 'papaparse';
import { CsvParseError } from '../errors';
import type { MemberTable } from '../types/member';
import { toMemberTable } from './table';

export const ingestCsvText = (text: string): MemberTable => {
  const parsed = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  // A single-column file has no delimiter to detect; Papa warns but parses it.
  const [first] = (parsed.errors || []).filter(e => e.type !== 'Delimiter');
  if (first) throw new CsvParseError(first.row, first.message);

  return toMemberTable(parsed.data || [], parsed.meta.fields);
};
