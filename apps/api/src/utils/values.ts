import type { CellValue, MemberRow, MemberTable } from '../types/member';

export const isMissing = (value: CellValue | undefined) =>
  value === null || value === undefined || String(value).trim() === '';

export const isPresent = (value: CellValue | undefined): value is string | number => !isMissing(value);

/** Most frequent value; ties go to the value seen first. */
export const mode = <T>(values: T[]): T | undefined => {
  const counts = new Map<T, number>();
  values.forEach(v => counts.set(v, (counts.get(v) || 0) + 1));
  let best: T | undefined;
  let bestCount = 0;
  counts.forEach((count, value) => {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  });
  return best;
};

export const rowSignature = (row: MemberRow, columns: string[]) =>
  JSON.stringify(columns.map(col => (isMissing(row[col]) ? null : row[col])));

export const cloneTable = (table: MemberTable): MemberTable => ({
  columns: [...table.columns],
  rows: table.rows.map(row => ({ ...row }))
});
