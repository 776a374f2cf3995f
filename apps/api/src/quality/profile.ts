import type { ColumnProfile, MemberTable } from '../types/member';
import { isMissing } from '../utils/values';

export const profileColumn = (table: MemberTable, name: string): ColumnProfile => {
  const values = table.rows.map(r => r[name]);
  const present = values.filter(v => !isMissing(v)).map(v => String(v).trim());
  const total = values.length || 1;
  const nullCount = values.length - present.length;

  return {
    name,
    nullCount,
    nullRatio: nullCount / total,
    uniqueRatio: present.length ? new Set(present).size / present.length : 0
  };
};

export const profileColumns = (table: MemberTable): ColumnProfile[] => table.columns.map(col => profileColumn(table, col));
