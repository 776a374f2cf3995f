import type { CellValue, MemberRow, MemberTable } from '../types/member';

const COLUMN_ALIASES: Record<string, string> = {
  full_name: 'name',
  member_name: 'name',
  email_address: 'email',
  joined: 'join_date',
  joined_on: 'join_date',
  registration_date: 'join_date',
  registered_on: 'join_date',
  event_attendance: 'attendance_count',
  attendance: 'attendance_count',
  last_login_at: 'last_login'
};

const NUMERIC_COLUMNS = new Set(['attendance_count']);

export const normalizeColumnName = (name: string) => {
  const token = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return COLUMN_ALIASES[token] ?? token;
};

const toCell = (column: string, value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = String(value);
  if (!text.trim()) return null;
  if (NUMERIC_COLUMNS.has(column)) {
    const num = Number(text.trim());
    if (Number.isFinite(num)) return num;
  }
  return text;
};

/** Builds a table from loose rows, normalizing headers and blank cells. */
export const toMemberTable = (rows: Record<string, unknown>[], columns?: string[]): MemberTable => {
  const order = columns ? columns.map(normalizeColumnName) : [];
  const known = new Set(order);

  const normalized = rows.map(raw => {
    const row: MemberRow = {};
    for (const [key, value] of Object.entries(raw)) {
      const col = normalizeColumnName(key);
      if (!known.has(col)) {
        if (columns) continue;
        known.add(col);
        order.push(col);
      }
      row[col] = toCell(col, value);
    }
    return row;
  });

  // Absent keys, including columns first seen on a later row, become null.
  for (const row of normalized) {
    for (const col of order) {
      if (!(col in row)) row[col] = null;
    }
  }

  return { columns: order, rows: normalized };
};
