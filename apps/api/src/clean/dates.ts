import { format, isValid, parse } from 'date-fns';
import type { CellValue, FutureDatePolicy, MemberTable, StepOutcome } from '../types/member';
import { isMissing } from '../utils/values';

export const CANONICAL_DATE_FORMAT = 'yyyy-MM-dd';

// Tried in order; month and day accept one or two digits.
const INPUT_FORMATS = ['yyyy-M-d', 'M/d/yyyy', 'd-M-yyyy', 'yyyy/M/d'];
const TIMESTAMP_PREFIX = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;
const DATE_SHAPE = /^(?:\d{4}[-/]\d{1,2}[-/]\d{1,2}|\d{1,2}[-/]\d{1,2}[-/]\d{4})$/;
const REFERENCE_DATE = new Date(2000, 0, 1);

/** Parses an accepted date shape to canonical `YYYY-MM-DD`, or null. */
export const parseDate = (value: CellValue | undefined): string | null => {
  if (isMissing(value) || typeof value !== 'string') return null;
  const text = value.trim();
  const stamp = TIMESTAMP_PREFIX.exec(text);
  const candidate = stamp ? stamp[1] : text;
  if (!DATE_SHAPE.test(candidate)) return null;

  for (const pattern of INPUT_FORMATS) {
    const parsed = parse(candidate, pattern, REFERENCE_DATE);
    if (isValid(parsed)) return format(parsed, CANONICAL_DATE_FORMAT);
  }
  return null;
};

/** Most frequent canonical date; ties go to the earliest. */
export const modeDate = (dates: string[]): string | null => {
  const counts = new Map<string, number>();
  dates.forEach(d => counts.set(d, (counts.get(d) || 0) + 1));
  let best: string | null = null;
  let bestCount = 0;
  counts.forEach((count, date) => {
    if (count > bestCount || (count === bestCount && best !== null && date < best)) {
      best = date;
      bestCount = count;
    }
  });
  return best;
};

export type CleanDatesOptions = {
  columns: string[];
  futureDatePolicy: FutureDatePolicy;
  now: Date;
};

export const cleanDates = (table: MemberTable, options: CleanDatesOptions): StepOutcome => {
  const today = format(options.now, CANONICAL_DATE_FORMAT);
  const totals = { reformatted: 0, imputed: 0, future: 0, coerced: 0, unresolved: 0 };
  const changedRows = new Set<number>();

  for (const column of options.columns) {
    const parsed = table.rows.map(row => parseDate(row[column]));
    const fill = modeDate(parsed.filter((d): d is string => d !== null));

    table.rows.forEach((row, index) => {
      const original = row[column];
      let next = parsed[index];

      if (next === null) {
        if (fill === null) {
          totals.unresolved++;
          if (original !== null && original !== undefined) {
            row[column] = null;
            changedRows.add(index);
          }
          return;
        }
        next = fill;
        totals.imputed++;
      } else if (next !== original) {
        totals.reformatted++;
      }

      if (next > today) {
        totals.future++;
        if (options.futureDatePolicy === 'coerce') {
          next = today;
          totals.coerced++;
        }
      }

      if (next !== original) {
        row[column] = next;
        changedRows.add(index);
      }
    });
  }

  const affected = changedRows.size;
  const parts = [
    `Standardized ${totals.reformatted} dates`,
    `imputed ${totals.imputed} missing/bad dates with mode`
  ];
  if (totals.future) parts.push(`flagged ${totals.future} future dates`);
  if (totals.coerced) parts.push(`coerced ${totals.coerced} to ${today}`);
  if (totals.unresolved) parts.push(`left ${totals.unresolved} unresolved`);

  return {
    message: `${parts.join(', ')}.`,
    affected,
    details: totals
  };
};
