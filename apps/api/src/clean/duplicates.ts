import type { CellValue, MemberRow, MemberTable, StepOutcome } from '../types/member';
import { isMissing, rowSignature } from '../utils/values';
import { nameSimilarity } from '../utils/similarity';
import { EMAIL_COLUMN, emailKey } from './emails';
import { NAME_COLUMN } from './names';

export type FuzzyMatch = {
  retained: number;
  dropped: number;
  ratio: number;
};

export type DuplicateOutcome = StepOutcome & {
  matches: FuzzyMatch[];
};

/**
 * Identity behind an address: domain kept, local part without dots or a `+tag`.
 * `john.smith+club@x.org` and `johnsmith@x.org` share one identity.
 */
export const emailIdentity = (value: CellValue | undefined) => {
  const key = emailKey(value);
  if (!key) return null;
  const at = key.lastIndexOf('@');
  if (at <= 0) return key;
  const local = key.slice(0, at).split('+')[0].replace(/\./g, '');
  return `${local}@${key.slice(at + 1)}`;
};

const identitiesCompatible = (a: MemberRow, b: MemberRow) => {
  const ia = emailIdentity(a[EMAIL_COLUMN]);
  const ib = emailIdentity(b[EMAIL_COLUMN]);
  return ia === null || ib === null || ia === ib;
};

/** Indexes of the first row seen for every exact key. */
const exactSurvivors = (rows: MemberRow[], columns: string[]) => {
  const seen = new Set<string>();
  const kept: number[] = [];
  rows.forEach((row, index) => {
    const email = emailKey(row[EMAIL_COLUMN]);
    const key = email ? `email:${email}` : `row:${rowSignature(row, columns)}`;
    if (seen.has(key)) return;
    seen.add(key);
    kept.push(index);
  });
  return kept;
};

/**
 * Pairwise name comparison over the surviving rows, O(n²) in their count.
 * Walking i ascending and dropping only j > i keeps the lowest index of every
 * group regardless of how pairs chain.
 */
export const findFuzzyDuplicates = (rows: MemberRow[], threshold: number): FuzzyMatch[] => {
  const matches: FuzzyMatch[] = [];
  const dropped = new Set<number>();

  for (let i = 0; i < rows.length; i++) {
    if (dropped.has(i)) continue;
    const name = rows[i][NAME_COLUMN];
    if (typeof name !== 'string' || isMissing(name)) continue;

    for (let j = i + 1; j < rows.length; j++) {
      if (dropped.has(j)) continue;
      const other = rows[j][NAME_COLUMN];
      if (typeof other !== 'string' || isMissing(other)) continue;
      if (!identitiesCompatible(rows[i], rows[j])) continue;

      const ratio = nameSimilarity(name, other);
      if (ratio >= threshold) {
        dropped.add(j);
        matches.push({ retained: i, dropped: j, ratio: Number(ratio.toFixed(3)) });
      }
    }
  }

  return matches;
};

export const removeDuplicates = (table: MemberTable, threshold: number): DuplicateOutcome => {
  const initial = table.rows.length;
  const kept = exactSurvivors(table.rows, table.columns);
  const exact = initial - kept.length;

  // Match indexes are reported against the table as the step received it.
  const matches = findFuzzyDuplicates(kept.map(i => table.rows[i]), threshold).map(m => ({
    ...m,
    retained: kept[m.retained],
    dropped: kept[m.dropped]
  }));
  const fuzzyDropped = new Set(matches.map(m => m.dropped));
  table.rows = kept.filter(i => !fuzzyDropped.has(i)).map(i => table.rows[i]);

  const removed = initial - table.rows.length;
  return {
    message: `Removed ${removed} duplicate rows.`,
    affected: removed,
    details: { exact, fuzzy: matches.length },
    matches
  };
};
