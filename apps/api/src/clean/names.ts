import type { MemberTable, StepOutcome } from '../types/member';

export const NAME_COLUMN = 'name';

const VALID_NAME = /^[\p{L}\s'.-]+$/u;

/**
 * Title-cases every letter run: the first letter after a non-letter is upper-cased,
 * the rest lower-cased. Whitespace collapses to single spaces.
 */
export const toTitleCase = (value: string) =>
  value
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, lead: string, letter: string) => lead + letter.toUpperCase());

export const isValidName = (value: unknown) => {
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  return trimmed.length > 0 && VALID_NAME.test(trimmed) && toTitleCase(trimmed) === trimmed;
};

export const standardizeNames = (table: MemberTable): StepOutcome => {
  let changed = 0;

  for (const row of table.rows) {
    const value = row[NAME_COLUMN];
    if (typeof value !== 'string' || !value.trim()) continue;
    const next = toTitleCase(value);
    if (next !== value) {
      row[NAME_COLUMN] = next;
      changed++;
    }
  }

  return {
    message: `Standardized ${changed} names to Title Case.`,
    affected: changed
  };
};
