import type { CellValue, MemberTable, StepOutcome } from '../types/member';
import { isMissing } from '../utils/values';

export const EMAIL_COLUMN = 'email';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const AT_SUBSTITUTES = /\s*(?:\(at\)|\[at\])\s*|\s+at\s+/g;
const DOT_SUBSTITUTES = /\s*(?:\(dot\)|\[dot\])\s*|\s+dot\s+/g;

export const isValidEmail = (value: unknown) => typeof value === 'string' && EMAIL_PATTERN.test(value.trim());

/** Returns the repaired address, or null when it cannot be made valid. */
export const repairEmail = (value: CellValue | undefined): string | null => {
  if (isMissing(value)) return null;
  const email = String(value)
    .trim()
    .toLowerCase()
    .replace(AT_SUBSTITUTES, '@')
    .replace(DOT_SUBSTITUTES, '.');
  return EMAIL_PATTERN.test(email) ? email : null;
};

export const emailKey = (value: CellValue | undefined) => (isMissing(value) ? null : String(value).trim().toLowerCase());

export const fixEmails = (table: MemberTable): StepOutcome => {
  let fixed = 0;
  let removed = 0;

  table.rows = table.rows.filter(row => {
    const original = row[EMAIL_COLUMN];
    const repaired = repairEmail(original);
    if (repaired === null) {
      removed++;
      return false;
    }
    if (repaired !== original) {
      row[EMAIL_COLUMN] = repaired;
      fixed++;
    }
    return true;
  });

  return {
    message: `Fixed ${fixed} email addresses. Removed ${removed} invalid emails.`,
    affected: fixed + removed,
    details: { fixed, removed }
  };
};
