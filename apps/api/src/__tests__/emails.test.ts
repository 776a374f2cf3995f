import { describe, it, expect } from 'vitest';
import { fixEmails, isValidEmail, repairEmail } from '../clean/emails';
import { makeTable } from './helpers';

describe('repairEmail', () => {
  it('rewrites spelled-out separators', () => {
    expect(repairEmail('user at example.com')).toBe('user@example.com');
    expect(repairEmail('jane(at)example(dot)org')).toBe('jane@example.org');
  });

  it('lower-cases and trims', () => {
    expect(repairEmail(' Bob@Test.COM ')).toBe('bob@test.com');
  });

  it('returns null for unrepairable or missing values', () => {
    expect(repairEmail('not-an-email')).toBeNull();
    expect(repairEmail(null)).toBeNull();
    expect(repairEmail('')).toBeNull();
  });
});

describe('isValidEmail', () => {
  it('checks local-part@domain.tld', () => {
    expect(isValidEmail('test@example.com')).toBe(true);
    expect(isValidEmail('invalid-email')).toBe(false);
    expect(isValidEmail('test at example.com')).toBe(false);
    expect(isValidEmail(null)).toBe(false);
  });
});

describe('fixEmails', () => {
  it('fixes repairable addresses and removes the rest', () => {
    const table = makeTable(
      [
        { name: 'Alice Brown', email: 'alice at example.com' },
        { name: 'Bob Jones', email: 'bob@test.com' },
        { name: 'Carol White', email: 'not-an-email' }
      ],
      ['name', 'email']
    );

    const outcome = fixEmails(table);

    expect(table.rows.map(r => r.email)).toEqual(['alice@example.com', 'bob@test.com']);
    expect(outcome.details).toEqual({ fixed: 1, removed: 1 });
    expect(outcome.affected).toBe(2);
    expect(outcome.message).toBe('Fixed 1 email addresses. Removed 1 invalid emails.');
  });

  it('removes rows without an email', () => {
    const table = makeTable([{ name: 'Dana Cole', email: null }, { name: 'Eli Park', email: 'eli@test.com' }], ['name', 'email']);
    const outcome = fixEmails(table);

    expect(table.rows).toHaveLength(1);
    expect(outcome.details).toEqual({ fixed: 0, removed: 1 });
  });
});
