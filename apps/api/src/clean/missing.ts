import type { CellValue, FillRule, MemberTable, StepOutcome } from '../types/member';
import { isMissing, isPresent, mode } from '../utils/values';

const resolveFill = (table: MemberTable, column: string, rule: FillRule): CellValue | undefined => {
  if (rule.strategy === 'constant') return rule.value;
  return mode(table.rows.map(row => row[column]).filter(isPresent));
};

export const handleMissingValues = (table: MemberTable, rules: Record<string, FillRule>): StepOutcome => {
  const details: Record<string, number> = {};

  for (const [column, rule] of Object.entries(rules)) {
    const fill = resolveFill(table, column, rule);
    let filled = 0;
    if (fill !== undefined && fill !== null) {
      for (const row of table.rows) {
        if (isMissing(row[column])) {
          row[column] = fill;
          filled++;
        }
      }
    }
    details[column] = filled;
  }

  const affected = Object.values(details).reduce((acc, n) => acc + n, 0);
  const summary = Object.entries(details)
    .map(([column, n]) => `${n} missing ${column} values`)
    .join(', ');

  return {
    message: summary ? `Filled ${summary}.` : 'No fill rules configured.',
    affected,
    details
  };
};
