import { DEFAULT_SCORING_CONFIG } from '../config';
import { EMAIL_COLUMN, emailKey, isValidEmail } from '../clean/emails';
import { NAME_COLUMN, isValidName } from '../clean/names';
import { parseDate } from '../clean/dates';
import type {
  CellValue,
  MemberRow,
  MemberTable,
  QualityComparison,
  QualityMetrics,
  QualityScoreReport,
  ScoringConfig
} from '../types/member';
import { isMissing, rowSignature } from '../utils/values';
import { profileColumns } from './profile';

type CellCheck = (value: CellValue | undefined) => boolean;

/**
 * Scores a table snapshot on completeness, uniqueness and formatting.
 * Holds configuration only: every method is a pure function of its input table.
 */
export class QualityScorer {
  readonly config: ScoringConfig;

  constructor(config: Partial<ScoringConfig> = {}) {
    this.config = { ...DEFAULT_SCORING_CONFIG, ...config };
  }

  private round(value: number) {
    return Number(value.toFixed(this.config.precision));
  }

  private percent(part: number, whole: number) {
    return whole ? this.round((part / whole) * 100) : 0;
  }

  private countMissing(table: MemberTable) {
    let missing = 0;
    for (const row of table.rows) {
      for (const col of table.columns) {
        if (isMissing(row[col])) missing++;
      }
    }
    return missing;
  }

  private uniqueCount(table: MemberTable) {
    const key = (row: MemberRow) => {
      const email = this.config.uniquenessKey === 'email' ? emailKey(row[EMAIL_COLUMN]) : null;
      return email ? `email:${email}` : `row:${rowSignature(row, table.columns)}`;
    };
    return new Set(table.rows.map(key)).size;
  }

  private formatChecks(table: MemberTable): Array<[string, CellCheck]> {
    const checks: Array<[string, CellCheck]> = [
      [EMAIL_COLUMN, isValidEmail],
      [NAME_COLUMN, isValidName],
      ...this.config.dateColumns.map((col): [string, CellCheck] => [col, v => parseDate(v) !== null])
    ];
    return checks.filter(([col]) => table.columns.includes(col));
  }

  completeness(table: MemberTable) {
    const total = table.rows.length * table.columns.length;
    return this.percent(total - this.countMissing(table), total);
  }

  uniqueness(table: MemberTable) {
    return this.percent(this.uniqueCount(table), table.rows.length);
  }

  formatting(table: MemberTable) {
    const checks = this.formatChecks(table);
    // Nothing to check is not a formatting failure.
    if (!checks.length && table.rows.length) return 100;
    let valid = 0;
    for (const row of table.rows) {
      for (const [col, check] of checks) {
        if (check(row[col])) valid++;
      }
    }
    return this.percent(valid, table.rows.length * checks.length);
  }

  score(table: MemberTable): QualityScoreReport {
    const completeness = this.completeness(table);
    const uniqueness = this.uniqueness(table);
    const formatting = this.formatting(table);
    const { weights } = this.config;
    const overall = this.round(
      completeness * weights.completeness + uniqueness * weights.uniqueness + formatting * weights.formatting
    );
    return Object.freeze({ completeness, uniqueness, formatting, overall });
  }

  metrics(table: MemberTable): QualityMetrics {
    const totalRecords = table.rows.length;
    const totalCells = totalRecords * table.columns.length;
    const nullCells = this.countMissing(table);
    const uniqueRecords = this.uniqueCount(table);

    return {
      totalRecords,
      totalCells,
      nullCells,
      nonNullCells: totalCells - nullCells,
      duplicateRecords: totalRecords - uniqueRecords,
      uniqueRecords,
      columns: profileColumns(table),
      report: this.score(table)
    };
  }

  compare(before: MemberTable, after: MemberTable): QualityComparison {
    const b = this.metrics(before);
    const a = this.metrics(after);
    const diff = (x: number, y: number) => this.round(y - x);

    return {
      before: b,
      after: a,
      delta: {
        completeness: diff(b.report.completeness, a.report.completeness),
        uniqueness: diff(b.report.uniqueness, a.report.uniqueness),
        formatting: diff(b.report.formatting, a.report.formatting),
        overall: diff(b.report.overall, a.report.overall),
        records: a.totalRecords - b.totalRecords,
        duplicateRecords: a.duplicateRecords - b.duplicateRecords,
        nullCells: a.nullCells - b.nullCells
      }
    };
  }
}
