export type CellValue = string | number | null;

export type MemberRow = Record<string, CellValue>;

export type MemberTable = {
  columns: string[];
  rows: MemberRow[];
};

export const STEP_NAMES = [
  'standardize_names',
  'fix_emails',
  'remove_duplicates',
  'clean_dates',
  'handle_missing_values'
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type ExecutionLogEntry = {
  step: StepName;
  message: string;
  affected: number;
  details?: Record<string, number>;
};

export type StepOutcome = Omit<ExecutionLogEntry, 'step'>;

export type PipelineState =
  | { status: 'initialized' }
  | { status: 'running'; step: StepName; index: number }
  | { status: 'completed' }
  | { status: 'failed'; step: StepName; error: string };

export type FutureDatePolicy = 'flag' | 'coerce';

export type FillRule =
  | { strategy: 'constant'; value: string | number }
  | { strategy: 'mode' };

export type CleaningConfig = {
  similarityThreshold: number;
  dateColumns: string[];
  futureDatePolicy: FutureDatePolicy;
  fillRules: Record<string, FillRule>;
  now: () => Date;
};

export type ScoringWeights = {
  completeness: number;
  uniqueness: number;
  formatting: number;
};

export type ScoringConfig = {
  weights: ScoringWeights;
  precision: number;
  dateColumns: string[];
  uniquenessKey: 'row' | 'email';
};

export type QualityScoreReport = Readonly<{
  completeness: number;
  uniqueness: number;
  formatting: number;
  overall: number;
}>;

export type ColumnProfile = {
  name: string;
  nullCount: number;
  nullRatio: number; // 0..1
  uniqueRatio: number; // 0..1, over present values
};

export type QualityMetrics = {
  totalRecords: number;
  totalCells: number;
  nullCells: number;
  nonNullCells: number;
  duplicateRecords: number;
  uniqueRecords: number;
  columns: ColumnProfile[];
  report: QualityScoreReport;
};

export type QualityComparison = {
  before: QualityMetrics;
  after: QualityMetrics;
  delta: {
    completeness: number;
    uniqueness: number;
    formatting: number;
    overall: number;
    records: number;
    duplicateRecords: number;
    nullCells: number;
  };
};
