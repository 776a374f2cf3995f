import type { ExecutionLogEntry, StepName } from './types/member';

export class CleaningError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A column needed by a selected step is absent from the input table. */
export class SchemaError extends CleaningError {
  constructor(readonly column: string, readonly step: StepName) {
    super(`Required column "${column}" is missing (needed by ${step}).`);
  }
}

export class UnknownStepError extends CleaningError {
  constructor(readonly step: string) {
    super(`Unknown cleaning step "${step}".`);
  }
}

/** Carries the entries logged before the failing step. */
export class StepFailedError extends CleaningError {
  constructor(readonly step: StepName, cause: unknown, readonly log: ExecutionLogEntry[] = []) {
    super(`Step ${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class CsvParseError extends CleaningError {
  constructor(readonly row: number | undefined, detail: string) {
    super(`CSV parse error${row === undefined ? '' : ` at row ${row}`}: ${detail}`);
  }
}
