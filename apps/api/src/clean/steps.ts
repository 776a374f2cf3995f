import { UnknownStepError } from '../errors';
import { STEP_NAMES, type CleaningConfig, type MemberTable, type StepName, type StepOutcome } from '../types/member';
import { cleanDates } from './dates';
import { removeDuplicates } from './duplicates';
import { EMAIL_COLUMN, fixEmails } from './emails';
import { handleMissingValues } from './missing';
import { NAME_COLUMN, standardizeNames } from './names';

export type StepContext = {
  config: CleaningConfig;
  now: Date;
};

export type CleaningStep = {
  name: StepName;
  requires: (config: CleaningConfig) => string[];
  run: (table: MemberTable, context: StepContext) => StepOutcome;
};

const STEPS: Record<StepName, CleaningStep> = {
  standardize_names: {
    name: 'standardize_names',
    requires: () => [NAME_COLUMN],
    run: table => standardizeNames(table)
  },
  fix_emails: {
    name: 'fix_emails',
    requires: () => [EMAIL_COLUMN],
    run: table => fixEmails(table)
  },
  remove_duplicates: {
    name: 'remove_duplicates',
    requires: () => [EMAIL_COLUMN, NAME_COLUMN],
    run: (table, { config }) => {
      const { message, affected, details } = removeDuplicates(table, config.similarityThreshold);
      return { message, affected, details };
    }
  },
  clean_dates: {
    name: 'clean_dates',
    requires: config => config.dateColumns,
    run: (table, { config, now }) =>
      cleanDates(table, { columns: config.dateColumns, futureDatePolicy: config.futureDatePolicy, now })
  },
  handle_missing_values: {
    name: 'handle_missing_values',
    requires: config => Object.keys(config.fillRules),
    run: (table, { config }) => handleMissingValues(table, config.fillRules)
  }
};

export const DEFAULT_STEPS: readonly StepName[] = STEP_NAMES;

export const isStepName = (value: string): value is StepName => STEP_NAMES.some(step => step === value);

export const resolveSteps = (names: readonly string[]): CleaningStep[] =>
  names.map(name => {
    if (!isStepName(name)) throw new UnknownStepError(name);
    return STEPS[name];
  });
