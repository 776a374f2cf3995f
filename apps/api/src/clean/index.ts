import type { Logger } from '../logger';
import { QualityScorer } from '../quality/score';
import type { CleaningConfig, MemberTable, QualityComparison, ScoringConfig } from '../types/member';
import { CleaningPipeline, type CleaningResult } from './pipeline';

export type CleanAndScoreOptions = {
  steps?: readonly string[];
  cleaning?: Partial<CleaningConfig>;
  scoring?: Partial<ScoringConfig>;
  logger?: Logger;
};

export type CleanAndScoreResult = CleaningResult & {
  quality: QualityComparison;
};

export const cleanAndScore = (raw: MemberTable, options: CleanAndScoreOptions = {}): CleanAndScoreResult => {
  const pipeline = new CleaningPipeline({ steps: options.steps, config: options.cleaning, logger: options.logger });
  const scorer = new QualityScorer(options.scoring);

  const result = pipeline.run(raw);
  return { ...result, quality: scorer.compare(raw, result.table) };
};

export { CleaningPipeline } from './pipeline';
export type { CleaningResult, PipelineOptions } from './pipeline';
export { DEFAULT_STEPS, isStepName, resolveSteps } from './steps';
export { standardizeNames, toTitleCase, isValidName } from './names';
export { fixEmails, repairEmail, isValidEmail } from './emails';
export { cleanDates, parseDate } from './dates';
export { removeDuplicates, findFuzzyDuplicates } from './duplicates';
export { handleMissingValues } from './missing';
