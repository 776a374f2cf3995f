import { randomUUID } from 'crypto';
import { SchemaError, StepFailedError } from '../errors';
import { DEFAULT_CLEANING_CONFIG } from '../config';
import { silentLogger, type Logger } from '../logger';
import type {
  CleaningConfig,
  ExecutionLogEntry,
  MemberTable,
  PipelineState,
  StepName
} from '../types/member';
import { cloneTable } from '../utils/values';
import { DEFAULT_STEPS, resolveSteps, type CleaningStep } from './steps';

export type CleaningResult = {
  table: MemberTable;
  log: ExecutionLogEntry[];
  startedAt: Date;
  finishedAt: Date;
  state: PipelineState;
};

export type PipelineOptions = {
  steps?: readonly string[];
  config?: Partial<CleaningConfig>;
  logger?: Logger;
};

/** State of a single run; never shared between runs. */
class CleaningRun {
  state: PipelineState = { status: 'initialized' };
  readonly log: ExecutionLogEntry[] = [];

  start(step: StepName, index: number) {
    this.state = { status: 'running', step, index };
  }

  record(entry: ExecutionLogEntry) {
    this.log.push(entry);
  }

  fail(step: StepName, error: unknown) {
    this.state = { status: 'failed', step, error: error instanceof Error ? error.message : String(error) };
  }

  complete() {
    this.state = { status: 'completed' };
  }
}

/**
 * Runs an ordered subset of the cleaning steps over a private copy of a table.
 * Steps are resolved when the pipeline is built, so an unknown name throws here
 * rather than mid-run.
 */
export class CleaningPipeline {
  readonly steps: readonly CleaningStep[];
  readonly config: CleaningConfig;
  private readonly logger: Logger;

  constructor(options: PipelineOptions = {}) {
    this.steps = resolveSteps(options.steps ?? DEFAULT_STEPS);
    this.config = { ...DEFAULT_CLEANING_CONFIG, ...options.config };
    this.logger = options.logger ?? silentLogger;
  }

  get stepNames(): StepName[] {
    return this.steps.map(s => s.name);
  }

  validate(table: MemberTable) {
    const present = new Set(table.columns);
    for (const step of this.steps) {
      const missing = step.requires(this.config).find(column => !present.has(column));
      if (missing) throw new SchemaError(missing, step.name);
    }
  }

  run(input: MemberTable): CleaningResult {
    this.validate(input);

    const run = new CleaningRun();
    const runLogger = this.logger.child({ runId: randomUUID() });
    const startedAt = this.config.now();
    const table = cloneTable(input);
    runLogger.info({ rows: table.rows.length, steps: this.stepNames }, 'Cleaning run started');

    this.steps.forEach((step, index) => {
      run.start(step.name, index);
      try {
        const outcome = step.run(table, { config: this.config, now: startedAt });
        run.record({ step: step.name, ...outcome });
        runLogger.debug({ step: step.name, affected: outcome.affected, details: outcome.details }, outcome.message);
      } catch (err) {
        run.fail(step.name, err);
        runLogger.error({ err, step: step.name }, 'Cleaning step failed');
        throw new StepFailedError(step.name, err, [...run.log]);
      }
    });

    run.complete();
    const finishedAt = this.config.now();
    runLogger.info({ rows: table.rows.length, durationMs: finishedAt.getTime() - startedAt.getTime() }, 'Cleaning run completed');

    return { table, log: run.log, startedAt, finishedAt, state: run.state };
  }
}
