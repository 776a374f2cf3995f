import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import type { CleaningConfig, ScoringConfig } from './types/member';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  JSON_BODY_LIMIT: z.string().default('5mb'),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  FUTURE_DATE_POLICY: z.enum(['flag', 'coerce']).default('flag'),
  SCORE_PRECISION: z.coerce.number().int().min(0).max(6).default(1)
});

export type AppConfig = {
  env: z.infer<typeof envSchema>['NODE_ENV'];
  port: number;
  logLevel: LevelWithSilent;
  jsonBodyLimit: string;
  cleaning: CleaningConfig;
  scoring: ScoringConfig;
};

export const DEFAULT_CLEANING_CONFIG: CleaningConfig = {
  similarityThreshold: 0.85,
  dateColumns: ['join_date'],
  futureDatePolicy: 'flag',
  fillRules: {
    attendance_count: { strategy: 'constant', value: 0 }
  },
  now: () => new Date()
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: { completeness: 0.4, uniqueness: 0.3, formatting: 0.3 },
  precision: 1,
  dateColumns: ['join_date'],
  uniquenessKey: 'row'
};

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    cleaning: {
      ...DEFAULT_CLEANING_CONFIG,
      similarityThreshold: env.SIMILARITY_THRESHOLD,
      futureDatePolicy: env.FUTURE_DATE_POLICY
    },
    scoring: {
      ...DEFAULT_SCORING_CONFIG,
      precision: env.SCORE_PRECISION
    }
  };
};
