import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { z } from 'zod';

import type { AppConfig } from './config';
import { cleanAndScore } from './clean';
import { CleaningError, StepFailedError } from './errors';
import { ingestCsvText } from './ingest/csv';
import { toMemberTable } from './ingest/table';
import { silentLogger, type Logger } from './logger';
import { QualityScorer } from './quality/score';
import { loadSampleTable } from './samples';
import type { MemberTable } from './types/member';

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const tableBodySchema = z.object({
  rows: z.array(z.record(cellSchema)),
  columns: z.array(z.string()).optional()
});

const cleanBodySchema = tableBodySchema.extend({
  steps: z.array(z.string()).optional()
});

const parseSteps = (value: unknown) =>
  typeof value === 'string' && value.trim()
    ? value.split(',').map(s => s.trim()).filter(Boolean)
    : undefined;

const validationMessage = (error: z.ZodError) =>
  error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');

export const createApp = (config: AppConfig, logger: Logger = silentLogger) => {
  const app = express();
  const scorer = new QualityScorer(config.scoring);

  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(express.text({ type: 'text/csv', limit: config.jsonBodyLimit }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/clean', (req, res) => {
    let table: MemberTable;
    let steps: string[] | undefined;

    if (req.is('text/csv')) {
      if (typeof req.body !== 'string' || !req.body.trim()) {
        return res.status(400).json({ error: 'CSV body is empty.' });
      }
      table = ingestCsvText(req.body);
      steps = parseSteps(req.query.steps);
    } else {
      const parsed = cleanBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: validationMessage(parsed.error) });
      table = toMemberTable(parsed.data.rows, parsed.data.columns);
      steps = parsed.data.steps;
    }

    const result = cleanAndScore(table, {
      steps,
      cleaning: config.cleaning,
      scoring: config.scoring,
      logger
    });

    res.json({
      table: result.table,
      log: result.log,
      state: result.state,
      startedAt: result.startedAt.toISOString(),
      finishedAt: result.finishedAt.toISOString(),
      quality: result.quality
    });
  });

  app.post('/api/score', (req, res) => {
    const parsed = tableBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: validationMessage(parsed.error) });

    const table = toMemberTable(parsed.data.rows, parsed.data.columns);
    const metrics = scorer.metrics(table);
    res.json({ report: metrics.report, metrics });
  });

  app.get('/api/samples', (_req, res) => {
    const table = loadSampleTable();
    res.json({ table, metrics: scorer.metrics(table) });
  });

  const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof CleaningError && !(err instanceof StepFailedError)) {
      return res.status(400).json({ error: err.message });
    }
    // body-parser marks malformed payloads with a 4xx status
    if (typeof err?.status === 'number' && err.status >= 400 && err.status < 500) {
      return res.status(err.status).json({ error: err.message || 'Invalid request body' });
    }
    logger.error({ err }, 'Request failed');
    const message = err instanceof Error ? err.message : 'Internal error';
    res.status(500).json({ error: message });
  };
  app.use(handleError);

  return app;
};
