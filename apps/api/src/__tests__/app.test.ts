import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app';
import { loadConfig } from '../config';

const app = createApp(loadConfig({ NODE_ENV: 'test' }));

const messyRows = [
  { name: 'john doe', email: 'john at test.com', join_date: '2023-01-15', attendance_count: 5, role: 'Member' },
  { name: 'JANE SMITH', email: 'jane@test.com', join_date: 'Unknown', attendance_count: null, role: 'Admin' },
  { name: 'john doe', email: 'john at test.com', join_date: '2023-01-15', attendance_count: 5, role: 'Member' },
  { name: 'bob wilson', email: 'invalid', join_date: '2022-12-25', attendance_count: 10, role: 'Guest' }
];

describe('GET /api/health', () => {
  it('responds ok', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });
});

describe('POST /api/clean', () => {
  it('cleans JSON rows and returns the log with before/after quality', async () => {
    const res = await request(app).post('/api/clean').send({ rows: messyRows });

    expect(res.status).toBe(200);
    expect(res.body.state).toEqual({ status: 'completed' });
    expect(res.body.log.map((e: { affected: number }) => e.affected)).toEqual([4, 3, 1, 1, 1]);
    expect(res.body.table.rows).toEqual([
      { name: 'John Doe', email: 'john@test.com', join_date: '2023-01-15', attendance_count: 5, role: 'Member' },
      { name: 'Jane Smith', email: 'jane@test.com', join_date: '2023-01-15', attendance_count: 0, role: 'Admin' }
    ]);
    expect(res.body.quality.delta.records).toBe(-2);
  });

  it('accepts CSV text with steps in the query', async () => {
    const res = await request(app)
      .post('/api/clean?steps=fix_emails')
      .set('Content-Type', 'text/csv')
      .send('Name,Email\nAda Byrne,ada at example.org\nBo Chen,bogus\n');

    expect(res.status).toBe(200);
    expect(res.body.log).toEqual([
      {
        step: 'fix_emails',
        message: 'Fixed 1 email addresses. Removed 1 invalid emails.',
        affected: 2,
        details: { fixed: 1, removed: 1 }
      }
    ]);
    expect(res.body.table.rows).toEqual([{ name: 'Ada Byrne', email: 'ada@example.org' }]);
  });

  it('accepts a single-column CSV', async () => {
    const res = await request(app)
      .post('/api/clean?steps=standardize_names')
      .set('Content-Type', 'text/csv')
      .send('Name\nada byrne\n');

    expect(res.status).toBe(200);
    expect(res.body.table.rows).toEqual([{ name: 'Ada Byrne' }]);
  });

  it('returns 400 for an unknown step', async () => {
    const res = await request(app).post('/api/clean').send({ rows: messyRows, steps: ['shuffle'] });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Unknown cleaning step "shuffle".');
  });

  it('returns 400 when a required column is missing', async () => {
    const res = await request(app).post('/api/clean').send({ rows: [{ name: 'Ada Byrne' }] });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Required column "email" is missing (needed by fix_emails).');
  });

  it('returns 400 for malformed JSON', async () => {
    const res = await request(app).post('/api/clean').set('Content-Type', 'application/json').send('{"rows":');

    expect(res.status).toBe(400);
  });
});

describe('POST /api/score', () => {
  it('scores the submitted rows', async () => {
    const res = await request(app)
      .post('/api/score')
      .send({ rows: [{ name: 'John Doe', email: 'john@example.com' }] });

    expect(res.status).toBe(200);
    expect(res.body.report).toEqual({ completeness: 100, uniqueness: 100, formatting: 100, overall: 100 });
    expect(res.body.metrics.totalRecords).toBe(1);
  });

  it('rejects a body without rows', async () => {
    const res = await request(app).post('/api/score').send({ rows: 'nope' });

    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^rows: /);
  });
});

describe('GET /api/samples', () => {
  it('returns the sample roster with its metrics', async () => {
    const res = await request(app).get('/api/samples');

    expect(res.status).toBe(200);
    expect(res.body.table.columns).toEqual([
      'id',
      'name',
      'email',
      'join_date',
      'last_login',
      'attendance_count',
      'role'
    ]);
    expect(res.body.metrics.totalRecords).toBe(8);
    expect(res.body.metrics.duplicateRecords).toBe(1);
  });
});
