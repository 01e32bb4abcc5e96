import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { AskMessage } from '@costnav/shared/constants/ask.constants.js';
import { buildTestApp, LENOX_HILL, MONTEFIORE } from './helpers.js';

describe('POST /ask', () => {
  const { app, findPricedProcedures } = buildTestApp({ rows: [MONTEFIORE, LENOX_HILL] });

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    findPricedProcedures.mockClear();
  });

  it('answers from the structured search when no model is configured', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      payload: { question: 'What is the cheapest hospital for DRG 470?' },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.answer).toBe(
      'I found 2 hospitals. The most affordable option is MONTEFIORE MEDICAL CENTER in BRONX with average charges of $72,000.00.',
    );
    expect(body.out_of_scope).toBe(false);
    expect(body.sql_query).toBeNull();
    expect(body.error).toBeNull();
    expect(body.results).toHaveLength(2);
    expect(body.results[0].provider_id).toBe('330127');
  });

  it('answers a long in-scope question', async () => {
    const question = 'Which hospital is cheapest for DRG 470? '.repeat(30);

    const res = await app.inject({ method: 'POST', url: '/ask', payload: { question } });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.out_of_scope).toBe(false);
    expect(body.results).toHaveLength(2);
    expect(findPricedProcedures).toHaveBeenCalledWith({
      drgCode: '470',
      zipPrefix: undefined,
      sortBy: 'cost',
    });
  });

  it('refuses out-of-scope questions', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      payload: { question: "What's the weather today?" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      answer: AskMessage.OUT_OF_SCOPE,
      results: [],
      out_of_scope: true,
      sql_query: null,
      error: null,
    });
    expect(findPricedProcedures).not.toHaveBeenCalled();
  });

  it('rejects a blank question with 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/ask', payload: { question: '   ' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Question cannot be empty' },
    });
  });

  it('rejects a missing question with 422', async () => {
    const res = await app.inject({ method: 'POST', url: '/ask', payload: {} });

    expect(res.statusCode).toBe(422);
    expect(res.json().error.code).toBe('REQUEST_VALIDATION_FAILED');
  });

  it('returns 500 when the structured search keeps failing', async () => {
    findPricedProcedures
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockRejectedValueOnce(new Error('connection refused'));

    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      payload: { question: 'cheapest hospital for drg 470' },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: { code: 'PROCESSING_FAILED', message: 'Failed to process question' },
    });
  });

  it('reports an absorbed failure in error', async () => {
    findPricedProcedures.mockRejectedValueOnce(new Error('connection reset'));

    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      payload: { question: 'cheapest hospital for drg 470' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().error).toBe('connection reset');
  });
});
