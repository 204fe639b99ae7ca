import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import { createApp } from '../src/server.ts';
import { ModelCallError, ModelTimeoutError } from '../src/utils/errors.ts';
import { CHART_WRITING_CODE, SALES, createTestService, type FakeModelProvider } from './helpers.ts';

describe('REST API', () => {
  let server: Server;
  let http: AxiosInstance;
  let provider: FakeModelProvider;

  beforeAll(async () => {
    const setup = await createTestService();
    provider = setup.provider;
    const app = createApp(setup.service);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    http = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
    await http.post('/api/datasets', SALES);
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    provider.respond = () => "```js\nconsole.log('total 3')\n```";
  });

  it('reports health', async () => {
    const response = await http.get('/health');
    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      status: 'ok',
      server: 'data-analyst-mcp-server',
      version: '1.0.0',
      activeSessions: 0,
    });
  });

  describe('datasets', () => {
    it('registers a dataset', async () => {
      const response = await http.post('/api/datasets', { ...SALES, name: 'sales-copy' });

      expect(response.status).toBe(201);
      expect(response.data).toMatchObject({ name: 'sales-copy', row_count: 2 });
      expect(typeof response.data.dataset_id).toBe('string');
    });

    it('rejects ragged rows', async () => {
      const response = await http.post('/api/datasets', { name: 'bad', columns: ['a', 'b'], rows: [[1]] });

      expect(response.status).toBe(400);
      expect(response.data).toEqual({
        error: { code: 'INVALID_INPUT', message: 'Row 0 has 1 cells, expected 2' },
      });
    });

    it('rejects malformed JSON', async () => {
      const response = await http.post('/api/datasets', '{"name":', {
        headers: { 'Content-Type': 'application/json' },
      });

      expect(response.status).toBe(400);
      expect(response.data).toEqual({ error: { code: 'INVALID_INPUT', message: 'Malformed JSON body' } });
    });

    it('lists history and toggles a favorite', async () => {
      const history = await http.get('/api/datasets/history', { params: { limit: 1 } });
      expect(history.status).toBe(200);
      expect(history.data.datasets).toHaveLength(1);
      const id: string = history.data.datasets[0].id;

      const toggled = await http.post(`/api/datasets/${id}/favorite`);
      expect(toggled.data).toEqual({ is_favorite: true });

      const favorites = await http.get('/api/datasets/favorites');
      expect(favorites.data.favorites.map((entry: { id: string }) => entry.id)).toEqual([id]);

      await http.post(`/api/datasets/${id}/favorite`);
    });

    it('returns 404 when toggling an unknown dataset', async () => {
      const response = await http.post('/api/datasets/missing/favorite');
      expect(response.status).toBe(404);
      expect(response.data.error.code).toBe('NOT_FOUND');
    });

    it('reports nothing to clean up for recent datasets', async () => {
      const response = await http.post('/api/datasets/cleanup', { older_than_days: 7 });
      expect(response.status).toBe(200);
      expect(response.data).toEqual({ removed_count: 0 });
    });

    it('deletes a dataset', async () => {
      const created = await http.post('/api/datasets', { ...SALES, name: 'to-delete' });
      const id: string = created.data.dataset_id;

      expect((await http.delete(`/api/datasets/${id}`)).data).toEqual({ deleted: true });
      expect((await http.delete(`/api/datasets/${id}`)).data).toEqual({ deleted: false });
    });
  });

  describe('analysis', () => {
    it('analyzes a dataset', async () => {
      const response = await http.post('/api/analyze', { dataset_name: 'sales', question: 'Total revenue?' });

      expect(response.status).toBe(200);
      expect(response.data).toMatchObject({
        generated_code: "console.log('total 3')",
        model: 'gemini-2.0-flash',
        attempts: 1,
        execution: {
          success: true,
          reason: null,
          error_type: null,
          exit_code: 0,
          output: 'total 3',
          chart_exists: false,
          chart_url: null,
        },
      });
    });

    it('generates code, runs it once and serves the chart', async () => {
      provider.respond = () => `\`\`\`js\n${CHART_WRITING_CODE}\n\`\`\``;

      const generated = await http.post('/api/generate_code', { dataset_name: 'sales', question: 'Plot it' });
      expect(generated.status).toBe(200);
      const queryId: string = generated.data.query_id;

      const executed = await http.post(`/api/queries/${queryId}/execute`);
      expect(executed.status).toBe(200);
      expect(executed.data.execution).toMatchObject({
        success: true,
        output: 'chart saved',
        chart_exists: true,
        chart_url: `/api/queries/${queryId}/chart`,
      });

      const again = await http.post(`/api/queries/${queryId}/execute`);
      expect(again.status).toBe(409);
      expect(again.data.error.code).toBe('CONFLICT');

      const chart = await http.get(`/api/queries/${queryId}/chart`, { responseType: 'arraybuffer' });
      expect(chart.status).toBe(200);
      expect(chart.headers['content-type']).toBe('image/png');
      expect(Buffer.from(chart.data).toString('utf-8')).toBe('png-bytes');

      const details = await http.get(`/api/queries/${queryId}`);
      expect(details.data).toMatchObject({
        id: queryId,
        question: 'Plot it',
        dataset_name: 'sales',
        execution_success: true,
        generated_code: CHART_WRITING_CODE,
        dataset_columns: ['region', 'revenue'],
      });
      expect(details.data.results.map((r: { type: string }) => r.type)).toEqual(['text', 'plot']);
    });

    it('requires columns or a dataset name', async () => {
      const response = await http.post('/api/generate_code', { question: 'q' });

      expect(response.status).toBe(400);
      expect(response.data).toEqual({
        error: { code: 'INVALID_INPUT', message: 'columns: Provide columns or dataset_name' },
      });
    });

    it('returns 404 for an unknown dataset or query', async () => {
      const analyze = await http.post('/api/analyze', { dataset_name: 'missing', question: 'q' });
      expect(analyze.status).toBe(404);
      expect(analyze.data.error.message).toBe('Dataset not found: missing');

      const query = await http.get('/api/queries/missing');
      expect(query.status).toBe(404);
      expect(query.data.error.message).toBe('Query not found: missing');
    });

    it('maps model failures to 502 and model timeouts to 504', async () => {
      provider.respond = () => new ModelCallError('Gemini API error: quota', 429);
      const failed = await http.post('/api/analyze', { dataset_name: 'sales', question: 'q' });
      expect(failed.status).toBe(502);
      expect(failed.data).toEqual({ error: { code: 'MODEL_CALL_ERROR', message: 'Gemini API error: quota' } });

      provider.respond = (request) => new ModelTimeoutError(request.model, 1000);
      const timedOut = await http.post('/api/analyze', { dataset_name: 'sales', question: 'q' });
      expect(timedOut.status).toBe(504);
      expect(timedOut.data.error.code).toBe('MODEL_TIMEOUT');
    });
  });

  it('lists recent queries and statistics', async () => {
    const recent = await http.get('/api/queries/recent', { params: { limit: 2 } });
    expect(recent.status).toBe(200);
    expect(recent.data.queries.length).toBeLessThanOrEqual(2);

    const stats = await http.get('/api/statistics');
    expect(Object.keys(stats.data).sort()).toEqual([
      'success_rate',
      'successful_queries',
      'total_datasets',
      'total_queries',
    ]);
  });

  it('lists models', async () => {
    const response = await http.get('/api/models');
    expect(response.data.models.map((m: { id: string }) => m.id)).toEqual(['gemini-2.0-flash', 'gemini-2.5-flash']);
  });

  it('answers unknown routes with 404', async () => {
    const response = await http.get('/api/nope');
    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  it('rejects an invalid limit', async () => {
    const response = await http.get('/api/queries/recent', { params: { limit: 0 } });
    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('INVALID_INPUT');
  });
});
