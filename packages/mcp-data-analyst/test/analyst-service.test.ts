import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DAY_MS } from '../src/history/types.ts';
import { ConflictError, InvalidInputError, NotFoundError } from '../src/utils/errors.ts';
import { CHART_WRITING_CODE, SALES, createTestService, descriptor } from './helpers.ts';

const fenced = (code: string) => () => `\`\`\`js\n${code}\n\`\`\``;

describe('AnalystService', () => {
  it('registers a dataset and tracks its usage', async () => {
    const { service, history } = await createTestService();

    const registered = await service.registerDataset(SALES);

    expect(registered).toMatchObject({ name: 'sales', rowCount: 2 });
    expect(await history.getDataset(registered.datasetId)).toMatchObject({
      filename: 'sales',
      columns: ['region', 'revenue'],
      usageCount: 1,
    });
  });

  describe('analyze', () => {
    it('generates, runs and logs the answer', async () => {
      const { service, provider } = await createTestService({ respond: fenced("console.log('total 3')") });
      await service.registerDataset(SALES);

      const outcome = await service.analyze('sales', 'What is the total revenue?');

      expect(outcome.code).toBe("console.log('total 3')");
      expect(outcome.model).toBe('gemini-2.0-flash');
      expect(outcome.execution).toMatchObject({ success: true, output: 'total 3', chartExists: false });
      expect(provider.calls[0].prompt).toContain('- region\n- revenue\n');
      expect(provider.calls[0].prompt).toContain('The DataFrame has 2 rows.');

      const details = await service.queryDetails(outcome.queryId);
      expect(details).toMatchObject({
        question: 'What is the total revenue?',
        datasetName: 'sales',
        executionSuccess: true,
        execution: { output: 'total 3', success: true },
      });
      expect(details.results.map((r) => [r.type, r.data])).toEqual([['text', 'total 3']]);
    });

    it('records the chart and serves it', async () => {
      const { service } = await createTestService({ respond: fenced(CHART_WRITING_CODE) });
      await service.registerDataset(SALES);

      const outcome = await service.analyze('sales', 'Plot revenue by region');

      expect(outcome.execution.chartExists).toBe(true);
      const details = await service.queryDetails(outcome.queryId);
      expect(details.results.map((r) => r.type)).toEqual(['text', 'plot']);
      expect(details.results[1].plotPath).toBe(outcome.execution.chartPath);
      expect((await service.readChart(outcome.queryId)).toString('utf-8')).toBe('png-bytes');
    });

    it('logs a failed execution without results', async () => {
      const { service } = await createTestService({ respond: fenced("throw new RangeError('bad')") });
      await service.registerDataset(SALES);

      const outcome = await service.analyze('sales', 'q');

      expect(outcome.execution.success).toBe(false);
      const details = await service.queryDetails(outcome.queryId);
      expect(details.executionSuccess).toBe(false);
      expect(details.results).toEqual([]);
      await expect(service.readChart(outcome.queryId)).rejects.toThrow(
        new NotFoundError(`No chart for query ${outcome.queryId}`),
      );
    });

    it('counts each analysis as a use of the dataset', async () => {
      const { service, history } = await createTestService();
      const { datasetId } = await service.registerDataset(SALES);

      await service.analyze('sales', 'q');

      expect((await history.getDataset(datasetId))?.usageCount).toBe(2);
    });

    it('rejects an unknown dataset and an empty question', async () => {
      const { service, provider } = await createTestService();
      await service.registerDataset(SALES);

      await expect(service.analyze('missing', 'q')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.analyze('sales', '   ')).rejects.toBeInstanceOf(InvalidInputError);
      expect(provider.calls).toHaveLength(0);
    });
  });

  describe('generateCode and executeQuery', () => {
    it('generates from bare columns without a dataset', async () => {
      const { service, history } = await createTestService();

      const outcome = await service.generateCode({ columns: ['a', 'b'], question: 'q' });

      expect(outcome.code).toBe("print('ok')");
      expect((await history.getQuery(outcome.queryId))?.datasetName).toBeNull();
      await expect(service.executeQuery(outcome.queryId)).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('requires columns when no dataset is named', async () => {
      const { service } = await createTestService();
      await expect(service.generateCode({ question: 'q' })).rejects.toThrow('At least one column is required');
    });

    it('executes a generated query exactly once', async () => {
      const { service } = await createTestService({ respond: fenced("console.log('done')") });
      await service.registerDataset(SALES);
      const { queryId } = await service.generateCode({ question: 'q', datasetName: 'sales' });

      const first = await service.executeQuery(queryId);

      expect(first).toMatchObject({ queryId, execution: { success: true, output: 'done' } });
      await expect(service.executeQuery(queryId)).rejects.toBeInstanceOf(ConflictError);
    });

    it('runs a query once when it is executed concurrently', async () => {
      const { service, executor } = await createTestService({
        respond: fenced("import { appendFileSync } from 'node:fs';\nappendFileSync('runs.log', 'run\\n');"),
      });
      await service.registerDataset(SALES);
      const { queryId } = await service.generateCode({ question: 'q', datasetName: 'sales' });

      const settled = await Promise.allSettled([service.executeQuery(queryId), service.executeQuery(queryId)]);

      expect(settled[0].status).toBe('fulfilled');
      expect(settled[1].status).toBe('rejected');
      if (settled[1].status === 'rejected') {
        expect(settled[1].reason).toBeInstanceOf(ConflictError);
      }
      const log = await readFile(join(executor.runDirectory(queryId), 'runs.log'), 'utf-8');
      expect(log).toBe('run\n');
    });

    it('rejects unknown query ids', async () => {
      const { service } = await createTestService();
      await expect(service.executeQuery('missing')).rejects.toThrow(new NotFoundError('Query not found: missing'));
      await expect(service.readChart('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('uses the requested model', async () => {
      const { service, provider } = await createTestService();
      await service.generateCode({ columns: ['a'], question: 'q', model: 'gemini-2.5-flash' });
      expect(provider.calls[0].model).toBe('gemini-2.5-flash');
    });
  });

  it('lists only models that can generate content', async () => {
    const { service } = await createTestService({
      models: [descriptor('gemini-2.0-flash'), descriptor('text-embedding-004', ['embedContent'])],
    });

    expect((await service.listModels()).map((m) => m.id)).toEqual(['gemini-2.0-flash']);
  });

  describe('dataset housekeeping', () => {
    it('cleans up stale non-favorite datasets and their files', async () => {
      let now = new Date('2024-05-01T00:00:00Z');
      const { service, datasets } = await createTestService({ now: () => now });
      const stale = await service.registerDataset(SALES);
      const kept = await service.registerDataset({ ...SALES, name: 'kept' });
      await service.toggleFavorite(kept.datasetId);
      now = new Date(now.getTime() + 31 * DAY_MS);

      const removed = await service.cleanupDatasets();

      expect(removed.map((e) => e.id)).toEqual([stale.datasetId]);
      expect(await datasets.exists('sales')).toBe(false);
      expect(await datasets.exists('kept')).toBe(true);
      expect((await service.listFavorites()).map((e) => e.name)).toEqual(['kept']);
    });

    it('deletes a dataset and its file', async () => {
      const { service, datasets } = await createTestService();
      const { datasetId } = await service.registerDataset(SALES);

      expect(await service.deleteDataset(datasetId)).toBe(true);
      expect(await datasets.exists('sales')).toBe(false);
      expect(await service.deleteDataset(datasetId)).toBe(false);
      expect(await service.listHistory()).toEqual([]);
    });
  });

  it('reports statistics over logged queries', async () => {
    const { service } = await createTestService({ respond: fenced("console.log('ok')") });
    await service.registerDataset(SALES);
    await service.analyze('sales', 'q1');
    await service.generateCode({ question: 'q2', datasetName: 'sales' });

    expect(await service.statistics()).toEqual({
      totalQueries: 2,
      successfulQueries: 1,
      successRate: 50,
      totalDatasets: 1,
    });
    expect((await service.recentQueries(1)).map((q) => q.question)).toEqual(['q2']);
  });
});
