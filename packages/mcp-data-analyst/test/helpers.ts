import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryHistoryStore } from '../src/history/memory-store.ts';
import type { Clock } from '../src/history/types.ts';
import { AnalystService } from '../src/services/analyst-service.ts';
import { CodeExecutor, type ExecutionRuntime, type RuntimeJob } from '../src/services/code-executor.ts';
import { CodeGenerator } from '../src/services/code-generator.ts';
import { DatasetRepository } from '../src/services/dataset-repository.ts';
import type { GenerateTextRequest, ModelDescriptor, ModelProvider } from '../src/services/model-provider.ts';

export function descriptor(id: string, methods: string[] = ['generateContent']): ModelDescriptor {
  return { id, displayName: id, supportedGenerationMethods: methods };
}

type Responder = (request: GenerateTextRequest, call: number) => string | Error;

/** Scripted provider; `respond` gets the 1-based call number. */
export class FakeModelProvider implements ModelProvider {
  readonly calls: GenerateTextRequest[] = [];
  listCalls = 0;

  constructor(
    public models: ModelDescriptor[] | Error = [descriptor('gemini-2.0-flash'), descriptor('gemini-2.5-flash')],
    public respond: Responder = () => "print('ok')",
  ) {}

  async listModels(): Promise<ModelDescriptor[]> {
    this.listCalls++;
    if (this.models instanceof Error) throw this.models;
    return this.models;
  }

  async generateText(request: GenerateTextRequest): Promise<string> {
    this.calls.push(request);
    const result = this.respond(request, this.calls.length);
    if (result instanceof Error) throw result;
    return result;
  }
}

/**
 * Runs the generated code as an ES module with Node instead of Python.
 * The dataset is written as `dataset.json` next to the script.
 */
export class NodeRuntime implements ExecutionRuntime {
  readonly name = 'node';

  constructor(readonly command: string = process.execPath) {}

  async prepare({ workDir, code, dataset }: RuntimeJob): Promise<string[]> {
    await writeFile(join(workDir, 'dataset.json'), JSON.stringify(dataset), 'utf-8');
    await writeFile(join(workDir, 'script.mjs'), code, 'utf-8');
    return ['script.mjs'];
  }
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

/** Node code that writes a fake chart and prints a line. */
export const CHART_WRITING_CODE = [
  "import { writeFileSync } from 'node:fs';",
  "writeFileSync('output.png', 'png-bytes');",
  "console.log('chart saved');",
].join('\n');


export interface TestServiceOptions {
  respond?: Responder;
  models?: ModelDescriptor[] | Error;
  now?: Clock;
  timeoutMs?: number;
}

/** AnalystService over temp directories, the in-memory store and NodeRuntime. */
export async function createTestService(options: TestServiceOptions = {}) {
  const root = await makeTempDir('analyst');
  const provider = new FakeModelProvider(options.models, options.respond);
  const history = new InMemoryHistoryStore(options.now);
  const datasets = new DatasetRepository(join(root, 'datasets'));
  const executor = new CodeExecutor(new NodeRuntime(), {
    workDir: join(root, 'runs'),
    timeoutMs: options.timeoutMs ?? 5000,
  });
  const service = new AnalystService({
    provider,
    generator: new CodeGenerator(provider),
    executor,
    history,
    datasets,
    staleAfterDays: 30,
  });
  return { service, provider, history, datasets, executor, root };
}

export const SALES = {
  name: 'sales',
  columns: ['region', 'revenue'],
  rows: [
    ['north', 1],
    ['south', 2],
  ],
};
