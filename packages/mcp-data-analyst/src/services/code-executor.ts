/**
 * Runs generated analysis code in a separate, time-bounded process.
 *
 * Every run gets its own work directory (`<workDir>/<runId>`), which is also the
 * child's cwd, so chart artifacts of concurrent runs never collide. Failures of
 * the executed code are returned as results; execute() only throws for invalid
 * run ids or when the work directory cannot be prepared.
 */

import { spawn } from 'node:child_process';
import { copyFile, mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CHART_FILENAME } from '../config.ts';
import { InvalidInputError, errorMessage } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { TabularDataset } from './dataset-repository.ts';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const RUN_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const ERROR_LINE = /^([A-Za-z_][\w.]*(?:Error|Exception|Interrupt|Exit))\b/;

export const HARNESS_PATH = fileURLToPath(new URL('../../runtime/harness.py', import.meta.url));

export interface RuntimeJob {
  workDir: string;
  code: string;
  dataset: TabularDataset;
  chartFilename: string;
}

/** Writes its files into the job's work directory and returns the child's argv. */
export interface ExecutionRuntime {
  readonly name: string;
  readonly command: string;
  prepare(job: RuntimeJob): Promise<string[]>;
}

export class PythonRuntime implements ExecutionRuntime {
  readonly name = 'python';

  constructor(
    readonly command: string = 'python3',
    private readonly harnessPath: string = HARNESS_PATH,
  ) {}

  async prepare({ workDir, code, dataset, chartFilename }: RuntimeJob): Promise<string[]> {
    await writeFile(
      join(workDir, 'dataset.json'),
      JSON.stringify({ columns: dataset.columns, rows: dataset.rows }),
      'utf-8',
    );
    await writeFile(join(workDir, 'analysis.py'), code, 'utf-8');
    await copyFile(this.harnessPath, join(workDir, 'harness.py'));
    return ['harness.py', 'analysis.py', 'dataset.json', chartFilename];
  }
}

export interface CodeExecutorOptions {
  workDir: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  chartFilename?: string;
}

export interface ExecuteRequest {
  runId: string;
  code: string;
  dataset: TabularDataset;
}

interface ResultBase {
  stdout: string;
  stderr: string;
  /** stdout on success; stdout and the error trace on failure. */
  output: string;
  chartExists: boolean;
  chartPath: string;
  durationMs: number;
}

export interface ExecutionSuccess extends ResultBase {
  success: true;
  exitCode: 0;
}

export interface ExecutionFailure extends ResultBase {
  success: false;
  reason: 'error' | 'timeout' | 'spawn';
  errorType: string | null;
  exitCode: number | null;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/** Collects a stream up to a byte limit and remembers whether anything was dropped. */
class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = this.truncated || chunk.length > 0;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.truncated = this.truncated || kept.length < chunk.length;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    const body = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? `${body}\n[output truncated at ${this.limit} bytes]` : body;
  }
}

/** Exception class name from the last error line of a trace, e.g. `KeyError`. */
export function parseErrorType(stderr: string): string | null {
  const lines = stderr.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = ERROR_LINE.exec(lines[i].trim());
    if (match) {
      const qualified = match[1];
      return qualified.slice(qualified.lastIndexOf('.') + 1);
    }
  }
  return null;
}

interface ProcessOutcome {
  exitCode: number | null;
  timedOut: boolean;
  spawnError?: Error;
  stdout: string;
  stderr: string;
}

export class CodeExecutor {
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  readonly chartFilename: string;

  constructor(
    private readonly runtime: ExecutionRuntime,
    private readonly options: CodeExecutorOptions,
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.chartFilename = options.chartFilename ?? CHART_FILENAME;
  }

  runDirectory(runId: string): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new InvalidInputError(`Invalid run id: ${runId}`);
    }
    return join(this.options.workDir, runId);
  }

  chartPathFor(runId: string): string {
    return join(this.runDirectory(runId), this.chartFilename);
  }

  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    const workDir = this.runDirectory(request.runId);
    const chartPath = join(workDir, this.chartFilename);

    await mkdir(workDir, { recursive: true });
    await rm(chartPath, { force: true });
    const args = await this.runtime.prepare({
      workDir,
      code: request.code,
      dataset: request.dataset,
      chartFilename: this.chartFilename,
    });

    logger.debug({ runId: request.runId, runtime: this.runtime.name }, 'Starting execution');
    const startedAt = Date.now();
    const outcome = await this.run(args, workDir);
    const durationMs = Date.now() - startedAt;
    const chartExists = await fileExists(chartPath);

    const base = { stdout: outcome.stdout, stderr: outcome.stderr, chartExists, chartPath, durationMs };

    if (!outcome.spawnError && !outcome.timedOut && outcome.exitCode === 0) {
      logger.info({ runId: request.runId, durationMs, chartExists }, 'Execution succeeded');
      return { ...base, success: true, exitCode: 0, output: outcome.stdout.trim() };
    }

    const reason = outcome.spawnError ? 'spawn' : outcome.timedOut ? 'timeout' : 'error';
    const notes = [outcome.stdout.trim(), outcome.stderr.trim()];
    if (reason === 'timeout') {
      notes.push(`Execution timed out after ${this.timeoutMs}ms`);
    }
    if (outcome.spawnError) {
      notes.push(`Failed to start ${this.runtime.command}: ${outcome.spawnError.message}`);
    }
    const errorType = reason === 'timeout' ? 'TimeoutError' : parseErrorType(outcome.stderr);

    logger.warn(
      { runId: request.runId, reason, errorType, exitCode: outcome.exitCode, durationMs },
      'Execution failed',
    );
    return {
      ...base,
      success: false,
      reason,
      errorType,
      exitCode: outcome.exitCode,
      output: notes.filter(Boolean).join('\n'),
    };
  }

  private run(args: string[], cwd: string): Promise<ProcessOutcome> {
    const stdout = new CappedBuffer(this.maxOutputBytes);
    const stderr = new CappedBuffer(this.maxOutputBytes);

    return new Promise<ProcessOutcome>((resolve) => {
      let settled = false;
      let timedOut = false;

      const child = spawn(this.runtime.command, args, {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: {
          PATH: process.env.PATH || '/usr/local/bin:/usr/bin:/bin',
          HOME: cwd,
          LANG: 'C.UTF-8',
          MPLBACKEND: 'Agg',
          MPLCONFIGDIR: cwd,
          PYTHONIOENCODING: 'utf-8',
          PYTHONDONTWRITEBYTECODE: '1',
        },
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.timeoutMs);

      const finish = (exitCode: number | null, spawnError?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ exitCode, timedOut, spawnError, stdout: stdout.text(), stderr: stderr.text() });
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        logger.error({ command: this.runtime.command, error: errorMessage(error) }, 'Execution process error');
        finish(null, error);
      });
      child.on('close', (code) => finish(code));
    });
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
