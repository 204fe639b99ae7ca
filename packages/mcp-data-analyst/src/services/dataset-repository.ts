/**
 * Registered datasets, stored as `<dataDir>/<name>.json`.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidInputError, NotFoundError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

const MAX_NAME_LENGTH = 200;

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type CellValue = z.infer<typeof CellValueSchema>;

export const TabularDatasetSchema = z
  .object({
    name: z.string().min(1),
    columns: z.array(z.string()).min(1, 'A dataset needs at least one column'),
    rows: z.array(z.array(CellValueSchema)),
  })
  .superRefine((dataset, ctx) => {
    dataset.rows.forEach((row, index) => {
      if (row.length !== dataset.columns.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index],
          message: `Row ${index} has ${row.length} cells, expected ${dataset.columns.length}`,
        });
      }
    });
  });

export type TabularDataset = z.infer<typeof TabularDatasetSchema>;

/**
 * Validates a dataset name for use as a file name.
 *
 * @returns Error message if invalid, null if valid
 */
export function validateDatasetName(name: string): string | null {
  if (!name || name.trim().length === 0) {
    return 'Dataset name cannot be empty';
  }
  if (name === '.' || name === '..') {
    return 'Dataset name cannot be . or ..';
  }
  if (name.includes('/') || name.includes('\\')) {
    return 'Dataset name cannot contain path separators';
  }
  if (name.includes('\0')) {
    return 'Dataset name cannot contain NUL bytes';
  }
  if (name.length > MAX_NAME_LENGTH) {
    return `Dataset name too long (max ${MAX_NAME_LENGTH} characters)`;
  }
  return null;
}

function assertValidName(name: string): void {
  const problem = validateDatasetName(name);
  if (problem) {
    throw new InvalidInputError(problem);
  }
}

export class DatasetRepository {
  constructor(private readonly dataDir: string) {}

  pathFor(name: string): string {
    assertValidName(name);
    return join(this.dataDir, `${name}.json`);
  }

  async save(input: unknown): Promise<TabularDataset> {
    const parsed = TabularDatasetSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const dataset = parsed.data;
    const path = this.pathFor(dataset.name);

    await mkdir(this.dataDir, { recursive: true });
    await writeFile(path, JSON.stringify(dataset), 'utf-8');
    logger.info(
      { name: dataset.name, columns: dataset.columns.length, rows: dataset.rows.length },
      'Dataset stored',
    );
    return dataset;
  }

  async load(name: string): Promise<TabularDataset> {
    const path = this.pathFor(name);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Dataset not found: ${name}`);
      }
      throw error;
    }
    return TabularDatasetSchema.parse(JSON.parse(text));
  }

  async exists(name: string): Promise<boolean> {
    try {
      await stat(this.pathFor(name));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /** @returns false when there was nothing to remove */
  async remove(name: string): Promise<boolean> {
    const existed = await this.exists(name);
    if (existed) {
      await rm(this.pathFor(name), { force: true });
      logger.info({ name }, 'Dataset removed');
    }
    return existed;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
