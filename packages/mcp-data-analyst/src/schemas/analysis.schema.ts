import { z } from 'zod';
import { CellValueSchema } from '../services/dataset-repository.ts';

const datasetName = z
  .string()
  .min(1)
  .max(200)
  .describe('Name of a registered dataset (as used when it was registered)');

const question = z
  .string()
  .trim()
  .min(1)
  .max(4000)
  .describe('Natural-language question about the data, e.g. "Which region has the highest total sales?"');

const model = z
  .string()
  .min(1)
  .optional()
  .describe('Optional model id override (see list_models). Omit to let the server choose.');

const limit = z.coerce.number().int().min(1).max(100).default(10);

// Register dataset input schema
export const RegisterDatasetSchema = z.object({
  name: datasetName,
  columns: z.array(z.string()).min(1).describe('Column names, in order'),
  rows: z.array(z.array(CellValueSchema)).describe('Rows; each row has one cell per column'),
});


// Analyze dataset input schema
export const AnalyzeDatasetSchema = z.object({
  dataset_name: datasetName,
  question,
  model,
});


// Generate code input schema; either columns or a dataset name is required
export const GenerateCodeFields = z.object({
  columns: z.array(z.string()).optional().describe('Column names of the dataframe `df`'),
  question,
  dataset_name: datasetName.optional(),
  model,
});

export const GenerateCodeSchema = GenerateCodeFields.refine(
  (input) => Boolean((input.columns && input.columns.length > 0) || input.dataset_name),
  { message: 'Provide columns or dataset_name', path: ['columns'] },
);


export const QueryIdSchema = z.object({
  query_id: z.string().min(1).describe('Query id returned by generate_code or analyze_dataset'),
});

export const DatasetIdSchema = z.object({
  dataset_id: z.string().min(1).describe('Dataset history id (see list_dataset_history)'),
});

export const LimitSchema = z.object({
  limit: limit.describe('Maximum number of entries (1-100, default 10)'),
});

export const CleanupSchema = z.object({
  older_than_days: z.coerce
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Remove non-favorite datasets unused for this many days (default from server configuration)'),
});
