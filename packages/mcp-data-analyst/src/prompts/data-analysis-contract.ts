/**
 * MCP Prompt: Data Analysis Contract
 *
 * What generated analysis code is expected to do and how its results come back,
 * so an agent can phrase questions and read failures.
 */

import { CHART_FILENAME } from '../config.ts';
import { DEFAULT_ROTATE_THRESHOLD, DEFAULT_TRUNCATE_THRESHOLD } from './analysis-prompt.ts';

export const DATA_ANALYSIS_CONTRACT_PROMPT = {
  name: 'data_analysis_contract',
  description: 'Contract for generated analysis code (df, printed answer, one saved chart) and how to work with analyze_dataset results',
  content: `# Data Analysis Contract

## What the generated code does

- Works on a pandas DataFrame \`df\` that already holds the registered dataset. It never invents sample data or reads files.
- Prints a human-readable answer first, then draws exactly one chart and saves it as \`${CHART_FILENAME}\`.
- More than ${DEFAULT_ROTATE_THRESHOLD} categories: axis labels are rotated.
- More than ${DEFAULT_TRUNCATE_THRESHOLD} categories: a horizontal chart of the top ${DEFAULT_TRUNCATE_THRESHOLD} with a printed note about the truncation.

## Workflow

1. \`list_dataset_history\`: pick a dataset name.
2. \`analyze_dataset\`: dataset name plus one concrete question. Returns the printed answer, the chart image and the code.
3. On failure the full traceback is returned. Reword the question (name the exact columns, say how to treat missing values) and call \`analyze_dataset\` again.
4. \`generate_code\` + \`execute_query\` split the two steps when the code should be reviewed before it runs. A query runs once.

## Good questions

- Name columns exactly as listed.
- Ask for one answer per question ("total revenue per region", not "tell me everything").`,
};
