/**
 * Instruction prompt for analysis code generation.
 *
 * The model is told that a pandas DataFrame `df` already exists, which columns it
 * has, and the hard contract the generated code must follow: print an answer,
 * then save exactly one chart to the chart file. Column names are embedded raw,
 * one per line, and the question once in a delimited block; no template engine
 * is involved, so quotes and braces in either reach the model unchanged.
 */

import { CHART_FILENAME } from '../config.ts';

export interface AnalysisPromptInput {
  columns: readonly string[];
  question: string;
}

export interface AnalysisPromptOptions {
  chartFilename?: string;
  /** Above this many categories: horizontal chart, top N only, print a note. */
  truncateThreshold?: number;
  /** Above this many categories: rotate category axis labels. */
  rotateThreshold?: number;
  rowCount?: number;
}

export const DEFAULT_TRUNCATE_THRESHOLD = 20;
export const DEFAULT_ROTATE_THRESHOLD = 10;

const QUESTION_START = '<<<QUESTION';
const QUESTION_END = 'QUESTION>>>';

export function buildAnalysisPrompt(
  input: AnalysisPromptInput,
  options: AnalysisPromptOptions = {},
): string {
  const chartFilename = options.chartFilename ?? CHART_FILENAME;
  const truncateAt = options.truncateThreshold ?? DEFAULT_TRUNCATE_THRESHOLD;
  const rotateAt = options.rotateThreshold ?? DEFAULT_ROTATE_THRESHOLD;
  const columnList =
    input.columns.length > 0 ? input.columns.map((column) => `- ${column}`).join('\n') : '(none)';
  const sizeLine =
    options.rowCount !== undefined ? `\nThe DataFrame has ${options.rowCount} rows.` : '';

  return `You are a Python data analyst. You must write COMPLETE Python code that produces BOTH a printed text answer AND one chart.

A pandas DataFrame named \`df\` is ALREADY loaded with the user's data. Its columns, in order, one per line, are:
${columnList}${sizeLine}

Write Python code that answers the question between the markers below:
${QUESTION_START}
${input.question}
${QUESTION_END}

REQUIREMENTS:
1. Use the existing \`df\` only. Do NOT create sample data, do NOT call pd.DataFrame() to build replacement data, and do NOT read any file.
2. Start with the import statements you need (pandas, matplotlib.pyplot as plt, seaborn as sns).
3. ALWAYS print a clear, human-readable answer with print() BEFORE any plotting code.
4. Do not print whole DataFrames, lists or tables unless the question asks for them.
5. ALWAYS create exactly one chart that illustrates the answer.
6. Save the chart with plt.savefig('${chartFilename}', dpi=150, bbox_inches='tight'). Save to no other file name. Call plt.show() after saving.
7. Use plt.figure(figsize=(16, 10)) when there are many categories, otherwise (12, 8).
8. Add a title, axis labels and plt.grid(True, alpha=0.3), and call plt.tight_layout() before saving.
9. If the chart would show more than ${rotateAt} categories, rotate the category axis labels by 90 degrees.
10. If it would show more than ${truncateAt} categories, use a horizontal bar chart, plot only the top ${truncateAt} by value, and print a note such as "Showing top ${truncateAt} of N entries".
11. Do not use inplace=True; assign results back instead (df['col'] = df['col'].fillna(0)).
12. Return ONLY the code, without explanations.`;
}
