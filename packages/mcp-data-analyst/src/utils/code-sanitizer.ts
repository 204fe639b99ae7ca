/**
 * Syntactic clean-up of model output before execution.
 *
 * Pure and idempotent: sanitizeGeneratedCode(sanitizeGeneratedCode(x)) equals
 * sanitizeGeneratedCode(x). Never throws; text that no rule matches is left as-is.
 * This is not a correctness checker.
 */

import { CHART_FILENAME } from '../config.ts';

export interface SanitizeOptions {
  chartFilename?: string;
}

const ZERO_WIDTH = /[\u200B\u200C\u200D\uFEFF]/g;
const FENCED_BLOCK = /```[ \t]*[\w+-]*[ \t]*\n([\s\S]*?)```/g;
const STRAY_FENCE = /```[ \t]*(?:python3?|py)?/gi;
const LANGUAGE_TAG_LINE = /^(?:python3?|py)$/i;

/**
 * `x[...].fillna(v, inplace=True)` and friends as a whole statement. The target
 * must be subscripted; bare frames are valid in-place targets and are left alone.
 */
const INPLACE_STATEMENT =
  /^([ \t]*)([A-Za-z_][\w.]*(?:\[[^\]\n]+\])+)\.(fillna|replace|dropna)\(((?:[^()\n]|\([^()\n]*\))*?)\s*,?\s*inplace\s*=\s*True\s*\)(?=[ \t]*(?:#.*)?$)/gm;

const SAVEFIG_LITERAL = /\.savefig\(\s*(['"])[^'"\n]*\1/g;
const DISPLAY_LINE = /^([ \t]*)((plt|fig\w*)\.show\([^)\n]*\))/gm;
const PLOTTING = /\b(?:plt|sns)\.|\.plot\(|\bfig\w*\.show\(/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(ZERO_WIDTH, '');
}

/** Keeps the first non-empty fenced block when there is one, then drops leftover fences and language tags. */
export function stripCodeFences(text: string): string {
  const block = [...text.matchAll(FENCED_BLOCK)].find((match) => match[1].trim() !== '');
  let code = (block ? block[1] : text).replace(STRAY_FENCE, '');

  const lines = code.split('\n');
  while (lines.length > 0 && (lines[0].trim() === '' || LANGUAGE_TAG_LINE.test(lines[0].trim()))) {
    lines.shift();
  }
  code = lines.join('\n');
  return code.trim();
}

export function rewriteInplaceCalls(code: string): string {
  return code.replace(
    INPLACE_STATEMENT,
    (_match, indent: string, target: string, method: string, args: string) =>
      `${indent}${target} = ${target}.${method}(${args.trim()})`,
  );
}

/** Makes sure the code persists exactly one chart to `chartFilename`. */
export function ensureChartSaved(code: string, chartFilename: string): string {
  const saveCall = (owner: string) => `${owner}.savefig('${chartFilename}', bbox_inches='tight')`;
  const retargeted = code.replace(SAVEFIG_LITERAL, `.savefig('${chartFilename}'`);

  const savesChart = new RegExp(`\\.savefig\\(\\s*['"]${escapeRegExp(chartFilename)}['"]`);
  if (savesChart.test(retargeted)) {
    return retargeted;
  }

  let inserted = false;
  const withSave = retargeted.replace(
    DISPLAY_LINE,
    (_match, indent: string, call: string, owner: string) => {
      inserted = true;
      return `${indent}${saveCall(owner)}\n${indent}${call}`;
    },
  );
  if (inserted) {
    return withSave;
  }

  if (PLOTTING.test(retargeted)) {
    return `${retargeted}\n${saveCall('plt')}`;
  }
  return retargeted;
}

export function sanitizeGeneratedCode(raw: string, options: SanitizeOptions = {}): string {
  const chartFilename = options.chartFilename ?? CHART_FILENAME;

  let code = normalizeNewlines(raw ?? '');
  code = stripCodeFences(code);
  code = rewriteInplaceCalls(code);
  code = ensureChartSaved(code, chartFilename);
  return code.trim();
}
