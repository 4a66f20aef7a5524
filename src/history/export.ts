/**
 * @fileoverview History export - completed calculations as a JSON file.
 *
 * @module math-reasoning-agent/history/export
 * @version 0.1.0
 */

import { writeFile } from 'fs/promises';
import type { CalculationResult } from '../types/calculation.types.js';

/**
 * One exported calculation. Timestamps are ISO-8601 strings.
 */
export interface ExportedCalculation {
  readonly id: string;
  readonly expression: string;
  readonly result: number;
  readonly reasoning: string;
  readonly confidence: number;
  readonly verified: boolean;
  readonly localResult: number | null;
  readonly createdAt: string;
  readonly tokensUsed: number;
}

/**
 * Converts history to its exported form, oldest first.
 */
export function serializeHistory(history: ReadonlyArray<CalculationResult>): ExportedCalculation[] {
  return history.map(entry => ({
    id: entry.id,
    expression: entry.expression,
    result: entry.result,
    reasoning: entry.reasoning,
    confidence: entry.confidence,
    verified: entry.verified,
    localResult: entry.localResult,
    createdAt: new Date(entry.createdAt).toISOString(),
    tokensUsed: entry.tokensUsed,
  }));
}

/**
 * Writes history as a pretty-printed JSON array, replacing any existing file.
 *
 * @returns The number of calculations written
 */
export async function exportHistory(
  history: ReadonlyArray<CalculationResult>,
  filePath: string,
): Promise<number> {
  const exported = serializeHistory(history);
  await writeFile(filePath, `${JSON.stringify(exported, null, 2)}\n`, 'utf8');
  return exported.length;
}

/**
 * Default export file name, e.g. `history_20260118_093005.json`.
 */
export function defaultExportFileName(now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `history_${date}_${time}.json`;
}
