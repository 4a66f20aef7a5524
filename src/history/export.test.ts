/**
 * @fileoverview Unit tests for history export
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultExportFileName, exportHistory, serializeHistory } from './export.js';
import { createTimestamp, createUniqueId, type CalculationResult } from '../types/index.js';

const CREATED_AT = Date.UTC(2026, 0, 18, 9, 30, 5);

const sample: CalculationResult = {
  id: createUniqueId('calc-1'),
  expression: '7 * 6',
  result: 41,
  reasoning: 'multiply 7 by 6.',
  confidence: 0.1,
  verified: false,
  localResult: 42,
  createdAt: createTimestamp(CREATED_AT),
  tokensUsed: 10,
};

describe('serializeHistory()', () => {
  it('should render timestamps as ISO strings', () => {
    expect(serializeHistory([sample])).toEqual([
      {
        id: 'calc-1',
        expression: '7 * 6',
        result: 41,
        reasoning: 'multiply 7 by 6.',
        confidence: 0.1,
        verified: false,
        localResult: 42,
        createdAt: '2026-01-18T09:30:05.000Z',
        tokensUsed: 10,
      },
    ]);
  });

  it('should keep a missing local result as null', () => {
    const [entry] = serializeHistory([{ ...sample, localResult: null }]);
    expect(entry?.localResult).toBeNull();
  });
});

describe('exportHistory()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'history-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write a pretty-printed JSON array', async () => {
    const file = join(dir, 'history.json');

    const count = await exportHistory([sample, sample], file);

    const text = await readFile(file, 'utf8');
    expect(count).toBe(2);
    expect(text.startsWith('[\n  {\n    "id": "calc-1"')).toBe(true);
    expect(JSON.parse(text)).toEqual(serializeHistory([sample, sample]));
  });

  it('should write an empty array for empty history', async () => {
    const file = join(dir, 'empty.json');

    await exportHistory([], file);

    expect(await readFile(file, 'utf8')).toBe('[]\n');
  });
});

describe('defaultExportFileName()', () => {
  it('should embed the local date and time', () => {
    expect(defaultExportFileName(new Date(2026, 0, 18, 9, 30, 5))).toBe('history_20260118_093005.json');
  });
});
