/**
 * @fileoverview Unit tests for InteractiveSession and shell rendering
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InteractiveSession } from './session.js';
import { HELP_TEXT, confidenceStyle, renderHistory, renderResult } from './format.js';
import { ReasoningAgent } from '../agent/reasoning-agent.js';
import { ScriptedCollaborator } from '../agent/test-helpers.js';
import { Logger, MemoryTransport } from '../observability/index.js';
import { createTimestamp, createUniqueId, type CalculationResult } from '../types/index.js';

function calculation(overrides: Partial<CalculationResult> = {}): CalculationResult {
  return {
    id: createUniqueId('calc'),
    expression: '2 + 3',
    result: 5,
    reasoning: 'two plus three',
    confidence: 1,
    verified: true,
    localResult: 5,
    createdAt: createTimestamp(0),
    tokensUsed: 4,
    ...overrides,
  };
}

describe('format', () => {
  it('should pick the confidence color by threshold', () => {
    expect(confidenceStyle(1)).toBe('green');
    expect(confidenceStyle(0.8)).toBe('green');
    expect(confidenceStyle(0.7)).toBe('yellow');
    expect(confidenceStyle(0.5)).toBe('yellow');
    expect(confidenceStyle(0.4)).toBe('red');
  });

  it('should render a verified result', () => {
    expect(renderResult(calculation(), { color: false })).toBe(
      [
        '📝 Expression: 2 + 3',
        '🎯 Result: 5',
        '💭 Reasoning: two plus three',
        '📊 Confidence: 100.0%',
        '✅ Verified against local calculation',
      ].join('\n'),
    );
  });

  it('should color the confidence when enabled', () => {
    const text = renderResult(calculation({ confidence: 0.1, verified: false, localResult: 6 }), { color: true });

    expect(text).toContain('📊 Confidence: \x1b[31m10.0%\x1b[0m');
    expect(text.split('\n').at(-1)).toBe('\x1b[33m⚠️  Local result differs: 6\x1b[0m');
  });

  it('should number only the last five calculations from the session start', () => {
    const history = [1, 2, 3, 4, 5, 6, 7].map(n => calculation({ expression: `${n} + 0`, result: n }));

    const lines = renderHistory(history, { color: false }).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[1]).toBe('  3. 3 + 0 = 3 (100.0% ✅)');
    expect(lines[5]).toBe('  7. 7 + 0 = 7 (100.0% ✅)');
  });
});

describe('InteractiveSession', () => {
  let output: string[];
  let collaborator: ScriptedCollaborator;
  let session: InteractiveSession;

  beforeEach(() => {
    output = [];
    collaborator = new ScriptedCollaborator(['The result is 5']);
    const logger = new Logger({ transports: [new MemoryTransport()] });
    const agent = new ReasoningAgent({ collaborator, logger });
    session = new InteractiveSession({
      agent,
      logger,
      write: text => output.push(text),
      color: false,
      now: () => new Date(2026, 0, 18, 9, 30, 5),
    });
  });

  it('should ignore blank lines', async () => {
    await expect(session.handleLine('   ')).resolves.toBe('continue');
    expect(output).toEqual([]);
  });

  it('should quit on quit, exit and q', async () => {
    for (const command of ['quit', 'EXIT', ' q ']) {
      await expect(session.handleLine(command)).resolves.toBe('quit');
    }
    expect(output).toEqual(['Goodbye!', 'Goodbye!', 'Goodbye!']);
  });

  it('should show help', async () => {
    await session.handleLine('help');
    expect(output).toEqual([HELP_TEXT]);
  });

  it('should render a calculation', async () => {
    await expect(session.handleLine('Add 2 and 3')).resolves.toBe('continue');

    expect(output[0]?.split('\n')[0]).toBe('📝 Expression: 2 + 3');
    expect(collaborator.calls).toHaveLength(1);
  });

  it('should display request failures and keep running', async () => {
    await expect(session.handleLine('hello')).resolves.toBe('continue');

    expect(output).toEqual(['Error: Please provide at least two numbers for calculation']);
  });

  it('should show session stats', async () => {
    await session.handleLine('add 2 and 3');
    output.length = 0;

    await session.handleLine('stats');

    expect(output[0]?.split('\n')).toEqual([
      '📊 Session Statistics',
      '  Total calculations: 1',
      '  Tokens used:        3',
      '  Average confidence: 100.0%',
      '  Verification rate:  100.0%',
      '  Current state:      completed',
    ]);
  });

  it('should show an empty history', async () => {
    await session.handleLine('history');
    expect(output).toEqual(['No calculations yet.']);
  });

  describe('export', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'session-export-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write to the named file', async () => {
      await session.handleLine('add 2 and 3');
      const file = join(dir, 'out.json');

      await session.handleLine(`export ${file}`);

      expect(output.at(-1)).toBe(`Exported 1 calculations to ${file}`);
      const exported: unknown = JSON.parse(await readFile(file, 'utf8'));
      expect(exported).toMatchObject([{ expression: '2 + 3', result: 5 }]);
    });

    it('should report a failed export', async () => {
      await session.handleLine(`export ${join(dir, 'missing', 'out.json')}`);

      expect(output.at(-1)?.startsWith('Error: Could not export history: ')).toBe(true);
    });
  });
});
