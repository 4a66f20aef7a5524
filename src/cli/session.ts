/**
 * @fileoverview Interactive session - one shell line at a time.
 *
 * The session owns command dispatch and rendering but no terminal. Output
 * goes through an injected writer so the shell can be driven from tests.
 *
 * @module math-reasoning-agent/cli/session
 * @version 0.1.0
 */

import type { ReasoningAgent } from '../agent/reasoning-agent.js';
import { AgentRequestError } from '../errors/errors.js';
import { defaultExportFileName, exportHistory } from '../history/export.js';
import type { Logger } from '../observability/logger.js';
import {
  HELP_TEXT,
  renderError,
  renderHistory,
  renderResult,
  renderStats,
  type RenderOptions,
} from './format.js';

export type LineOutcome = 'continue' | 'quit';

export interface InteractiveSessionOptions {
  readonly agent: ReasoningAgent;
  readonly logger: Logger;
  readonly write: (text: string) => void;
  readonly color?: boolean;
  readonly now?: () => Date;
}

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q']);

export class InteractiveSession {
  private readonly agent: ReasoningAgent;
  private readonly logger: Logger;
  private readonly write: (text: string) => void;
  private readonly render: RenderOptions;
  private readonly now: () => Date;

  constructor(options: InteractiveSessionOptions) {
    this.agent = options.agent;
    this.logger = options.logger;
    this.write = options.write;
    this.render = { color: options.color ?? true };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Handles one input line.
   *
   * Request failures are shown to the user and the session continues.
   */
  async handleLine(line: string): Promise<LineOutcome> {
    const input = line.trim();
    if (input === '') {
      return 'continue';
    }

    const head = input.split(/\s+/, 1)[0] ?? '';
    const argument = input.slice(head.length).trim();
    const command = argument === '' ? input.toLowerCase() : head.toLowerCase();

    if (QUIT_COMMANDS.has(command) && argument === '') {
      this.write('Goodbye!');
      return 'quit';
    }

    if (command === 'export') {
      await this.exportHistory(argument);
      return 'continue';
    }

    switch (argument === '' ? command : '') {
      case 'help':
        this.write(HELP_TEXT);
        break;

      case 'stats':
        this.write(renderStats(this.agent.getSessionStats(), this.render));
        break;

      case 'history':
        this.write(renderHistory(this.agent.getHistory(), this.render));
        break;

      default:
        await this.calculate(input);
    }
    return 'continue';
  }

  // ============ Private Methods ============

  private async calculate(input: string): Promise<void> {
    try {
      const result = await this.agent.processRequest(input);
      this.write(renderResult(result, this.render));
    } catch (error) {
      if (!(error instanceof AgentRequestError)) {
        throw error;
      }
      this.write(renderError(error.message, this.render));
    }
  }

  private async exportHistory(target: string): Promise<void> {
    const filePath = target === '' ? defaultExportFileName(this.now()) : target;
    try {
      const count = await exportHistory(this.agent.getHistory(), filePath);
      this.logger.info('History exported', { filePath, count });
      this.write(`Exported ${count} calculations to ${filePath}`);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error('History export failed', { filePath }, error instanceof Error ? error : undefined);
      this.write(renderError(`Could not export history: ${detail}`, this.render));
    }
  }
}
