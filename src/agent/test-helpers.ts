/**
 * @fileoverview In-process collaborator for agent and shell tests.
 */

import type { ChatMessage } from '../memory/conversation-memory.js';
import type { ReasoningCollaborator } from '../providers/base.js';

/**
 * Replays canned replies in order. Each entry is either reply text or an
 * error to reject with. The last entry repeats once the script runs out.
 */
export class ScriptedCollaborator implements ReasoningCollaborator {
  readonly name = 'scripted';

  /** Every conversation this collaborator received, oldest first */
  readonly calls: Array<ReadonlyArray<ChatMessage>> = [];

  private readonly script: ReadonlyArray<string | Error>;
  private cursor = 0;

  constructor(script: ReadonlyArray<string | Error>) {
    this.script = script;
  }

  complete(messages: ReadonlyArray<ChatMessage>, signal?: AbortSignal): Promise<string> {
    this.calls.push([...messages]);
    if (signal?.aborted === true) {
      return Promise.reject(new Error('Scripted call aborted'));
    }

    const step = this.script[Math.min(this.cursor, this.script.length - 1)];
    this.cursor++;

    if (step === undefined) {
      return Promise.reject(new Error('Scripted collaborator has no replies'));
    }
    return step instanceof Error ? Promise.reject(step) : Promise.resolve(step);
  }
}
