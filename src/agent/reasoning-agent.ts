/**
 * @fileoverview Reasoning Agent - orchestrates one calculation per request.
 *
 * Each call to `processRequest` is a single pass through the pipeline:
 * parse the text, ask the collaborator, interpret its reply, recompute
 * locally, score the agreement and record the result. All anticipated
 * failures are classified and rethrown as {@link AgentRequestError}.
 *
 * The agent is single-flight: memory and history are mutated without
 * isolation, so overlapping calls on one instance may interleave. Callers
 * that need concurrency should serialize per instance or use one instance
 * per session.
 *
 * @module math-reasoning-agent/agent/reasoning-agent
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { AgentConfig, UniqueId } from '../types/core.types.js';
import {
  AgentState,
  DEFAULT_AGENT_CONFIG,
  createTimestamp,
  createUniqueId,
} from '../types/core.types.js';
import type { CalculationResult, SessionStats } from '../types/calculation.types.js';
import { LifecycleController } from './lifecycle.js';
import { buildReasoningMessages } from './prompts.js';
import { formatAssistantMessage } from './formatting.js';
import { ConversationMemory, type ChatMessage } from '../memory/conversation-memory.js';
import { parseExpression } from '../engine/expression-parser.js';
import { evaluateExpression } from '../engine/local-evaluator.js';
import { ResponseInterpreter } from '../engine/response-interpreter.js';
import { scoreConfidence } from '../engine/confidence.js';
import {
  AgentRequestError,
  CollaboratorTimeoutError,
  InputValidationError,
  InterpretationError,
} from '../errors/errors.js';
import { classifyError } from '../errors/classifier.js';
import type { ReasoningCollaborator } from '../providers/base.js';
import { createLogger, type Logger } from '../observability/logger.js';

/**
 * Events emitted by the agent.
 */
export interface ReasoningAgentEvents {
  'request:start': (requestId: UniqueId, input: string) => void;
  'request:complete': (requestId: UniqueId, result: CalculationResult) => void;
  'request:failed': (requestId: UniqueId, error: AgentRequestError) => void;
  'state:change': (from: AgentState, to: AgentState, reason: string) => void;
}

export interface ReasoningAgentOptions {
  readonly collaborator: ReasoningCollaborator;
  readonly config?: Partial<AgentConfig>;
  readonly logger?: Logger;
  readonly interpreter?: ResponseInterpreter;
}

/**
 * Average characters per token used for the usage estimate.
 */
const CHARS_PER_TOKEN = 4;

/**
 * The orchestrator and sole entry point of the pipeline.
 *
 * @example
 * ```typescript
 * const agent = new ReasoningAgent({
 *   collaborator: new OpenAICollaborator({ apiKey: config.apiKey }),
 *   logger: createLogger('agent'),
 * });
 *
 * const result = await agent.processRequest('Add 10.5 and 15.2');
 * console.log(result.result, result.confidence, result.verified);
 * ```
 */
export class ReasoningAgent extends EventEmitter<ReasoningAgentEvents> {
  readonly sessionId: UniqueId;

  private readonly config: AgentConfig;
  private readonly collaborator: ReasoningCollaborator;
  private readonly interpreter: ResponseInterpreter;
  private readonly logger: Logger;
  private readonly memory: ConversationMemory;
  private readonly lifecycle: LifecycleController;
  private readonly history: CalculationResult[] = [];

  constructor(options: ReasoningAgentOptions) {
    super();
    this.sessionId = createUniqueId(uuidv4());
    this.config = { ...DEFAULT_AGENT_CONFIG, ...options.config };
    this.collaborator = options.collaborator;
    this.interpreter = options.interpreter ?? new ResponseInterpreter();
    this.logger = (options.logger ?? createLogger('agent')).child({
      module: 'agent',
      sessionId: this.sessionId,
    });
    this.memory = new ConversationMemory({ maxHistory: this.config.maxHistory });
    this.lifecycle = new LifecycleController();

    this.lifecycle.on('transition', (from, to, reason) => {
      this.emit('state:change', from, to, reason);
    });

    this.logger.info('Agent initialized', {
      collaborator: this.collaborator.name,
      maxHistory: this.config.maxHistory,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
  }

  /**
   * Runs one request through the pipeline.
   *
   * @throws {@link AgentRequestError} when fewer than two numbers are present,
   *   the collaborator fails or times out, or its reply holds no number
   */
  async processRequest(userText: string): Promise<CalculationResult> {
    const requestId = this.lifecycle.begin('Request received');
    const log = this.logger.child({ correlationId: requestId });

    this.emit('request:start', requestId, userText);
    log.info('Processing request', { input: userText });

    let result: CalculationResult;
    try {
      this.memory.addMessage('user', userText);

      const parsed = parseExpression(userText);
      if (parsed.numbers.length < 2) {
        throw new InputValidationError();
      }

      this.lifecycle.transition(AgentState.REASONING, 'Expression parsed', { expression: parsed.text });
      const operands = parsed.expression
        ? [parsed.expression.operandA, parsed.expression.operandB]
        : parsed.numbers;
      const messages = buildReasoningMessages(
        parsed.text,
        operands,
        this.memory.toChatContext(this.config.contextWindow),
      );
      const reply = await log.time('Collaborator call', () => this.callCollaborator(messages));

      this.lifecycle.transition(AgentState.VERIFYING, 'Collaborator replied');
      const match = this.interpreter.matchResult(reply);
      if (match === null) {
        throw new InterpretationError();
      }
      const localResult = parsed.expression ? evaluateExpression(parsed.expression) : null;
      const score = scoreConfidence(match.value, localResult, this.config.tolerance);

      result = Object.freeze({
        id: requestId,
        expression: parsed.text,
        result: match.value,
        reasoning: this.interpreter.extractReasoning(reply),
        confidence: score.confidence,
        verified: score.verified,
        localResult,
        createdAt: createTimestamp(),
        tokensUsed: Math.floor(reply.length / CHARS_PER_TOKEN),
      });

      this.lifecycle.transition(AgentState.COMPLETED, 'Result recorded');
      this.history.push(result);
      this.memory.addMessage('assistant', formatAssistantMessage(result), { calculationId: result.id });
      this.memory.setContextVariable('lastExpression', result.expression);
      this.memory.setContextVariable('lastResult', result.result);

      log.info('Calculation completed', {
        expression: result.expression,
        result: result.result,
        localResult,
        confidence: result.confidence,
        verified: result.verified,
        matcher: match.matcher,
      });
    } catch (error) {
      const classified = classifyError(error);
      this.lifecycle.fail(classified.message, { category: classified.category });
      log.error(
        'Request failed',
        { category: classified.category, userMessage: classified.message },
        error instanceof Error ? error : undefined,
      );

      const failure = new AgentRequestError(classified.category, classified.message, error);
      this.emit('request:failed', requestId, failure);
      throw failure;
    }

    this.emit('request:complete', requestId, result);
    return result;
  }

  getState(): AgentState {
    return this.lifecycle.getCurrentState();
  }

  /**
   * States visited by the most recent request.
   */
  getStatePath(): AgentState[] {
    return this.lifecycle.getStatePath();
  }

  /**
   * Completed calculations, oldest first.
   */
  getHistory(): ReadonlyArray<CalculationResult> {
    return [...this.history];
  }

  getMemory(): ConversationMemory {
    return this.memory;
  }

  getSessionStats(): SessionStats {
    const total = this.history.length;
    const sum = (pick: (r: CalculationResult) => number): number =>
      this.history.reduce((acc, r) => acc + pick(r), 0);

    return {
      totalCalculations: total,
      totalTokensUsed: sum(r => r.tokensUsed),
      averageConfidence: total === 0 ? 0 : sum(r => r.confidence) / total,
      verificationRate: total === 0 ? 0 : sum(r => (r.verified ? 1 : 0)) / total,
      currentState: this.getState(),
    };
  }

  // ============ Private Methods ============

  /**
   * Calls the collaborator, aborting it once the request timeout elapses.
   * A collaborator that ignores the signal is still abandoned at the deadline.
   */
  private async callCollaborator(messages: ReadonlyArray<ChatMessage>): Promise<string> {
    const timeoutMs = this.config.requestTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CollaboratorTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.collaborator.complete(messages, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
