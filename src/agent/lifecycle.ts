/**
 * @fileoverview Agent Lifecycle Controller - owns the request state machine.
 *
 * State Machine (one pass per request):
 * ```
 *   IDLE ──► PROCESSING ──► REASONING ──► VERIFYING ──► COMPLETED
 *                │               │              │
 *                └───────────────┴──────────────┴──────► ERROR
 * ```
 *
 * COMPLETED and ERROR are terminal for the current request. `begin()`
 * returns the machine to IDLE at the start of the next one, so the enum
 * never carries a previous request's terminal state into a new pass.
 *
 * @module math-reasoning-agent/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { AgentState, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'state:enter': (state: AgentState, metadata: StateMetadata) => void;
  'state:exit': (state: AgentState, metadata: StateMetadata) => void;
  'transition': (from: AgentState, to: AgentState, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

/**
 * Metadata associated with entering or leaving a state.
 */
export interface StateMetadata {
  readonly requestId: UniqueId;
  readonly enteredAt: Timestamp;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Error during lifecycle operations.
 */
export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly state: AgentState;
  readonly attemptedTransition: AgentState;
}

/**
 * Snapshot of the lifecycle.
 */
export interface LifecycleSnapshot {
  readonly requestId: UniqueId;
  readonly requestCount: number;
  readonly currentState: AgentState;
  readonly previousState: AgentState | null;
  readonly stateHistory: ReadonlyArray<StateHistoryEntry>;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

/**
 * A state visited during the current request.
 */
export interface StateHistoryEntry {
  readonly state: AgentState;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

/**
 * Valid transitions from each state.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentState, ReadonlyArray<AgentState>> = new Map([
  [AgentState.IDLE, [AgentState.PROCESSING]],
  [AgentState.PROCESSING, [AgentState.REASONING, AgentState.ERROR]],
  [AgentState.REASONING, [AgentState.VERIFYING, AgentState.ERROR]],
  [AgentState.VERIFYING, [AgentState.COMPLETED, AgentState.ERROR]],
  [AgentState.COMPLETED, []],
  [AgentState.ERROR, []],
]);

const TERMINAL_STATES: ReadonlySet<AgentState> = new Set([
  AgentState.COMPLETED,
  AgentState.ERROR,
]);

/**
 * Enforces valid state transitions and records the path of each request.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController();
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`${from} → ${to}`, { reason });
 * });
 *
 * lifecycle.begin('Request received');
 * lifecycle.transition(AgentState.REASONING, 'Expression parsed');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private requestId: UniqueId;
  private requestCount: number;
  private currentState: AgentState;
  private previousState: AgentState | null;
  private stateHistory: StateHistoryEntry[];
  private lastTransitionAt: Timestamp;
  private currentEntry: StateHistoryEntry | null;

  constructor() {
    super();
    this.requestId = createUniqueId(uuidv4());
    this.requestCount = 0;
    this.currentState = AgentState.IDLE;
    this.previousState = null;
    this.stateHistory = [];
    this.lastTransitionAt = createTimestamp();
    this.currentEntry = null;

    this.enterState(AgentState.IDLE, 'Agent initialized');
  }

  getSnapshot(): LifecycleSnapshot {
    return {
      requestId: this.requestId,
      requestCount: this.requestCount,
      currentState: this.currentState,
      previousState: this.previousState,
      stateHistory: this.currentEntry ? [...this.stateHistory, this.currentEntry] : [...this.stateHistory],
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentState(): AgentState {
    return this.currentState;
  }

  getRequestId(): UniqueId {
    return this.requestId;
  }

  /**
   * States visited by the current request, in order, including the current one.
   */
  getStatePath(): AgentState[] {
    return this.getSnapshot().stateHistory.map(entry => entry.state);
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  canTransition(target: AgentState): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentState);
    return validTargets !== undefined && validTargets.includes(target);
  }

  /**
   * Starts a new request: resets to IDLE, mints a request ID and moves
   * to PROCESSING.
   *
   * @returns The new request ID
   */
  begin(reason: string): UniqueId {
    this.exitState();
    this.requestId = createUniqueId(uuidv4());
    this.requestCount++;
    this.stateHistory = [];
    this.previousState = this.currentState;
    this.currentState = AgentState.IDLE;
    this.enterState(AgentState.IDLE, 'Ready for request');

    this.transition(AgentState.PROCESSING, reason);
    return this.requestId;
  }

  /**
   * Moves to the target state.
   *
   * @throws Error if the current state is terminal or the transition is invalid
   */
  transition(
    target: AgentState,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    if (this.isTerminal() || !this.canTransition(target)) {
      const error: LifecycleError = this.isTerminal()
        ? {
            code: 'TERMINAL_STATE',
            message: `Cannot transition from terminal state '${this.currentState}'`,
            state: this.currentState,
            attemptedTransition: target,
          }
        : {
            code: 'INVALID_TRANSITION',
            message: `Invalid transition: '${this.currentState}' → '${target}'`,
            state: this.currentState,
            attemptedTransition: target,
          };
      this.emit('error', error);
      throw new Error(error.message);
    }

    this.exitState();
    this.previousState = this.currentState;
    this.currentState = target;
    this.lastTransitionAt = createTimestamp();

    this.emit('transition', this.previousState, this.currentState, reason);
    this.enterState(target, reason, data);
  }

  /**
   * Forces ERROR from any non-terminal state, bypassing the transition
   * table. No-op when already terminal.
   */
  fail(reason: string, data: Record<string, unknown> = {}): void {
    if (this.isTerminal()) {
      return;
    }

    this.exitState();
    this.previousState = this.currentState;
    this.currentState = AgentState.ERROR;
    this.lastTransitionAt = createTimestamp();

    this.emit('transition', this.previousState, AgentState.ERROR, reason);
    this.enterState(AgentState.ERROR, reason, { ...data, forced: true });
  }

  // ============ Private Methods ============

  private enterState(
    state: AgentState,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    const now = createTimestamp();
    this.currentEntry = { state, enteredAt: now, exitedAt: null, reason };
    this.emit('state:enter', state, {
      requestId: this.requestId,
      enteredAt: now,
      reason,
      data,
    });
  }

  private exitState(): void {
    if (!this.currentEntry) {
      return;
    }
    const entry = this.currentEntry;
    this.stateHistory.push({ ...entry, exitedAt: createTimestamp() });
    this.currentEntry = null;
    this.emit('state:exit', entry.state, {
      requestId: this.requestId,
      enteredAt: entry.enteredAt,
      reason: entry.reason,
      data: {},
    });
  }
}
