/**
 * Tailoring state machine
 *
 * INITIAL → TAILORED → (VERIFIED_OK | FORCE_RETRY) → FINAL
 *
 * FORCE_RETRY leads to exactly one escalated pass whose result is accepted
 * regardless of its own verification.
 */

import { TailorLogger } from '../logging/logger';
import type { PipelineContext, TailoringState } from '../types';

export const TRANSITIONS: Readonly<Record<TailoringState, readonly TailoringState[]>> = {
  INITIAL: ['TAILORED'],
  TAILORED: ['VERIFIED_OK', 'FORCE_RETRY'],
  VERIFIED_OK: ['FINAL'],
  FORCE_RETRY: ['FINAL'],
  FINAL: []
};

export class InvalidTransitionError extends Error {
  constructor(public readonly from: TailoringState, public readonly to: TailoringState) {
    super(`Invalid tailoring transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class TailoringStateMachine {
  private current: TailoringState = 'INITIAL';
  private readonly history: TailoringState[] = ['INITIAL'];

  constructor(
    private readonly context?: PipelineContext,
    private readonly audit: TailorLogger = new TailorLogger()
  ) {}

  get state(): TailoringState {
    return this.current;
  }

  canTransition(to: TailoringState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: TailoringState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.audit.logTransition(this.current, to, this.context);
    this.current = to;
    this.history.push(to);
  }

  /** States visited so far, starting with INITIAL */
  getHistory(): TailoringState[] {
    return [...this.history];
  }

  isFinal(): boolean {
    return this.current === 'FINAL';
  }
}
