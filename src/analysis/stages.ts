import type { ErrorCode } from '../types';
import { HypoForgeError, UpstreamError, errorMessage } from '../utils/errors';

export type Stage =
  | 'AnalysisPending'
  | 'AnalysisComplete'
  | 'Executing'
  | 'Executed'
  | 'SummaryPending'
  | 'Done'
  | 'Failed';

export interface StageError {
  error: ErrorCode;
  status: number;
  message: string;
  upstream?: { status: number; body: string };
}

export type StageEvent =
  | { stage: 'AnalysisPending'; analysis: string }
  | { stage: 'AnalysisComplete'; analysis: string; code: string }
  | { stage: 'Executing' }
  | { stage: 'Executed'; success: boolean; p_value: number }
  | { stage: 'SummaryPending'; summary: string }
  | { stage: 'Done'; success: boolean; p_value: number; analysis: string; summary: string }
  | { stage: 'Failed'; failed_stage: Stage; error: StageError };

const TRANSITIONS: Record<Stage | 'Start', readonly Stage[]> = {
  Start: ['AnalysisPending', 'Failed'],
  AnalysisPending: ['AnalysisPending', 'AnalysisComplete', 'Failed'],
  AnalysisComplete: ['Executing', 'Failed'],
  Executing: ['Executed', 'Failed'],
  Executed: ['SummaryPending', 'Failed'],
  SummaryPending: ['SummaryPending', 'Done', 'Failed'],
  Done: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: Stage | 'Start',
    readonly to: Stage
  ) {
    super(`Illegal stage transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Tracks the hypothesis-testing workflow and rejects events out of order.
 */
export class StageMachine {
  private current: Stage | 'Start' = 'Start';

  get stage(): Stage | 'Start' {
    return this.current;
  }

  get finished(): boolean {
    return this.current === 'Done' || this.current === 'Failed';
  }

  advance<E extends StageEvent>(event: E): E {
    if (!TRANSITIONS[this.current].includes(event.stage)) {
      throw new IllegalTransitionError(this.current, event.stage);
    }
    this.current = event.stage;
    return event;
  }

  /**
   * Build the Failed event for an error raised while in the current stage.
   */
  fail(error: unknown): Extract<StageEvent, { stage: 'Failed' }> {
    const failedStage = this.current === 'Start' ? 'AnalysisPending' : this.current;
    return this.advance({ stage: 'Failed', failed_stage: failedStage, error: toStageError(error) });
  }
}

export function toStageError(error: unknown): StageError {
  if (error instanceof UpstreamError) {
    return {
      error: error.code,
      status: error.status,
      message: error.message,
      upstream: { status: error.upstreamStatus, body: error.body },
    };
  }
  if (error instanceof HypoForgeError) {
    return { error: error.code, status: error.status, message: error.message };
  }
  return { error: 'INTERNAL_ERROR', status: 500, message: errorMessage(error) };
}
