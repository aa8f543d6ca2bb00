import type { ExecutableActionType } from '../types/wheel';

export type ActionOutcomeStatus = 'success' | 'failure' | 'skipped';

export interface ActionOutcome {
  actionType: ExecutableActionType;
  value: string;
  status: ActionOutcomeStatus;
  message: string | null;
  durationMs: number | null;
  timestamp: string;
}

export type ActionOutcomeInput = Pick<ActionOutcome, 'actionType' | 'value' | 'status'> &
  Partial<Pick<ActionOutcome, 'message' | 'durationMs' | 'timestamp'>>;

export type OutcomeTally = Record<ActionOutcomeStatus, number> & { total: number };
