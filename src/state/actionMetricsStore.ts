import { createStore } from 'zustand/vanilla';
import type { ActionOutcome, ActionOutcomeInput, OutcomeTally } from './types';

const RECENT_LIMIT = 20;

function emptyTally(): OutcomeTally {
  return { total: 0, success: 0, failure: 0, skipped: 0 };
}

export interface ActionMetricsState {
  lastOutcome: ActionOutcome | null;
  /** Newest last, capped. */
  recent: ActionOutcome[];
  tally: OutcomeTally;
  record: (input: ActionOutcomeInput) => ActionOutcome;
  reset: () => void;
}

export type ActionMetricsStore = ReturnType<typeof createActionMetricsStore>;

export function createActionMetricsStore() {
  return createStore<ActionMetricsState>((set) => ({
    lastOutcome: null,
    recent: [],
    tally: emptyTally(),
    record(input) {
      const outcome: ActionOutcome = {
        ...input,
        message: input.message ?? null,
        durationMs: input.durationMs ?? null,
        timestamp: input.timestamp ?? new Date().toISOString(),
      };
      set((state) => {
        const tally = { ...state.tally, total: state.tally.total + 1 };
        tally[outcome.status] += 1;
        return {
          lastOutcome: outcome,
          recent: [...state.recent, outcome].slice(-RECENT_LIMIT),
          tally,
        };
      });
      return outcome;
    },
    reset() {
      set({ lastOutcome: null, recent: [], tally: emptyTally() });
    },
  }));
}
