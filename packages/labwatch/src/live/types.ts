import type { PlotPayload, PlotTarget } from '../types.js';
import type { LoaderError } from '../errors.js';

export enum SchedulerState {
  IDLE = 'idle',
  RUNNING = 'running',
}

// Valid transitions, checked on every state change
export const TRANSITIONS: Record<SchedulerState, SchedulerState[]> = {
  [SchedulerState.IDLE]:    [SchedulerState.RUNNING],
  [SchedulerState.RUNNING]: [SchedulerState.IDLE],
};

export type RefreshUpdate =
  | { kind: 'data'; generation: number; target: PlotTarget; payload: PlotPayload }
  | { kind: 'error'; generation: number; target: PlotTarget; error: LoaderError; halted: boolean };

/** Periodic timer hook; returns a function that cancels it. Tests pass a manual clock. */
export interface Timers {
  every(fn: () => void, ms: number): () => void;
}

export const SYSTEM_TIMERS: Timers = {
  every(fn, ms) {
    const handle = setInterval(fn, ms);
    return () => clearInterval(handle);
  },
};
