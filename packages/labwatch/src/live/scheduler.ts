import type { PlotTarget, RunStore, SliceRequest } from '../types.js';
import { toLoaderError } from '../errors.js';
import { RunLoader } from './loader.js';
import type { LoaderOptions } from './loader.js';
import { SchedulerState, SYSTEM_TIMERS, TRANSITIONS } from './types.js';
import type { RefreshUpdate, Timers } from './types.js';

export interface SchedulerOptions extends LoaderOptions {
  onUpdate: (update: RefreshUpdate) => void;
  timers?: Timers;
  /** On every timer tick, switch to a newer run if the store has one. */
  followLatest?: boolean;
}

/**
 * Periodic live refresh for one plot target.
 *
 * Every start/stop/retarget bumps the generation. A refresh captures the
 * generation it was issued for and its result is dropped if the generation
 * moved on while it was in flight. At most one refresh runs at a time: a tick
 * for the generation already in flight is skipped, and a tick for a newer
 * generation is queued to run as soon as the stale one returns.
 */
export class RefreshScheduler {
  private _state = SchedulerState.IDLE;
  private _generation = 0;
  private inFlight: Promise<void> | null = null;
  private inFlightGeneration = -1;
  private pending = false;
  private cancelTimer: (() => void) | null = null;
  private loader: RunLoader | null = null;
  private halted = false;
  private readonly timers: Timers;
  private readonly loaderOptions: LoaderOptions;

  constructor(
    private readonly store: RunStore,
    private readonly opts: SchedulerOptions,
  ) {
    this.timers = opts.timers ?? SYSTEM_TIMERS;
    this.loaderOptions = { incremental: opts.incremental, chunkSize: opts.chunkSize };
  }

  get state(): SchedulerState {
    return this._state;
  }

  get generation(): number {
    return this._generation;
  }

  get target(): PlotTarget | null {
    return this.loader?.target ?? null;
  }

  /** Idle → Running. Refreshes once immediately, then every interval. */
  start(target: PlotTarget, intervalSeconds: number): Promise<void> {
    if (!(intervalSeconds > 0)) {
      throw new Error(`Refresh interval must be positive, got ${intervalSeconds}`);
    }
    this.transition(SchedulerState.RUNNING);
    this.retargetInternal(target);
    this.cancelTimer = this.timers.every(() => { void this.onTimer(); }, intervalSeconds * 1000);
    return this.tick();
  }

  /** Running → Idle. An in-flight refresh may finish but its result is dropped. */
  stop(): void {
    this.transition(SchedulerState.IDLE);
    this.cancelTimer?.();
    this.cancelTimer = null;
    this.loader = null;
    this._generation++;
  }

  /** Switch run, parameter or options while running; accumulated rows are discarded. */
  retarget(target: PlotTarget): void {
    if (this._state !== SchedulerState.RUNNING) {
      throw new Error('Cannot retarget: scheduler is idle');
    }
    this.retargetInternal(target);
  }

  /** Change the slice only; rows already loaded for the run are kept. */
  updateSlice(slice: SliceRequest | undefined): void {
    if (!this.loader) return;
    const { runId, parameter, showImaginary } = this.loader.target;
    const next: PlotTarget = { runId, parameter, showImaginary, slice };
    if (this.opts.incremental === false) {
      this.retargetInternal(next);
      return;
    }
    // Slice is read at payload time, so the loader keeps its accumulator.
    this.loader.target.slice = slice;
    this._generation++;
  }

  /**
   * One scheduled refresh. Public so callers can force a refresh; obeys the
   * same in-flight rule as timer ticks. Resolves once the refresh, and any
   * refresh queued behind it, has finished.
   */
  tick(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.drain();
    } else if (this.inFlightGeneration !== this._generation) {
      this.pending = true;
    }
    return this.inFlight;
  }

  private async drain(): Promise<void> {
    try {
      do {
        this.pending = false;
        await this.refreshOnce();
      } while (this.pending);
    } finally {
      this.inFlight = null;
    }
  }

  private async refreshOnce(): Promise<void> {
    const loader = this.loader;
    if (this._state !== SchedulerState.RUNNING || !loader || this.halted) return;

    const generation = this._generation;
    this.inFlightGeneration = generation;
    const isCurrent = (): boolean =>
      this._state === SchedulerState.RUNNING && this._generation === generation;

    try {
      const payload = await loader.refresh(generation, isCurrent);
      if (payload && isCurrent()) {
        this.opts.onUpdate({ kind: 'data', generation, target: loader.target, payload });
      }
    } catch (err) {
      if (isCurrent()) {
        const error = toLoaderError(err, loader.target.runId);
        this.halted = !error.retryable;
        this.opts.onUpdate({ kind: 'error', generation, target: loader.target, error, halted: this.halted });
      }
    }
  }

  private async onTimer(): Promise<void> {
    if (this.opts.followLatest && !(await this.jumpToLatest())) return;
    await this.tick();
  }

  /** Retarget to a newer run if one exists. False when the store could not be asked. */
  private async jumpToLatest(): Promise<boolean> {
    const current = this.loader?.target;
    if (!current) return true;
    let latest: number | null;
    try {
      latest = await this.store.latestRunId();
    } catch (err) {
      if (this._state === SchedulerState.RUNNING && this.loader?.target === current) {
        const error = toLoaderError(err, current.runId);
        this.opts.onUpdate({ kind: 'error', generation: this._generation, target: current, error, halted: this.halted });
      }
      return false;
    }
    if (this._state !== SchedulerState.RUNNING || this.loader?.target !== current) return true;
    if (latest !== null && latest > current.runId) {
      this.retargetInternal({ ...current, runId: latest });
    }
    return true;
  }

  private retargetInternal(target: PlotTarget): void {
    this._generation++;
    this.halted = false;
    this.loader = new RunLoader(this.store, { ...target }, this.loaderOptions);
  }

  private transition(next: SchedulerState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Invalid scheduler transition: ${this._state} → ${next}`);
    }
    this._state = next;
  }
}
