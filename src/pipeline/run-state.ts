// Run State
// One observable record of the current (or last) pipeline run.
// Snapshots are frozen and swapped whole; only the writer handed out by begin() may change them.

import { EventEmitter } from 'events';
import logger from '../shared/logger';
import { RunStateSnapshot, RunStats, TerminalRunStatus } from '../shared/types';

export const IDLE_PHASE = 'Idle';
export const NO_TASK = 'N/A';

export function emptyStats(): RunStats {
  return {
    sourcesFailed: 0,
    urlsDiscovered: 0,
    articlesStored: 0,
    extractionFailures: 0,
    analysisFailures: 0,
    sentimentsStored: 0,
  };
}

function freeze(snapshot: RunStateSnapshot): Readonly<RunStateSnapshot> {
  Object.freeze(snapshot.stats);
  Object.freeze(snapshot.sources);
  return Object.freeze(snapshot);
}

const IDLE_SNAPSHOT: Readonly<RunStateSnapshot> = freeze({
  runId: null,
  running: false,
  status: 'IDLE',
  phase: IDLE_PHASE,
  progress: 0,
  total: 0,
  currentTask: NO_TASK,
  startedAt: null,
  endedAt: null,
  error: null,
  stopRequested: false,
  provider: null,
  model: null,
  sources: [],
  stats: emptyStats(),
});

export interface RunDescriptor {
  runId: string;
  provider: string;
  model: string;
  sources: string[];
}

type StatKey = keyof RunStats;

/**
 * Mutation handle for one run. Calls after the run has been superseded are dropped.
 */
export class RunStateWriter {
  readonly runId: string;
  private tracker: RunStateTracker;

  constructor(tracker: RunStateTracker, runId: string) {
    this.tracker = tracker;
    this.runId = runId;
  }

  setPhase(phase: string, currentTask?: string): void {
    this.apply(current => ({
      ...current,
      phase,
      currentTask: currentTask ?? current.currentTask,
    }));
  }

  setCurrentTask(currentTask: string): void {
    this.apply(current => ({ ...current, currentTask }));
  }

  /**
   * Total only grows during a run
   */
  setTotal(total: number): void {
    this.apply(current => ({ ...current, total: Math.max(current.total, total) }));
  }

  advance(currentTask?: string): void {
    this.apply(current => ({
      ...current,
      progress: Math.min(current.progress + 1, current.total),
      currentTask: currentTask ?? current.currentTask,
    }));
  }

  increment(stat: StatKey, by: number = 1): void {
    this.apply(current => ({
      ...current,
      stats: { ...current.stats, [stat]: current.stats[stat] + by },
    }));
  }

  finish(status: TerminalRunStatus, error: string | null = null): void {
    this.apply(current => ({
      ...current,
      running: false,
      status,
      phase: terminalPhase(status),
      currentTask: NO_TASK,
      endedAt: new Date(),
      error,
    }));
  }

  private apply(update: (current: RunStateSnapshot) => RunStateSnapshot): void {
    this.tracker.write(this.runId, update);
  }
}

function terminalPhase(status: TerminalRunStatus): string {
  switch (status) {
    case 'COMPLETED':
      return 'Completed';
    case 'STOPPED':
      return 'Stopped by user';
    case 'FAILED':
      return 'Failed';
  }
}

export class RunStateTracker extends EventEmitter {
  private current: Readonly<RunStateSnapshot> = IDLE_SNAPSHOT;

  snapshot(): Readonly<RunStateSnapshot> {
    return this.current;
  }

  isRunning(): boolean {
    return this.current.running;
  }

  currentRunId(): string | null {
    return this.current.runId;
  }

  /**
   * Reset to a fresh Running state and hand out the only writer for it.
   * Callers must check isRunning() first; begin() refuses to replace a live run.
   */
  begin(run: RunDescriptor): RunStateWriter {
    if (this.current.running) {
      throw new Error(`Run ${this.current.runId} is still running`);
    }

    this.replace({
      runId: run.runId,
      running: true,
      status: 'RUNNING',
      phase: 'Starting',
      progress: 0,
      total: 0,
      currentTask: NO_TASK,
      startedAt: new Date(),
      endedAt: null,
      error: null,
      stopRequested: false,
      provider: run.provider,
      model: run.model,
      sources: [...run.sources],
      stats: emptyStats(),
    });

    return new RunStateWriter(this, run.runId);
  }

  /**
   * Flag a stop on the live run. Returns false when nothing is running.
   */
  requestStop(): boolean {
    if (!this.current.running) return false;
    if (!this.current.stopRequested) {
      this.replace({ ...this.current, stopRequested: true, phase: 'Stopping...' });
    }
    return true;
  }

  isStopRequested(): boolean {
    return this.current.stopRequested;
  }

  write(runId: string, update: (current: RunStateSnapshot) => RunStateSnapshot): void {
    if (this.current.runId !== runId || !this.current.running) {
      logger.warn(`[RunState] Ignoring write from stale run ${runId}`);
      return;
    }

    const next = update({ ...this.current, stats: { ...this.current.stats }, sources: [...this.current.sources] });
    // A pending stop keeps its status text until the run ends
    if (this.current.stopRequested && next.running) {
      next.stopRequested = true;
      next.phase = 'Stopping...';
    }
    this.replace(next);
  }

  private replace(next: RunStateSnapshot): void {
    this.current = freeze(next);
    this.emit('state', this.current);
  }
}
