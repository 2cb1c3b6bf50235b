// Pipeline Scheduler - fires one run per day at a configured UTC time
// Shares the engine's start() guard with manual triggers; overlapping fires are logged and dropped

import cron from 'node-cron';
import configManager from '../shared/config';
import logger from '../shared/logger';
import {
  AlreadyRunningError,
  InvalidScheduleError,
  ProviderNotConfiguredError,
  UnknownSourceError,
  describeError,
} from '../shared/errors';
import { ScheduleConfig } from '../shared/types';
import { KeyValueStore } from '../data/sentiment-store';
import { PipelineEngine, RunHandle } from './pipeline-engine';

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const SCHEDULE_TIME_KEY = 'schedule_time';
export const SCHEDULE_ENABLED_KEY = 'schedule_enabled';

export interface ScheduleView extends ScheduleConfig {
  nextRunAt: Date | null;
}

export interface SchedulerOptions {
  provider: string;
  model?: string;
  defaultTime: string;
  defaultEnabled: boolean;
}

function parseTime(value: string): { hour: number; minute: number } {
  const match = TIME_PATTERN.exec(value);
  if (!match) throw new InvalidScheduleError(value);
  return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) };
}

export function isValidScheduleTime(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Next UTC occurrence of HH:MM strictly after `now`
 */
export function nextFireTime(time: string, now: Date = new Date()): Date {
  const { hour, minute } = parseTime(time);
  const candidate = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hour, minute));
  if (candidate.getTime() <= now.getTime()) {
    candidate.setUTCDate(candidate.getUTCDate() + 1);
  }
  return candidate;
}

export class PipelineScheduler {
  private engine: PipelineEngine;
  private store: KeyValueStore;
  private options: SchedulerOptions;
  private cronJob: cron.ScheduledTask | null = null;
  private schedule: ScheduleConfig;

  constructor(engine: PipelineEngine, store: KeyValueStore, options?: Partial<SchedulerOptions>) {
    const defaults = configManager.get().scheduler;
    this.engine = engine;
    this.store = store;
    this.options = {
      provider: defaults.provider,
      model: defaults.model,
      defaultTime: defaults.dailyTime,
      defaultEnabled: defaults.enabled,
      ...options,
    };
    this.schedule = { time: this.options.defaultTime, enabled: this.options.defaultEnabled };
  }

  /**
   * Load the persisted schedule (falling back to config) and arm the cron task
   */
  start(): void {
    const storedTime = this.store.getConfigValue(SCHEDULE_TIME_KEY);
    const storedEnabled = this.store.getConfigValue(SCHEDULE_ENABLED_KEY);

    let time = this.options.defaultTime;
    if (storedTime && isValidScheduleTime(storedTime)) {
      time = storedTime;
    } else if (storedTime) {
      logger.warn(`[Scheduler] Ignoring invalid stored schedule time "${storedTime}"`);
    }

    if (!isValidScheduleTime(time)) {
      throw new InvalidScheduleError(time);
    }

    this.schedule = {
      time,
      enabled: storedEnabled === null ? this.options.defaultEnabled : storedEnabled === 'true',
    };
    this.arm();
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      logger.info('[Scheduler] Stopped');
    }
  }

  /**
   * Persist and apply a new trigger time. A run already in progress is not affected.
   */
  configure(time: string, enabled?: boolean): ScheduleView {
    parseTime(time);

    this.store.setConfigValue(SCHEDULE_TIME_KEY, time);
    if (enabled !== undefined) {
      this.store.setConfigValue(SCHEDULE_ENABLED_KEY, String(enabled));
    }

    this.schedule = { time, enabled: enabled ?? this.schedule.enabled };
    this.arm();
    return this.getSchedule();
  }

  getSchedule(now: Date = new Date()): ScheduleView {
    return {
      ...this.schedule,
      nextRunAt: this.schedule.enabled ? nextFireTime(this.schedule.time, now) : null,
    };
  }

  /**
   * One scheduled trigger. Returns the run handle, or null when the run could not start.
   */
  fire(): RunHandle | null {
    logger.info('[Scheduler] Scheduled pipeline run firing');
    try {
      const handle = this.engine.start({ provider: this.options.provider, model: this.options.model });
      logger.info(`[Scheduler] Started scheduled run ${handle.runId}`);
      return handle;
    } catch (error) {
      if (
        error instanceof AlreadyRunningError ||
        error instanceof UnknownSourceError ||
        error instanceof ProviderNotConfiguredError
      ) {
        logger.warn(`[Scheduler] Scheduled run skipped: ${error.message}`);
        return null;
      }
      logger.error(`[Scheduler] Scheduled run failed to start: ${describeError(error)}`);
      return null;
    }
  }

  private arm(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }

    if (!this.schedule.enabled) {
      logger.info('[Scheduler] Daily pipeline run disabled');
      return;
    }

    const { hour, minute } = parseTime(this.schedule.time);
    this.cronJob = cron.schedule(`${minute} ${hour} * * *`, () => {
      this.fire();
    }, { timezone: 'UTC' });

    logger.info(`[Scheduler] Daily pipeline run scheduled at ${this.schedule.time} UTC`);
  }
}
