/**
 * Report scheduler
 *
 * Polls the wall clock and fires report aggregation on bucket transitions:
 * once per completed hour, and once per day at the daily cutoff hour. A day
 * closed before midnight is aggregated again at the first tick after it has
 * fully elapsed, so the artifact covers the whole calendar day; only the
 * cutoff run is handed to the delivery hook. The last bucket seen for each
 * kind is persisted, so a restart inside the same bucket does not fire it
 * again.
 */

import { z } from "zod";
import type { ReportWindow, SchedulerState } from "../types";
import {
  dailyWindow,
  dateKey,
  hourBucket,
  previousHourWindow,
  reportDayForCutoff,
  startOfDay,
} from "../scheduling";
import type { AggregationResult, ReportAggregator } from "./aggregator";
import type { Storage } from "./storage";
import { createLogger } from "./logger";
import { describeError } from "./errors";

const log = createLogger("SCHEDULER");

export const SCHEDULER_STATE_KEY = "scheduler_state.json";

const stateSchema = z.object({
  lastHourlyBucket: z.string().nullable(),
  lastDailyBucket: z.string().nullable(),
  // Absent from state files written before settling existed
  lastSettledDay: z.string().nullable().default(null),
});

export interface ReportSchedulerOptions {
  aggregator: ReportAggregator;
  storage: Storage;
  timeZone: string;
  dailyCutoffHour: number;
  intervalMs: number;
  now?: () => number;
  // Called after an hourly or cutoff window produced a report
  onReport?: (result: AggregationResult) => Promise<void>;
}

export class ReportScheduler {
  private state: SchedulerState = {
    lastHourlyBucket: null,
    lastDailyBucket: null,
    lastSettledDay: null,
  };
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private readonly now: () => number;

  constructor(private readonly options: ReportSchedulerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(): SchedulerState {
    return { ...this.state };
  }

  // Load last-seen buckets from storage; keeps the "none" sentinel if absent
  async restore(): Promise<void> {
    try {
      const text = await this.options.storage.read(SCHEDULER_STATE_KEY);
      if (!text) return;
      const parsed = stateSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        this.state = parsed.data;
        log.info("Restored scheduler state", this.state);
      } else {
        log.warn("Ignoring invalid scheduler state");
      }
    } catch (error) {
      log.error("Failed to restore scheduler state", describeError(error));
    }
  }

  async start(): Promise<void> {
    if (this.timer) return;
    await this.restore();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    log.info(`Started, polling every ${this.options.intervalMs / 1000}s`);
    await this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("Stopped");
    }
  }

  /**
   * Check for bucket transitions and aggregate the windows they close.
   * Never throws; returns the windows that were triggered.
   */
  async tick(): Promise<ReportWindow[]> {
    // Overlapping ticks would see the same transition
    if (this.ticking) return [];
    this.ticking = true;

    try {
      const now = this.now();
      const { timeZone, dailyCutoffHour } = this.options;
      const triggered: { window: ReportWindow; deliver: boolean }[] = [];

      const hour = hourBucket(now, timeZone);
      if (hour !== this.state.lastHourlyBucket) {
        this.state.lastHourlyBucket = hour;
        triggered.push({ window: previousHourWindow(now, timeZone), deliver: true });
      }

      const day = reportDayForCutoff(now, timeZone, dailyCutoffHour);
      if (day !== this.state.lastDailyBucket) {
        this.state.lastDailyBucket = day;
        triggered.push({ window: dailyWindow(day, timeZone), deliver: true });
      }

      // Most recent calendar day that has fully elapsed
      const settled = dateKey(startOfDay(now, timeZone) - 1, timeZone);
      if (settled !== this.state.lastSettledDay) {
        this.state.lastSettledDay = settled;
        // A cutoff run after midnight already saw the whole day
        const coveredByCutoff = triggered.some(
          ({ window }) => window.kind === "daily" && window.label === settled,
        );
        if (!coveredByCutoff) {
          triggered.push({ window: dailyWindow(settled, timeZone), deliver: false });
        }
      }

      if (triggered.length === 0) return [];

      // Record the transition before running so a failure is not retried
      await this.persistState();
      for (const { window, deliver } of triggered) {
        await this.run(window, deliver);
      }
      return triggered.map(({ window }) => window);
    } finally {
      this.ticking = false;
    }
  }

  private async run(window: ReportWindow, deliver: boolean): Promise<void> {
    log.info(`Aggregating ${window.kind} window ${window.label}`);
    let result: AggregationResult | null;
    try {
      result = await this.options.aggregator.aggregate(window);
    } catch (error) {
      log.error(`Aggregation failed for ${window.kind} window ${window.label}`, describeError(error));
      return;
    }

    if (result && deliver && this.options.onReport) {
      try {
        await this.options.onReport(result);
      } catch (error) {
        log.error(`Report delivery failed for ${result.key}`, describeError(error));
      }
    }
  }

  private async persistState(): Promise<void> {
    try {
      await this.options.storage.write(SCHEDULER_STATE_KEY, JSON.stringify(this.state));
    } catch (error) {
      log.error("Failed to persist scheduler state", describeError(error));
    }
  }
}
