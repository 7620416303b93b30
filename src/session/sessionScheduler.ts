import { setTimeout as delay } from "node:timers/promises";
import { DEFAULT_RECORDING_INTERVAL_SECONDS } from "../settings/guildSettings.ts";
import type { ActionLog } from "../store.ts";
import { errorMessage } from "../utils.ts";

export type SchedulerState = "idle" | "running" | "stopping" | "terminated";

type SessionSchedulerOptions = {
  guildId: string;
  sessionId: string;
  getIntervalSeconds: () => number | Promise<number>;
  isActive: () => boolean | Promise<boolean>;
  runCycle: () => Promise<unknown>;
  store: ActionLog;
  timeUnitMs?: number;
};

export class SessionScheduler {
  readonly guildId: string;
  readonly sessionId: string;
  state: SchedulerState;
  cyclesCompleted: number;
  private readonly getIntervalSeconds: () => number | Promise<number>;
  private readonly isActive: () => boolean | Promise<boolean>;
  private readonly runCycle: () => Promise<unknown>;
  private readonly store: ActionLog;
  private readonly timeUnitMs: number;
  private readonly abortController: AbortController;
  private loop: Promise<void> | null;
  private lastIntervalSeconds: number;

  constructor({
    guildId,
    sessionId,
    getIntervalSeconds,
    isActive,
    runCycle,
    store,
    timeUnitMs = 1000
  }: SessionSchedulerOptions) {
    this.guildId = guildId;
    this.sessionId = sessionId;
    this.getIntervalSeconds = getIntervalSeconds;
    this.isActive = isActive;
    this.runCycle = runCycle;
    this.store = store;
    this.timeUnitMs = Math.max(0, timeUnitMs);
    this.abortController = new AbortController();
    this.state = "idle";
    this.cyclesCompleted = 0;
    this.loop = null;
    this.lastIntervalSeconds = DEFAULT_RECORDING_INTERVAL_SECONDS;
  }

  start() {
    if (this.state !== "idle") return false;
    this.state = "running";
    this.loop = this.runLoop();
    return true;
  }

  async stop() {
    if (this.state === "idle") {
      this.state = "terminated";
      return;
    }
    if (this.state === "running") {
      this.state = "stopping";
    }
    this.abortController.abort();
    await this.loop;
  }

  whenTerminated() {
    return this.loop ?? Promise.resolve();
  }

  private async runLoop() {
    try {
      while (this.state === "running") {
        if (!(await this.isActive())) break;

        // Interval is re-read every cycle so a settings change applies from the next sleep.
        const intervalSeconds = await this.resolveIntervalSeconds();
        const completed = await this.sleep(intervalSeconds * this.timeUnitMs);
        if (!completed || this.state !== "running") break;
        if (!(await this.isActive())) break;

        try {
          await this.runCycle();
          this.cyclesCompleted += 1;
        } catch (error) {
          this.store.logAction({
            kind: "session_error",
            guildId: this.guildId,
            content: `scheduled_cycle_failed: ${errorMessage(error)}`,
            metadata: { sessionId: this.sessionId }
          });
        }
      }
    } catch (error) {
      this.store.logAction({
        kind: "session_error",
        guildId: this.guildId,
        content: `scheduler_failed: ${errorMessage(error)}`,
        metadata: { sessionId: this.sessionId }
      });
    } finally {
      this.state = "terminated";
      this.store.logAction({
        kind: "session_scheduler_stopped",
        guildId: this.guildId,
        content: "scheduler_stopped",
        metadata: { sessionId: this.sessionId, cyclesCompleted: this.cyclesCompleted }
      });
    }
  }

  private async resolveIntervalSeconds() {
    try {
      const seconds = await this.getIntervalSeconds();
      if (Number.isFinite(seconds) && seconds > 0) {
        this.lastIntervalSeconds = seconds;
      }
    } catch (error) {
      this.store.logAction({
        kind: "session_error",
        guildId: this.guildId,
        content: `interval_read_failed: ${errorMessage(error)}`,
        metadata: { sessionId: this.sessionId, fallbackSeconds: this.lastIntervalSeconds }
      });
    }
    return this.lastIntervalSeconds;
  }

  private async sleep(ms: number) {
    const signal = this.abortController.signal;
    if (signal.aborted) return false;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal.aborted) return false;
      throw error;
    }
  }
}
