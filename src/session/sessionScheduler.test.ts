import { test } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import type { ActionLogEntry } from "../runtimeActionLogger.ts";
import { SessionScheduler } from "./sessionScheduler.ts";

async function waitFor(predicate: () => boolean, timeoutMs = 2000) {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await delay(2);
  }
}

function createScheduler({
  intervalSeconds = () => 5,
  isActive = () => true,
  runCycle = async () => undefined,
  timeUnitMs = 1
}: {
  intervalSeconds?: () => number;
  isActive?: () => boolean;
  runCycle?: () => Promise<unknown>;
  timeUnitMs?: number;
} = {}) {
  const logs: ActionLogEntry[] = [];
  const scheduler = new SessionScheduler({
    guildId: "guild-1",
    sessionId: "sess-1",
    getIntervalSeconds: intervalSeconds,
    isActive,
    runCycle,
    store: {
      logAction(entry) {
        logs.push(entry);
      }
    },
    timeUnitMs
  });
  return { scheduler, logs };
}

test("runs cycles repeatedly until stopped", async () => {
  let cycles = 0;
  const { scheduler, logs } = createScheduler({
    runCycle: async () => {
      cycles += 1;
    }
  });

  assert.equal(scheduler.state, "idle");
  assert.equal(scheduler.start(), true);
  assert.equal(scheduler.state, "running");
  await waitFor(() => cycles >= 3);
  await scheduler.stop();

  assert.equal(scheduler.state, "terminated");
  assert.equal(scheduler.cyclesCompleted, cycles);
  assert.equal(logs.at(-1)?.kind, "session_scheduler_stopped");
});

test("stop aborts a long sleep promptly without running a cycle", async () => {
  let cycles = 0;
  const { scheduler } = createScheduler({
    intervalSeconds: () => 3600,
    timeUnitMs: 1000,
    runCycle: async () => {
      cycles += 1;
    }
  });

  scheduler.start();
  await delay(10);
  const stopStartedAt = Date.now();
  await scheduler.stop();

  assert.ok(Date.now() - stopStartedAt < 500);
  assert.equal(cycles, 0);
  assert.equal(scheduler.state, "terminated");
});

test("the interval is re-read at the start of every cycle", async () => {
  let interval = 5;
  const seen: number[] = [];
  let cycles = 0;
  const { scheduler } = createScheduler({
    intervalSeconds: () => {
      seen.push(interval);
      return interval;
    },
    runCycle: async () => {
      cycles += 1;
      if (cycles === 1) interval = 8;
    }
  });

  scheduler.start();
  await waitFor(() => cycles >= 3);
  await scheduler.stop();

  assert.deepEqual(seen.slice(0, 3), [5, 8, 8]);
});

test("a changed interval does not shorten the sleep already in progress", async () => {
  let interval = 200;
  let firstCycleAt = 0;
  const { scheduler } = createScheduler({
    intervalSeconds: () => interval,
    runCycle: async () => {
      if (!firstCycleAt) firstCycleAt = Date.now();
    }
  });

  const startedAt = Date.now();
  scheduler.start();
  await delay(5);
  interval = 1;
  await waitFor(() => firstCycleAt > 0);
  await scheduler.stop();

  assert.ok(firstCycleAt - startedAt >= 150);
});

test("a failing cycle is logged and the loop keeps going", async () => {
  let calls = 0;
  const { scheduler, logs } = createScheduler({
    runCycle: async () => {
      calls += 1;
      if (calls === 1) throw new Error("analysis exploded");
    }
  });

  scheduler.start();
  await waitFor(() => calls >= 3);
  await scheduler.stop();

  const failure = logs.find((entry) => entry.kind === "session_error");
  assert.equal(failure?.content, "scheduled_cycle_failed: analysis exploded");
  assert.ok(scheduler.cyclesCompleted >= 2);
});

test("an inactive session terminates the loop without running analysis", async () => {
  let cycles = 0;
  const { scheduler } = createScheduler({
    isActive: () => false,
    runCycle: async () => {
      cycles += 1;
    }
  });

  scheduler.start();
  await scheduler.whenTerminated();
  assert.equal(scheduler.state, "terminated");
  assert.equal(cycles, 0);
});

test("deactivation during the sleep skips the pending cycle", async () => {
  let active = true;
  let cycles = 0;
  const { scheduler } = createScheduler({
    intervalSeconds: () => 20,
    isActive: () => active,
    runCycle: async () => {
      cycles += 1;
    }
  });

  scheduler.start();
  await delay(5);
  active = false;
  await scheduler.whenTerminated();
  assert.equal(cycles, 0);
});

test("a terminated scheduler cannot be restarted", async () => {
  const { scheduler } = createScheduler();
  await scheduler.stop();
  assert.equal(scheduler.state, "terminated");
  assert.equal(scheduler.start(), false);
  assert.equal(scheduler.state, "terminated");
});

test("a failed interval read is logged and the loop keeps the last good interval", async () => {
  let reads = 0;
  let cycles = 0;
  const { scheduler, logs } = createScheduler({
    intervalSeconds: () => {
      reads += 1;
      if (reads === 2) throw new Error("SQLITE_BUSY");
      return 5;
    },
    runCycle: async () => {
      cycles += 1;
    }
  });

  scheduler.start();
  await waitFor(() => cycles >= 3);
  assert.equal(scheduler.state, "running");
  await scheduler.stop();

  const failures = logs.filter((entry) => String(entry.content).startsWith("interval_read_failed"));
  assert.equal(failures.length, 1);
  assert.equal(failures[0]?.kind, "session_error");
  assert.equal(failures[0]?.content, "interval_read_failed: SQLITE_BUSY");
  assert.deepEqual(failures[0]?.metadata, { sessionId: "sess-1", fallbackSeconds: 5 });
});
