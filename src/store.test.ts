import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Store } from "./store.ts";
import type { ActionLogEntry } from "./runtimeActionLogger.ts";

async function withTempStore(run: (store: Store) => Promise<void> | void) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "insight-store-test-"));
  const store = new Store(path.join(dir, "insight.db"));
  store.init();

  try {
    await run(store);
  } finally {
    store.close();
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("getGuildSettings returns defaults for unknown guilds", async () => {
  await withTempStore((store) => {
    assert.deepEqual(store.getGuildSettings("guild-1"), {
      guildId: "guild-1",
      analysisMode: "debate",
      recordingIntervalSeconds: 300,
      apiKey: null
    });
  });
});

test("guild settings updates persist independently per field", async () => {
  await withTempStore((store) => {
    store.setAnalysisMode("guild-1", "summary");
    store.setRecordingInterval("guild-1", 120);
    const updated = store.setApiKey("guild-1", "  test-secret  ");

    assert.deepEqual(updated, {
      guildId: "guild-1",
      analysisMode: "summary",
      recordingIntervalSeconds: 120,
      apiKey: "test-secret"
    });
    assert.equal(store.getGuildSettings("guild-2").analysisMode, "debate");

    assert.equal(store.setApiKey("guild-1", "").apiKey, null);
    assert.equal(store.getGuildSettings("guild-1").recordingIntervalSeconds, 120);
  });
});

test("setRecordingInterval clamps into the supported range", async () => {
  await withTempStore((store) => {
    assert.equal(store.setRecordingInterval("guild-1", 5).recordingIntervalSeconds, 60);
    assert.equal(store.setRecordingInterval("guild-1", 7200).recordingIntervalSeconds, 3600);
  });
});

test("logAction stores rows and notifies the listener asynchronously", async () => {
  await withTempStore(async (store) => {
    const seen: ActionLogEntry[] = [];
    store.onActionLogged = (action) => {
      seen.push(action);
    };

    store.logAction({
      kind: "session_started",
      guildId: "guild-1",
      channelId: "chan-1",
      userId: "user-1",
      content: "session started",
      metadata: { sessionId: "sess-1" }
    });

    assert.equal(seen.length, 0);
    await new Promise<void>((resolve) => queueMicrotask(resolve));
    assert.equal(seen.length, 1);
    assert.equal(seen[0]?.kind, "session_started");

    const [row] = store.getRecentActions(10, { guildId: "guild-1" });
    assert.equal(row?.kind, "session_started");
    assert.equal(row?.content, "session started");
    assert.deepEqual(row?.metadata, { sessionId: "sess-1" });
    assert.equal(store.countActionsSince("session_started", "2000-01-01T00:00:00.000Z"), 1);
    assert.equal(store.getRecentActions(10, { guildId: "guild-2" }).length, 0);
  });
});

test("pruneActionLog removes rows older than the retention window", async () => {
  await withTempStore((store) => {
    const insert = store
      .requireDb()
      .prepare("INSERT INTO actions(created_at, guild_id, kind, content) VALUES (?, ?, ?, ?)");
    insert.run("2026-02-01T00:00:00.000Z", "guild-1", "analysis_completed", "old");
    insert.run("2026-02-28T00:00:00.000Z", "guild-1", "analysis_completed", "recent");

    const result = store.pruneActionLog({ now: "2026-03-01T00:00:00.000Z" });

    assert.equal(result.deletedActions, 1);
    const remaining = store.getRecentActions(10);
    assert.equal(remaining.length, 1);
    assert.equal(remaining[0]?.content, "recent");
  });
});
