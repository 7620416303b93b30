import { test } from "node:test";
import assert from "node:assert/strict";
import { Client } from "discord.js";
import { DiscordReportPublisher, buildMessagePayload, clipThreadName } from "./reportPublisher.ts";

function createOfflineClient() {
  const client = new Client({ intents: [] });
  const requested: string[] = [];
  client.channels.fetch = async (id) => {
    requested.push(String(id));
    return null;
  };
  return { client, requested };
}

test("clipThreadName collapses whitespace and respects the thread name limit", () => {
  assert.equal(clipThreadName("  Discussion   report\n2026-03-01 10:11 "), "Discussion report 2026-03-01 10:11");
  assert.equal(clipThreadName("x".repeat(150)).length, 100);
  assert.equal(clipThreadName("   "), "Discussion report");
});

test("buildMessagePayload disables mention parsing", () => {
  assert.deepEqual(buildMessagePayload("@everyone hello"), {
    content: "@everyone hello",
    allowedMentions: { parse: [] }
  });
});

test("publishing to an unknown channel fails with a clear message", async () => {
  const { client, requested } = createOfflineClient();
  const publisher = new DiscordReportPublisher({ client });

  await assert.rejects(() => publisher.postMessage("chan-1", "hello"), /Channel chan-1 is not a text channel\./);
  await assert.rejects(() => publisher.createThread("chan-2", "msg-1", "title"), /Channel chan-2 is not a text channel\./);
  await assert.rejects(() => publisher.sendToThread("thread-1", "hello"), /Channel thread-1 is not a thread\./);
  assert.deepEqual(requested, ["chan-1", "chan-2", "thread-1"]);

  await client.destroy();
});
