import { test } from "node:test";
import assert from "node:assert/strict";
import { SessionRecorder, type FlushResult } from "./sessionRecorder.ts";
import { SpeakerBuffer } from "./speakerBuffer.ts";

function frame(label: string) {
  return Buffer.from(label, "utf8");
}

function speakersOf(result: FlushResult) {
  assert.equal(result.ok, true);
  if (!result.ok) throw new Error("expected audio");
  return result.snapshot.speakers;
}

function labels(fragments: readonly Buffer[] | undefined) {
  return (fragments ?? []).map((fragment) => fragment.toString("utf8"));
}

test("SpeakerBuffer drain hands back fragments once and resets", () => {
  const buffer = new SpeakerBuffer("alice", 1);
  buffer.append(frame("a1"));
  buffer.append(Buffer.alloc(0));
  buffer.append(frame("a2"));

  assert.equal(buffer.fragmentCount, 2);
  assert.equal(buffer.byteLength, 4);
  const drained = buffer.drain();
  assert.deepEqual(labels(drained), ["a1", "a2"]);
  assert.equal(Object.isFrozen(drained), true);
  assert.equal(buffer.isEmpty(), true);
  assert.equal(buffer.byteLength, 0);
  assert.deepEqual(labels(buffer.drain()), []);
});

test("flush returns one ordered entry per speaker with audio", () => {
  const recorder = new SessionRecorder({ startedAt: 1000, now: () => 2000 });
  recorder.ingest("alice", frame("a1"));
  recorder.ingest("bob", frame("b1"));
  recorder.ingest("alice", frame("a2"));
  recorder.ingest("alice", frame("a3"));

  const result = recorder.flush();
  const speakers = speakersOf(result);
  assert.equal(speakers.size, 2);
  assert.deepEqual(labels(speakers.get("alice")), ["a1", "a2", "a3"]);
  assert.deepEqual(labels(speakers.get("bob")), ["b1"]);
  if (result.ok) {
    assert.equal(result.snapshot.flushedAt, 2000);
    assert.equal(result.snapshot.sequence, 1);
  }
  assert.equal(recorder.hasData(), false);
  assert.equal(recorder.speakerCount(), 0);
});

test("flush sequence advances only when audio is taken", () => {
  const recorder = new SessionRecorder({ now: () => 5 });
  recorder.ingest("alice", frame("a1"));
  const first = recorder.flush();
  assert.equal(recorder.flush().ok, false);
  recorder.ingest("alice", frame("a2"));
  const second = recorder.flush();
  assert.deepEqual([first.ok && first.snapshot.sequence, second.ok && second.snapshot.sequence], [1, 2]);
});

test("flush on an empty recorder reports no_audio", () => {
  const recorder = new SessionRecorder();
  assert.deepEqual(recorder.flush(), { ok: false, reason: "no_audio" });
});

test("empty fragments and blank speaker ids are ignored", () => {
  const recorder = new SessionRecorder();
  recorder.ingest("alice", Buffer.alloc(0));
  recorder.ingest("", frame("x"));

  assert.equal(recorder.hasData(), false);
  assert.deepEqual(recorder.flush(), { ok: false, reason: "no_audio" });
});

test("fragments ingested after a flush land in the next flush", () => {
  const recorder = new SessionRecorder();
  recorder.ingest("alice", frame("a1"));
  const first = speakersOf(recorder.flush());

  recorder.ingest("alice", frame("a2"));
  recorder.ingest("carol", frame("c1"));
  const second = speakersOf(recorder.flush());

  assert.deepEqual(labels(first.get("alice")), ["a1"]);
  assert.deepEqual(labels(second.get("alice")), ["a2"]);
  assert.deepEqual(labels(second.get("carol")), ["c1"]);
  assert.equal(first.has("carol"), false);
});

test("interleaved async ingestion never loses or duplicates fragments across flushes", async () => {
  const recorder = new SessionRecorder();
  const speakers = ["s1", "s2", "s3"];
  const collected = new Map<string, string[]>();

  const collect = () => {
    const result = recorder.flush();
    if (!result.ok) return;
    for (const [speakerId, fragments] of result.snapshot.speakers) {
      collected.set(speakerId, [...(collected.get(speakerId) ?? []), ...labels(fragments)]);
    }
  };

  const producers = speakers.map(async (speakerId) => {
    for (let index = 0; index < 50; index += 1) {
      recorder.ingest(speakerId, frame(`${speakerId}-${index}`));
      await Promise.resolve();
    }
  });
  const flusher = (async () => {
    for (let round = 0; round < 20; round += 1) {
      collect();
      await Promise.resolve();
    }
  })();

  await Promise.all([...producers, flusher]);
  collect();

  for (const speakerId of speakers) {
    const expected = Array.from({ length: 50 }, (_, index) => `${speakerId}-${index}`);
    assert.deepEqual(collected.get(speakerId), expected);
  }
});

test("bufferedBytes and clear track live buffers", () => {
  const recorder = new SessionRecorder();
  recorder.ingest("alice", frame("abc"));
  recorder.ingest("bob", frame("de"));
  assert.equal(recorder.bufferedBytes(), 5);
  assert.equal(recorder.speakerCount(), 2);
  recorder.clear();
  assert.equal(recorder.bufferedBytes(), 0);
});
