import { test } from "node:test";
import assert from "node:assert/strict";
import { ReadWriteLock } from "./readWriteLock.ts";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

async function flushMicrotasks() {
  for (let index = 0; index < 10; index += 1) await Promise.resolve();
}

test("readers share the lock", async () => {
  const lock = new ReadWriteLock();
  const gate = deferred();
  let maxConcurrent = 0;

  const reader = () =>
    lock.read(async () => {
      maxConcurrent = Math.max(maxConcurrent, lock.readers);
      await gate.promise;
    });

  const pending = Promise.all([reader(), reader(), reader()]);
  await flushMicrotasks();
  assert.equal(lock.readers, 3);
  gate.resolve();
  await pending;
  assert.equal(maxConcurrent, 3);
  assert.equal(lock.readers, 0);
});

test("a writer waits for readers and excludes new ones", async () => {
  const lock = new ReadWriteLock();
  const readerGate = deferred();
  const events: string[] = [];

  const firstRead = lock.read(async () => {
    events.push("read1:start");
    await readerGate.promise;
    events.push("read1:end");
  });
  const write = lock.write(() => {
    events.push("write");
  });
  const secondRead = lock.read(() => {
    events.push("read2");
  });

  await flushMicrotasks();
  assert.deepEqual(events, ["read1:start"]);
  assert.equal(lock.pending, 2);

  readerGate.resolve();
  await Promise.all([firstRead, write, secondRead]);
  assert.deepEqual(events, ["read1:start", "read1:end", "write", "read2"]);
});

test("the lock is released when the callback throws", async () => {
  const lock = new ReadWriteLock();
  await assert.rejects(
    () =>
      lock.write(() => {
        throw new Error("boom");
      }),
    /boom/
  );
  assert.equal(lock.writing, false);
  assert.equal(await lock.read(() => "ok"), "ok");
});

test("writers run one at a time in arrival order", async () => {
  const lock = new ReadWriteLock();
  const events: string[] = [];
  await Promise.all(
    [1, 2, 3].map((index) =>
      lock.write(async () => {
        events.push(`start:${index}`);
        await Promise.resolve();
        events.push(`end:${index}`);
      })
    )
  );
  assert.deepEqual(events, ["start:1", "end:1", "start:2", "end:2", "start:3", "end:3"]);
});
