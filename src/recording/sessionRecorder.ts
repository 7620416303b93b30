import { SpeakerBuffer } from "./speakerBuffer.ts";

export type FlushSnapshot = {
  flushedAt: number;
  sequence: number;
  speakers: Map<string, readonly Buffer[]>;
};

export type FlushResult =
  | { ok: true; snapshot: FlushSnapshot }
  | { ok: false; reason: "no_audio" };

type SessionRecorderOptions = {
  startedAt?: number;
  now?: () => number;
};

export class SessionRecorder {
  readonly startedAt: number;
  private buffers: Map<string, SpeakerBuffer>;
  private readonly now: () => number;
  private flushCount: number;

  constructor({ startedAt, now = Date.now }: SessionRecorderOptions = {}) {
    this.now = now;
    this.startedAt = startedAt ?? now();
    this.buffers = new Map();
    this.flushCount = 0;
  }

  ingest(speakerId: string, fragment: Buffer) {
    if (!speakerId || !fragment.length) return;
    let buffer = this.buffers.get(speakerId);
    if (!buffer) {
      buffer = new SpeakerBuffer(speakerId, this.now());
      this.buffers.set(speakerId, buffer);
    }
    buffer.append(fragment);
  }

  // Synchronous swap: anything ingested after this returns lands in the next flush.
  flush(): FlushResult {
    const taken = this.buffers;
    this.buffers = new Map();

    const speakers = new Map<string, readonly Buffer[]>();
    for (const [speakerId, buffer] of taken) {
      if (buffer.isEmpty()) continue;
      speakers.set(speakerId, buffer.drain());
    }

    if (speakers.size === 0) return { ok: false, reason: "no_audio" };
    this.flushCount += 1;
    return { ok: true, snapshot: { flushedAt: this.now(), sequence: this.flushCount, speakers } };
  }

  hasData() {
    for (const buffer of this.buffers.values()) {
      if (!buffer.isEmpty()) return true;
    }
    return false;
  }

  speakerCount() {
    return this.buffers.size;
  }

  bufferedBytes() {
    let total = 0;
    for (const buffer of this.buffers.values()) total += buffer.byteLength;
    return total;
  }

  clear() {
    this.buffers = new Map();
  }
}
