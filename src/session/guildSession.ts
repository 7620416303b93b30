import { randomUUID } from "node:crypto";
import { resolveSpeakerLabel } from "../analysis/analysisPipeline.ts";
import { CONTEXT_MAX_CHARS, trimContext } from "../analysis/reportFormatting.ts";
import { SessionRecorder } from "../recording/sessionRecorder.ts";
import { ReadWriteLock } from "./readWriteLock.ts";
import type { SessionScheduler } from "./sessionScheduler.ts";

export interface CaptureHandle {
  release(): Promise<void> | void;
}

type GuildSessionOptions = {
  guildId: string;
  textChannelId: string;
  voiceChannelId: string;
  requestedByUserId?: string | null;
  capture?: CaptureHandle | null;
  id?: string;
  startedAt?: number;
  contextMaxChars?: number;
};

export class GuildSession {
  readonly id: string;
  readonly guildId: string;
  readonly textChannelId: string;
  readonly voiceChannelId: string;
  readonly requestedByUserId: string | null;
  readonly startedAt: number;
  readonly recorder: SessionRecorder;
  readonly lock: ReadWriteLock;
  readonly contextMaxChars: number;
  capture: CaptureHandle | null;
  scheduler: SessionScheduler | null;
  analysesCompleted: number;
  private active: boolean;
  private stopping: boolean;
  private context: string;
  private readonly displayNames: Map<string, string>;

  constructor({
    guildId,
    textChannelId,
    voiceChannelId,
    requestedByUserId = null,
    capture = null,
    id = randomUUID(),
    startedAt = Date.now(),
    contextMaxChars = CONTEXT_MAX_CHARS
  }: GuildSessionOptions) {
    this.id = id;
    this.guildId = guildId;
    this.textChannelId = textChannelId;
    this.voiceChannelId = voiceChannelId;
    this.requestedByUserId = requestedByUserId;
    this.startedAt = startedAt;
    this.recorder = new SessionRecorder({ startedAt });
    this.lock = new ReadWriteLock();
    this.contextMaxChars = contextMaxChars;
    this.capture = capture;
    this.scheduler = null;
    this.analysesCompleted = 0;
    this.active = true;
    this.stopping = false;
    this.context = "";
    this.displayNames = new Map();
  }

  // Hot path for ~20 ms capture frames; a plain field read is atomic on the event loop.
  ingest(speakerId: string, fragment: Buffer) {
    if (!this.active) return;
    this.recorder.ingest(speakerId, fragment);
  }

  flush() {
    return this.recorder.flush();
  }

  isActive() {
    return this.lock.read(() => this.active);
  }

  isStopping() {
    return this.lock.read(() => this.stopping);
  }

  beginStop() {
    return this.lock.write(() => {
      if (this.stopping) return false;
      this.stopping = true;
      this.active = false;
      return true;
    });
  }

  readContext() {
    return this.lock.read(() => this.context);
  }

  replaceContext(report: string) {
    return this.lock.write(() => {
      this.context = trimContext(report, this.contextMaxChars);
    });
  }

  registerSpeaker(speakerId: string, displayName: string) {
    const name = displayName.trim();
    return this.lock.write(() => {
      if (!speakerId || !name) return false;
      if (this.displayNames.get(speakerId) === name) return false;
      this.displayNames.set(speakerId, name);
      return true;
    });
  }

  hasSpeaker(speakerId: string) {
    return this.lock.read(() => this.displayNames.has(speakerId));
  }

  resolveDisplayName(speakerId: string) {
    return this.lock.read(() => resolveSpeakerLabel(this.displayNames, speakerId));
  }

  snapshotDisplayNames() {
    return this.lock.read(() => new Map(this.displayNames));
  }

  async releaseCapture() {
    const capture = this.capture;
    this.capture = null;
    if (capture) await capture.release();
  }
}
