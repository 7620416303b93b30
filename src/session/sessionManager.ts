import type { AnalysisClient } from "../analysis/analysisClient.ts";
import {
  runAnalysisPipeline,
  type AnalysisResult,
  type ReportPublisher
} from "../analysis/analysisPipeline.ts";
import type { AnalysisTrigger } from "../analysis/reportFormatting.ts";
import type { GuildSettingsProvider } from "../settings/guildSettings.ts";
import type { ActionLog } from "../store.ts";
import { errorMessage } from "../utils.ts";
import { GuildSession, type CaptureHandle } from "./guildSession.ts";
import { SessionRegistry, type CreateSessionResult } from "./sessionRegistry.ts";
import { SessionScheduler } from "./sessionScheduler.ts";

export type CaptureEvents = {
  onFragment: (speakerId: string, fragment: Buffer) => void;
  onSpeakerIdentified: (speakerId: string, displayName: string) => void;
};

export type OpenCapture = (events: CaptureEvents) => Promise<CaptureHandle>;

export type StartSessionRequest = {
  guildId: string;
  textChannelId: string;
  voiceChannelId: string;
  requestedByUserId?: string | null;
  openCapture: OpenCapture;
};

export type StartSessionResult =
  | { ok: true; session: GuildSession }
  | { ok: false; reason: "already_exists" | "missing_api_key" };

export type StopSessionResult =
  | { ok: true; finalResult: AnalysisResult }
  | { ok: false; reason: "session_not_found" | "already_stopping" };

export type ForceAnalysisResult = AnalysisResult | { kind: "session_not_found" };

export type SessionRuntimeState = {
  sessionId: string;
  guildId: string;
  textChannelId: string;
  voiceChannelId: string;
  startedAt: string;
  schedulerState: string;
  cyclesCompleted: number;
  analysesCompleted: number;
  bufferedSpeakers: number;
  bufferedBytes: number;
};

type SessionManagerOptions = {
  store: ActionLog & GuildSettingsProvider;
  publisher: ReportPublisher;
  createAnalysisClient: (apiKey: string) => AnalysisClient;
  fallbackApiKey?: string;
  tempDir: string;
  registry?: SessionRegistry;
  timeUnitMs?: number;
  now?: () => Date;
};

export class SessionManager {
  readonly registry: SessionRegistry;
  private readonly store: ActionLog & GuildSettingsProvider;
  private readonly publisher: ReportPublisher;
  private readonly createAnalysisClient: (apiKey: string) => AnalysisClient;
  private readonly fallbackApiKey: string;
  private readonly tempDir: string;
  private readonly timeUnitMs: number;
  private readonly now: () => Date;

  constructor({
    store,
    publisher,
    createAnalysisClient,
    fallbackApiKey = "",
    tempDir,
    registry = new SessionRegistry(),
    timeUnitMs = 1000,
    now = () => new Date()
  }: SessionManagerOptions) {
    this.store = store;
    this.publisher = publisher;
    this.createAnalysisClient = createAnalysisClient;
    this.fallbackApiKey = fallbackApiKey.trim();
    this.tempDir = tempDir;
    this.registry = registry;
    this.timeUnitMs = timeUnitMs;
    this.now = now;
  }

  getSession(guildId: string) {
    return this.registry.get(guildId);
  }

  hasSession(guildId: string) {
    return this.registry.has(guildId);
  }

  resolveApiKey(guildId: string) {
    return this.store.getGuildSettings(guildId).apiKey || this.fallbackApiKey || null;
  }

  async startSession({
    guildId,
    textChannelId,
    voiceChannelId,
    requestedByUserId = null,
    openCapture
  }: StartSessionRequest): Promise<StartSessionResult> {
    if (!this.resolveApiKey(guildId)) {
      return { ok: false, reason: "missing_api_key" };
    }

    let created: CreateSessionResult;
    try {
      created = await this.registry.createIfAbsent(guildId, () =>
        this.openSession({ guildId, textChannelId, voiceChannelId, requestedByUserId, openCapture })
      );
    } catch (error) {
      this.store.logAction({
        kind: "session_error",
        guildId,
        channelId: textChannelId,
        userId: requestedByUserId,
        content: `session_start_failed: ${errorMessage(error)}`,
        metadata: { voiceChannelId }
      });
      throw error;
    }

    if (!created.created) {
      return { ok: false, reason: created.reason };
    }

    const { session } = created;
    session.scheduler = new SessionScheduler({
      guildId,
      sessionId: session.id,
      getIntervalSeconds: () => this.store.getGuildSettings(guildId).recordingIntervalSeconds,
      isActive: () => session.isActive(),
      runCycle: () => this.runAnalysis(session, "scheduled"),
      store: this.store,
      timeUnitMs: this.timeUnitMs
    });
    session.scheduler.start();

    this.store.logAction({
      kind: "session_start",
      guildId,
      channelId: textChannelId,
      userId: requestedByUserId,
      content: "session_started",
      metadata: {
        sessionId: session.id,
        voiceChannelId,
        intervalSeconds: this.store.getGuildSettings(guildId).recordingIntervalSeconds
      }
    });

    return { ok: true, session };
  }

  private async openSession({
    guildId,
    textChannelId,
    voiceChannelId,
    requestedByUserId,
    openCapture
  }: StartSessionRequest) {
    const session = new GuildSession({ guildId, textChannelId, voiceChannelId, requestedByUserId });
    session.capture = await openCapture({
      onFragment: (speakerId, fragment) => session.ingest(speakerId, fragment),
      onSpeakerIdentified: (speakerId, displayName) => {
        session.registerSpeaker(speakerId, displayName).catch((error: unknown) => {
          this.store.logAction({
            kind: "session_error",
            guildId,
            userId: speakerId,
            content: `speaker_register_failed: ${errorMessage(error)}`,
            metadata: { sessionId: session.id }
          });
        });
      }
    });
    return session;
  }

  async forceAnalysis(guildId: string): Promise<ForceAnalysisResult> {
    const session = this.registry.get(guildId);
    if (!session || !(await session.isActive())) return { kind: "session_not_found" };
    return await this.runAnalysis(session, "manual");
  }

  async stopSession(guildId: string, reason = "command"): Promise<StopSessionResult> {
    const session = this.registry.get(guildId);
    if (!session) return { ok: false, reason: "session_not_found" };
    if (!(await session.beginStop())) return { ok: false, reason: "already_stopping" };

    this.store.logAction({
      kind: "session_stop_requested",
      guildId,
      channelId: session.textChannelId,
      content: "session_stopping",
      metadata: { sessionId: session.id, reason }
    });

    let finalResult: AnalysisResult;
    try {
      await session.scheduler?.stop();
      finalResult = await this.runAnalysis(session, "final");
    } catch (error) {
      finalResult = { kind: "transient_error", message: errorMessage(error) };
      this.store.logAction({
        kind: "session_error",
        guildId,
        channelId: session.textChannelId,
        content: `final_analysis_failed: ${finalResult.message}`,
        metadata: { sessionId: session.id, reason }
      });
    }

    try {
      await session.releaseCapture();
    } catch (error) {
      this.store.logAction({
        kind: "session_error",
        guildId,
        content: `capture_release_failed: ${errorMessage(error)}`,
        metadata: { sessionId: session.id }
      });
    }

    this.registry.remove(guildId, session);
    this.store.logAction({
      kind: "session_stop",
      guildId,
      channelId: session.textChannelId,
      content: "session_stopped",
      metadata: {
        sessionId: session.id,
        reason,
        finalResult: finalResult.kind,
        durationMs: this.now().getTime() - session.startedAt
      }
    });

    return { ok: true, finalResult };
  }

  async stopAll(reason = "shutdown") {
    const results = await Promise.all(
      this.registry.list().map(async (session) => ({
        guildId: session.guildId,
        result: await this.stopSession(session.guildId, reason)
      }))
    );
    return results;
  }

  getRuntimeState(guildId: string): SessionRuntimeState | null {
    const session = this.registry.get(guildId);
    if (!session) return null;
    return {
      sessionId: session.id,
      guildId: session.guildId,
      textChannelId: session.textChannelId,
      voiceChannelId: session.voiceChannelId,
      startedAt: new Date(session.startedAt).toISOString(),
      schedulerState: session.scheduler?.state ?? "idle",
      cyclesCompleted: session.scheduler?.cyclesCompleted ?? 0,
      analysesCompleted: session.analysesCompleted,
      bufferedSpeakers: session.recorder.speakerCount(),
      bufferedBytes: session.recorder.bufferedBytes()
    };
  }

  private async runAnalysis(session: GuildSession, trigger: AnalysisTrigger): Promise<AnalysisResult> {
    // Settings and client are resolved before the flush so a failure leaves the audio buffered.
    const settings = this.store.getGuildSettings(session.guildId);
    const apiKey = settings.apiKey || this.fallbackApiKey;
    const client = apiKey ? this.createAnalysisClient(apiKey) : null;
    const flushed = session.flush();
    if (!flushed.ok) return { kind: "no_audio" };

    if (!client) {
      this.store.logAction({
        kind: "analysis_error",
        guildId: session.guildId,
        content: "missing_api_key",
        metadata: { sessionId: session.id, trigger }
      });
      return { kind: "transient_error", message: "No analysis API key is configured." };
    }

    const result = await runAnalysisPipeline(
      {
        client,
        publisher: this.publisher,
        store: this.store,
        tempDir: this.tempDir,
        now: this.now
      },
      {
        guildId: session.guildId,
        sessionId: session.id,
        textChannelId: session.textChannelId,
        snapshot: flushed.snapshot,
        sessionStartedAt: session.startedAt,
        context: await session.readContext(),
        mode: settings.analysisMode,
        displayNames: await session.snapshotDisplayNames(),
        isFinal: trigger === "final",
        trigger,
        updateContext: (context) => session.replaceContext(context)
      }
    );
    if (result.kind === "success") session.analysesCompleted += 1;
    return result;
  }
}
