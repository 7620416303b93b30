import { mimeTypeForPath, persistSnapshot, releaseAudioFiles, type PersistedAudioFile } from "../audio/audioFiles.ts";
import type { FlushSnapshot } from "../recording/sessionRecorder.ts";
import type { AnalysisMode } from "../settings/guildSettings.ts";
import type { ActionLog } from "../store.ts";
import { errorMessage } from "../utils.ts";
import { AnalysisRateLimitError, type AnalysisClient, type AnalysisUpload } from "./analysisClient.ts";
import {
  EMPTY_REPORT_FALLBACK,
  RATE_LIMIT_ADVISORY,
  buildErrorNotice,
  buildProgressNotice,
  buildReportHeader,
  buildStarterMessage,
  buildThreadTitle,
  splitReportMessages,
  trimContext,
  type AnalysisTrigger
} from "./reportFormatting.ts";

export type AnalysisResult =
  | { kind: "success"; report: string }
  | { kind: "rate_limited" }
  | { kind: "no_audio" }
  | { kind: "transient_error"; message: string };

export interface ReportPublisher {
  postMessage(channelId: string, text: string): Promise<string>;
  createThread(channelId: string, messageId: string, title: string): Promise<string>;
  sendToThread(threadId: string, text: string): Promise<void>;
}

export type AnalysisPipelineDeps = {
  client: AnalysisClient;
  publisher: ReportPublisher;
  store: ActionLog;
  tempDir: string;
  now?: () => Date;
};

export type AnalysisPipelineInput = {
  guildId: string;
  sessionId: string;
  textChannelId: string;
  snapshot: FlushSnapshot | null;
  sessionStartedAt: number;
  context: string;
  mode: AnalysisMode;
  displayNames: ReadonlyMap<string, string>;
  isFinal: boolean;
  trigger: AnalysisTrigger;
  updateContext: (context: string) => Promise<void> | void;
};

export function resolveSpeakerLabel(displayNames: ReadonlyMap<string, string>, speakerId: string) {
  const name = displayNames.get(speakerId)?.trim();
  return name || `User_${speakerId}`;
}

export async function runAnalysisPipeline(
  deps: AnalysisPipelineDeps,
  input: AnalysisPipelineInput
): Promise<AnalysisResult> {
  const { snapshot } = input;
  if (!snapshot || snapshot.speakers.size === 0) return { kind: "no_audio" };

  const startedAtMs = Date.now();
  const at = deps.now ? deps.now() : new Date();
  let threadId: string | null = null;
  let files: PersistedAudioFile[] = [];
  const uploads: AnalysisUpload[] = [];
  let result: AnalysisResult = { kind: "no_audio" };

  try {
    files = await persistSnapshot({
      tempDir: deps.tempDir,
      sessionId: input.sessionId,
      sessionStartedAt: input.sessionStartedAt,
      snapshot,
      store: deps.store,
      guildId: input.guildId
    });

    for (const file of files) {
      const label = resolveSpeakerLabel(input.displayNames, file.speakerId);
      try {
        uploads.push(
          await deps.client.uploadAudio({ label, path: file.path, mimeType: mimeTypeForPath(file.path) })
        );
      } catch (error) {
        deps.store.logAction({
          kind: "analysis_error",
          guildId: input.guildId,
          userId: file.speakerId,
          content: `upload_failed: ${errorMessage(error)}`,
          metadata: { sessionId: input.sessionId, label, rateLimited: error instanceof AnalysisRateLimitError }
        });
      }
    }

    if (uploads.length > 0) {
      threadId = await openReportThread(deps, input, at);
      result = await requestAnalysis(deps, input, uploads);
    }
  } catch (error) {
    result = { kind: "transient_error", message: errorMessage(error) };
  } finally {
    await deleteRemoteUploads(deps, input, uploads);
    await releaseAudioFiles({ files, store: deps.store, guildId: input.guildId });
  }

  if (result.kind === "success") {
    try {
      await input.updateContext(trimContext(result.report));
    } catch (error) {
      deps.store.logAction({
        kind: "analysis_error",
        guildId: input.guildId,
        content: `context_update_failed: ${errorMessage(error)}`,
        metadata: { sessionId: input.sessionId }
      });
    }
  }

  const publishText = resolvePublishText(result);
  const published = publishText ? await publishReport(deps, input, { at, threadId, body: publishText }) : false;

  deps.store.logAction({
    kind: resultLogKind(result),
    guildId: input.guildId,
    channelId: input.textChannelId,
    content: `analysis_${result.kind}`,
    metadata: {
      sessionId: input.sessionId,
      trigger: input.trigger,
      mode: input.mode,
      isFinal: input.isFinal,
      speakerCount: snapshot.speakers.size,
      persistedCount: files.length,
      uploadedCount: uploads.length,
      published,
      durationMs: Date.now() - startedAtMs,
      message: result.kind === "transient_error" ? result.message : null
    }
  });

  return result;
}

async function requestAnalysis(
  deps: AnalysisPipelineDeps,
  input: AnalysisPipelineInput,
  uploads: readonly AnalysisUpload[]
): Promise<AnalysisResult> {
  try {
    const text = await deps.client.analyze({ uploads, mode: input.mode, context: input.context });
    return { kind: "success", report: text.trim() || EMPTY_REPORT_FALLBACK };
  } catch (error) {
    if (error instanceof AnalysisRateLimitError) return { kind: "rate_limited" };
    return { kind: "transient_error", message: errorMessage(error) };
  }
}

function resolvePublishText(result: AnalysisResult) {
  switch (result.kind) {
    case "success":
      return result.report;
    case "rate_limited":
      return RATE_LIMIT_ADVISORY;
    case "transient_error":
      return buildErrorNotice(result.message);
    case "no_audio":
      return null;
  }
}

function resultLogKind(result: AnalysisResult) {
  if (result.kind === "transient_error") return "analysis_error";
  if (result.kind === "rate_limited") return "analysis_rate_limited";
  return "analysis_completed";
}

function logPublishFailure(deps: AnalysisPipelineDeps, input: AnalysisPipelineInput, error: unknown) {
  deps.store.logAction({
    kind: "analysis_error",
    guildId: input.guildId,
    channelId: input.textChannelId,
    content: `publish_failed: ${errorMessage(error)}`,
    metadata: { sessionId: input.sessionId, trigger: input.trigger }
  });
}

// Starter message, thread and progress notice go out before the remote analysis call.
async function openReportThread(deps: AnalysisPipelineDeps, input: AnalysisPipelineInput, at: Date) {
  try {
    const messageId = await deps.publisher.postMessage(
      input.textChannelId,
      buildStarterMessage(input.trigger, at)
    );
    const threadId = await deps.publisher.createThread(
      input.textChannelId,
      messageId,
      buildThreadTitle(input.isFinal, at)
    );
    await deps.publisher.sendToThread(threadId, buildProgressNotice(input.mode));
    return threadId;
  } catch (error) {
    logPublishFailure(deps, input, error);
    return null;
  }
}

async function publishReport(
  deps: AnalysisPipelineDeps,
  input: AnalysisPipelineInput,
  { at, threadId, body }: { at: Date; threadId: string | null; body: string }
) {
  const targetId = threadId ?? (await openReportThread(deps, input, at));
  if (!targetId) return false;
  try {
    for (const message of splitReportMessages(buildReportHeader(input.isFinal), body)) {
      await deps.publisher.sendToThread(targetId, message);
    }
    return true;
  } catch (error) {
    logPublishFailure(deps, input, error);
    return false;
  }
}

async function deleteRemoteUploads(
  deps: AnalysisPipelineDeps,
  input: AnalysisPipelineInput,
  uploads: readonly AnalysisUpload[]
) {
  for (const upload of uploads) {
    try {
      await deps.client.deleteUpload(upload);
    } catch (error) {
      deps.store.logAction({
        kind: "analysis_error",
        guildId: input.guildId,
        content: `remote_cleanup_failed: ${errorMessage(error)}`,
        metadata: { sessionId: input.sessionId, file: upload.name }
      });
    }
  }
}
