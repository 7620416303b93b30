import type { AnalysisResult } from "../analysis/analysisPipeline.ts";
import { NO_AUDIO_NOTICE } from "../analysis/reportFormatting.ts";
import type { ForceAnalysisResult, SessionRuntimeState, StartSessionResult, StopSessionResult } from "../session/sessionManager.ts";
import {
  MAX_RECORDING_INTERVAL_SECONDS,
  MIN_RECORDING_INTERVAL_SECONDS,
  parseAnalysisMode,
  validateRecordingInterval,
  type AnalysisMode,
  type GuildSettings,
  type GuildSettingsProvider
} from "../settings/guildSettings.ts";

export type CommandReply = {
  content: string;
  ephemeral: boolean;
};

export const JOIN_VOICE_FIRST_TEXT = "Join a voice channel before running this command.";
export const ALREADY_RUNNING_TEXT = "An analysis is already running in this server.";
export const NOT_RUNNING_TEXT = "No analysis is running.";
export const NOT_RUNNING_START_FIRST_TEXT = "No analysis is running. Run /analyze_start first.";
export const STOPPING_TEXT = "🔄 Creating the final report and ending the analysis. Please wait...";
export const STOPPED_TEXT = "✅ Analysis ended. Thanks for the discussion!";
export const MANUAL_ANALYSIS_TEXT = "🔄 Manual analysis started...";
export const MISSING_KEY_TEXT =
  "No Gemini API key is configured. Ask an admin to run /settings set_key first.";
export const GUILD_ONLY_TEXT = "This command can only be used inside a server.";

export interface SettingsCommandStore extends GuildSettingsProvider {
  setAnalysisMode(guildId: string, mode: AnalysisMode): GuildSettings;
  setRecordingInterval(guildId: string, seconds: number): GuildSettings;
  setApiKey(guildId: string, apiKey: string | null): GuildSettings;
}

export type SettingsCommandInput =
  | { subcommand: "set_mode"; mode: string | null }
  | { subcommand: "set_interval"; seconds: number | null }
  | { subcommand: "set_key"; key: string | null }
  | { subcommand: "show" };

export type ApiKeySource = "guild" | "global" | "none";

function reply(content: string, ephemeral = false): CommandReply {
  return { content, ephemeral };
}

export function buildStartReply(result: StartSessionResult, voiceChannelName: string): CommandReply {
  if (result.ok) {
    return reply(
      `Started analyzing ${voiceChannelName}. For privacy, let everyone in the channel know that the discussion is being recorded and analyzed.`
    );
  }
  if (result.reason === "missing_api_key") return reply(MISSING_KEY_TEXT, true);
  return reply(ALREADY_RUNNING_TEXT, true);
}

export function buildStopFollowUp(result: StopSessionResult): string {
  if (result.ok) return STOPPED_TEXT;
  if (result.reason === "already_stopping") return "The analysis is already ending.";
  return NOT_RUNNING_TEXT;
}

export function describeAnalysisOutcome(result: ForceAnalysisResult | AnalysisResult): string | null {
  switch (result.kind) {
    case "session_not_found":
      return NOT_RUNNING_START_FIRST_TEXT;
    case "no_audio":
      return NO_AUDIO_NOTICE;
    default:
      return null;
  }
}

export function formatInterval(seconds: number) {
  return `${seconds}s (${(seconds / 60).toFixed(1)} min)`;
}

export function describeApiKeySource(source: ApiKeySource) {
  if (source === "guild") return "set for this server";
  if (source === "global") return "using the bot default";
  return "not configured";
}

export function buildSettingsSummary(
  settings: GuildSettings,
  { apiKeySource, runtimeState }: { apiKeySource: ApiKeySource; runtimeState: SessionRuntimeState | null }
) {
  const lines = [
    `Mode: ${settings.analysisMode}`,
    `Interval: ${formatInterval(settings.recordingIntervalSeconds)}`,
    `API key: ${describeApiKeySource(apiKeySource)}`
  ];
  if (runtimeState) {
    lines.push(
      `Recording: <#${runtimeState.voiceChannelId}> since ${runtimeState.startedAt}`,
      `Analyses completed: ${runtimeState.analysesCompleted}`,
      `Scheduled cycles: ${runtimeState.cyclesCompleted}`,
      `Buffered speakers: ${runtimeState.bufferedSpeakers}`
    );
  } else {
    lines.push("Recording: idle");
  }
  return lines.join("\n");
}

export function resolveApiKeySource(settings: GuildSettings, fallbackApiKey: string): ApiKeySource {
  if (settings.apiKey) return "guild";
  return fallbackApiKey ? "global" : "none";
}

export function applySettingsCommand({
  store,
  guildId,
  input,
  fallbackApiKey = "",
  runtimeState = null
}: {
  store: SettingsCommandStore;
  guildId: string;
  input: SettingsCommandInput;
  fallbackApiKey?: string;
  runtimeState?: SessionRuntimeState | null;
}): CommandReply {
  switch (input.subcommand) {
    case "set_mode": {
      const mode = parseAnalysisMode(input.mode);
      if (!mode) return reply("❌ Mode must be 'debate' or 'summary'.", true);
      store.setAnalysisMode(guildId, mode);
      return reply(`✅ Analysis mode changed to '${mode}'.`);
    }
    case "set_interval": {
      const validation = validateRecordingInterval(input.seconds);
      if (!validation.ok) {
        if (validation.reason === "below_minimum") {
          return reply(`❌ The interval must be at least ${MIN_RECORDING_INTERVAL_SECONDS} seconds.`, true);
        }
        if (validation.reason === "above_maximum") {
          return reply(`❌ The interval must be at most ${MAX_RECORDING_INTERVAL_SECONDS} seconds.`, true);
        }
        return reply("❌ The interval must be a number of seconds.", true);
      }
      const updated = store.setRecordingInterval(guildId, validation.seconds);
      return reply(`✅ Analysis interval changed to ${formatInterval(updated.recordingIntervalSeconds)}.`);
    }
    case "set_key": {
      const updated = store.setApiKey(guildId, input.key);
      return reply(updated.apiKey ? "✅ API key saved for this server." : "✅ API key cleared for this server.", true);
    }
    case "show": {
      const settings = store.getGuildSettings(guildId);
      return reply(
        buildSettingsSummary(settings, {
          apiKeySource: resolveApiKeySource(settings, fallbackApiKey),
          runtimeState
        }),
        true
      );
    }
  }
}
