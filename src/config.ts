import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { parseBooleanFlag, parseNumberOrFallback, parseOptionalString } from "./normalization/valueParsers.ts";
import { normalizeRecordingInterval } from "./settings/guildSettings.ts";

dotenv.config();

export const appConfig = {
  discordToken: process.env.DISCORD_TOKEN ?? "",
  devGuildId: parseOptionalString(process.env.GUILD_ID),
  geminiApiKey: process.env.GOOGLE_API_KEY ?? "",
  geminiModel: parseOptionalString(process.env.GEMINI_MODEL) ?? "gemini-2.0-flash",
  geminiApiBaseUrl: normalizeBaseUrl(process.env.GEMINI_API_BASE_URL),
  tempAudioDir: resolveTempAudioDir(process.env.TEMP_AUDIO_DIR),
  defaultRecordingIntervalSeconds: normalizeRecordingInterval(
    parseNumberOrFallback(process.env.DEFAULT_RECORDING_INTERVAL_SECONDS, 300)
  ),
  dbPath: path.resolve(process.cwd(), parseOptionalString(process.env.DB_PATH) ?? "data/insight.db"),
  runtimeStructuredLogsEnabled: parseBooleanFlag(process.env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
  runtimeStructuredLogsStdout: parseBooleanFlag(process.env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
  runtimeStructuredLogsFilePath:
    process.env.RUNTIME_STRUCTURED_LOGS_FILE_PATH ?? "data/logs/runtime-actions.ndjson"
};

export type AppConfig = typeof appConfig;

export function ensureRuntimeEnv(config: Pick<AppConfig, "discordToken"> = appConfig) {
  if (!config.discordToken) {
    throw new Error("Missing DISCORD_TOKEN in environment.");
  }
}

export function normalizeBaseUrl(value: unknown) {
  const normalized = String(value || "")
    .trim()
    .replace(/\/+$/, "");
  return normalized || "https://generativelanguage.googleapis.com";
}

export function resolveTempAudioDir(value: unknown) {
  const normalized = String(value || "").trim();
  if (!normalized) return path.join(os.tmpdir(), "discussion-insight-audio");
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}
