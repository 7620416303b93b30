import { clamp } from "../utils.ts";

export const ANALYSIS_MODES = ["debate", "summary"] as const;
export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

export const DEFAULT_ANALYSIS_MODE: AnalysisMode = "debate";
export const DEFAULT_RECORDING_INTERVAL_SECONDS = 300;
export const MIN_RECORDING_INTERVAL_SECONDS = 60;
export const MAX_RECORDING_INTERVAL_SECONDS = 3600;

export type GuildSettings = {
  guildId: string;
  analysisMode: AnalysisMode;
  recordingIntervalSeconds: number;
  apiKey: string | null;
};

export interface GuildSettingsProvider {
  getGuildSettings(guildId: string): GuildSettings;
}

export function defaultGuildSettings(
  guildId: string,
  recordingIntervalSeconds = DEFAULT_RECORDING_INTERVAL_SECONDS
): GuildSettings {
  return {
    guildId,
    analysisMode: DEFAULT_ANALYSIS_MODE,
    recordingIntervalSeconds,
    apiKey: null
  };
}

export function parseAnalysisMode(value: unknown): AnalysisMode | null {
  const normalized = String(value || "")
    .trim()
    .toLowerCase();
  return ANALYSIS_MODES.find((mode) => mode === normalized) ?? null;
}

export function normalizeAnalysisMode(value: unknown): AnalysisMode {
  return parseAnalysisMode(value) ?? DEFAULT_ANALYSIS_MODE;
}

export function normalizeRecordingInterval(value: unknown) {
  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed)) return DEFAULT_RECORDING_INTERVAL_SECONDS;
  return clamp(parsed, MIN_RECORDING_INTERVAL_SECONDS, MAX_RECORDING_INTERVAL_SECONDS);
}

export type IntervalValidation =
  | { ok: true; seconds: number }
  | { ok: false; reason: "not_a_number" | "below_minimum" | "above_maximum" };

export function validateRecordingInterval(value: unknown): IntervalValidation {
  if (value === null || value === undefined || String(value).trim() === "") {
    return { ok: false, reason: "not_a_number" };
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return { ok: false, reason: "not_a_number" };
  const seconds = Math.floor(parsed);
  if (seconds < MIN_RECORDING_INTERVAL_SECONDS) return { ok: false, reason: "below_minimum" };
  if (seconds > MAX_RECORDING_INTERVAL_SECONDS) return { ok: false, reason: "above_maximum" };
  return { ok: true, seconds };
}
