import type { AnalysisMode } from "../settings/guildSettings.ts";
import { formatReportTimestamp } from "../utils.ts";

export const DISCORD_MESSAGE_LIMIT = 2000;
export const REPORT_CHUNK_SIZE = 1900;
export const CONTEXT_MAX_CHARS = 2000;

export const RATE_LIMIT_ADVISORY =
  "⚠️ Analysis request limit (quota) reached. Please wait for the next analysis.";
export const EMPTY_REPORT_FALLBACK = "Could not obtain an analysis result.";
export const NO_AUDIO_NOTICE = "No audio has been recorded since the last analysis.";

export type AnalysisTrigger = "scheduled" | "manual" | "final";

export function buildReportHeader(isFinal: boolean) {
  return isFinal ? "🏁 **Final analysis report**\n" : "📊 **Discussion analysis report**\n";
}

export function buildStarterMessage(trigger: AnalysisTrigger, at: Date) {
  const stamp = formatReportTimestamp(at);
  if (trigger === "final") return `🛑 **Session ended** (${stamp})`;
  if (trigger === "manual") return `⚡ **Manual analysis** (${stamp})`;
  return `📅 **Scheduled analysis** (${stamp})`;
}

export function buildThreadTitle(isFinal: boolean, at: Date) {
  const stamp = formatReportTimestamp(at);
  return isFinal ? `Discussion report (final) ${stamp}` : `Discussion report ${stamp}`;
}

export function buildProgressNotice(mode: AnalysisMode) {
  return `🔄 Analyzing... (Mode: ${mode})`;
}

export function buildErrorNotice(message: string) {
  return `❌ Analysis failed: ${message}`;
}

export function trimContext(report: string, maxChars = CONTEXT_MAX_CHARS) {
  if (report.length <= maxChars) return report;
  let start = report.length - maxChars;
  const code = report.charCodeAt(start);
  // Never start on the low half of a surrogate pair.
  if (code >= 0xdc00 && code <= 0xdfff) start += 1;
  return report.slice(start);
}

export function chunkText(text: string, chunkSize = REPORT_CHUNK_SIZE) {
  const size = Math.max(2, Math.floor(chunkSize));
  const chunks: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    let end = Math.min(text.length, offset + size);
    if (end < text.length) {
      const code = text.charCodeAt(end - 1);
      if (code >= 0xd800 && code <= 0xdbff) end -= 1;
    }
    chunks.push(text.slice(offset, end));
    offset = end;
  }
  return chunks;
}

export function splitReportMessages(
  header: string,
  body: string,
  { limit = DISCORD_MESSAGE_LIMIT, chunkSize = REPORT_CHUNK_SIZE }: { limit?: number; chunkSize?: number } = {}
) {
  if (header.length + body.length < limit) {
    return [`${header}${body}`];
  }
  return [header, ...chunkText(body, chunkSize)];
}
