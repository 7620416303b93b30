export function nowIso() {
  return new Date().toISOString();
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

export function shortError(text: unknown, maxLen = 220) {
  return String(text || "unknown error")
    .replace(/\s+/g, " ")
    .slice(0, maxLen);
}

// "2026-03-01 10:11" in local time, used for report titles.
export function formatReportTimestamp(date: Date) {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
