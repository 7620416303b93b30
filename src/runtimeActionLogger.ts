import fs from "node:fs";
import path from "node:path";
import { nowIso } from "./utils.ts";

const MAX_STRING_LENGTH = 2_000;
const MAX_DEPTH = 6;
const MAX_ARRAY_LENGTH = 80;
const MAX_OBJECT_KEYS = 80;
const REDACTED_VALUE = "[REDACTED]";
const OMISSION_VALUE = "[OMITTED]";
const CIRCULAR_VALUE = "[CIRCULAR]";
const TRUNCATED_VALUE = "[TRUNCATED]";
const SENSITIVE_KEY_PATTERN = /(api[-_]?key|token|secret|authorization|password|cookie|bearer|private[-_]?key)/i;

// ── ANSI helpers ───────────────────────────────────────────────────────
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const WHITE = "\x1b[37m";
const BLACK = "\x1b[30m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_CYAN = "\x1b[46m";
const BG_MAGENTA = "\x1b[45m";
const BG_YELLOW = "\x1b[43m";

type AgentStyle = { bg: string; fg: string };

const AGENT_STYLES: Record<string, AgentStyle> = {
  session: { bg: BG_CYAN, fg: BLACK },
  analysis: { bg: BG_MAGENTA, fg: BLACK },
  capture: { bg: BG_YELLOW, fg: BLACK },
  bot: { bg: BG_GREEN, fg: BLACK },
  runtime: { bg: "\x1b[100m", fg: WHITE }
};

export type SanitizedValue =
  | string
  | number
  | boolean
  | null
  | SanitizedValue[]
  | { [key: string]: SanitizedValue };

export type ActionLogEntry = {
  kind: string;
  content?: string | null;
  guildId?: string | null;
  channelId?: string | null;
  userId?: string | null;
  metadata?: Record<string, unknown> | null;
  createdAt?: string;
};

export type RuntimeActionEvent = {
  ts: string;
  source: "store_action";
  level: "info" | "error";
  kind: string;
  event: string;
  agent: string;
  guild_id: string | null;
  channel_id: string | null;
  user_id: string | null;
  content: string | null;
  metadata: SanitizedValue;
};

export interface ActionLogSource {
  onActionLogged: ((action: ActionLogEntry) => void) | null;
}

function formatAgentBadge(agent: string) {
  const style = AGENT_STYLES[agent] ?? AGENT_STYLES.runtime;
  const label = ` ${agent.padEnd(10)} `;
  return `${style.bg}${style.fg}${BOLD}${label}${RESET}`;
}

function formatMetadataInline(metadata: SanitizedValue) {
  if (!metadata || typeof metadata !== "object" || Array.isArray(metadata)) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null) continue;
    const text = typeof value === "object" ? JSON.stringify(value) : String(value);
    if (text.length > 80) continue;
    parts.push(`${DIM}${key}=${RESET}${text}`);
  }
  return parts.length > 0 ? `  ${parts.join("  ")}` : "";
}

export function formatPrettyLine(payload: RuntimeActionEvent) {
  const time = payload.ts.slice(11, 19);
  const eventPart =
    payload.level === "error"
      ? `${BG_RED}${WHITE}${BOLD} ${payload.event} ${RESET}`
      : `${BOLD}${WHITE}${payload.event}${RESET}`;
  const guildPart = payload.guild_id ? `  ${DIM}guild=${RESET}${payload.guild_id}` : "";
  return `${DIM}${time}${RESET} ${formatAgentBadge(payload.agent)} ${eventPart}${guildPart}${formatMetadataInline(payload.metadata)}\n`;
}

function truncateString(value: unknown, maxLength = MAX_STRING_LENGTH) {
  const text = String(value ?? "");
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

type SanitizeOptions = {
  depth?: number;
  keyName?: string;
  seen?: WeakSet<object>;
};

export function sanitizeValue(value: unknown, { depth = 0, keyName = "", seen = new WeakSet() }: SanitizeOptions = {}): SanitizedValue {
  if (keyName && SENSITIVE_KEY_PATTERN.test(keyName)) return REDACTED_VALUE;
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return truncateString(value);
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value;
  if (typeof value === "bigint") return String(value);
  if (typeof value === "function" || typeof value === "symbol") return null;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      name: truncateString(value.name || "Error", 120),
      message: truncateString(value.message, 300),
      stack: truncateString(value.stack ?? "", 3_000)
    };
  }

  if (depth >= MAX_DEPTH) return OMISSION_VALUE;

  if (Array.isArray(value)) {
    const output = value
      .slice(0, MAX_ARRAY_LENGTH)
      .map((entry) => sanitizeValue(entry, { depth: depth + 1, keyName, seen }));
    if (value.length > MAX_ARRAY_LENGTH) output.push(TRUNCATED_VALUE);
    return output;
  }

  if (!isPlainObject(value)) return truncateString(value);
  if (seen.has(value)) return CIRCULAR_VALUE;
  seen.add(value);

  const output: { [key: string]: SanitizedValue } = {};
  const entries = Object.entries(value);
  for (const [entryKey, entryValue] of entries.slice(0, MAX_OBJECT_KEYS)) {
    output[entryKey] = sanitizeValue(entryValue, { depth: depth + 1, keyName: entryKey, seen });
  }
  if (entries.length > MAX_OBJECT_KEYS) {
    output._truncatedKeys = entries.length - MAX_OBJECT_KEYS;
  }
  seen.delete(value);
  return output;
}

function normalizeIdentifier(value: unknown, maxLength = 120) {
  const normalized = truncateString(value, maxLength).trim();
  return normalized || null;
}

function normalizeLevel(kind: string): RuntimeActionEvent["level"] {
  return kind.toLowerCase().includes("error") ? "error" : "info";
}

function resolveAgent(kind: string, metadata: ActionLogEntry["metadata"]) {
  const explicitAgent = normalizeIdentifier(metadata?.agent, 80);
  if (explicitAgent) return explicitAgent;
  if (kind.startsWith("session_")) return "session";
  if (kind.startsWith("analysis_")) return "analysis";
  if (kind.startsWith("capture_")) return "capture";
  if (kind.startsWith("bot_")) return "bot";
  return "runtime";
}

export function normalizeRuntimeActionEvent(action: ActionLogEntry): RuntimeActionEvent {
  const kind = normalizeIdentifier(action.kind) ?? "bot_runtime";
  return {
    ts: normalizeIdentifier(action.createdAt, 40) ?? nowIso(),
    source: "store_action",
    level: normalizeLevel(kind),
    kind,
    event: normalizeIdentifier(action.content, 180) ?? kind,
    agent: resolveAgent(kind, action.metadata),
    guild_id: normalizeIdentifier(action.guildId, 80),
    channel_id: normalizeIdentifier(action.channelId, 80),
    user_id: normalizeIdentifier(action.userId, 80),
    content: normalizeIdentifier(action.content, MAX_STRING_LENGTH),
    metadata: sanitizeValue(action.metadata, { keyName: "metadata" })
  };
}

function resolveLogFilePath(value: string) {
  const normalized = value.trim();
  if (!normalized) return "";
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

type RuntimeActionLoggerOptions = {
  enabled?: boolean;
  writeToStdout?: boolean;
  logFilePath?: string;
  writeLine?: ((line: string, payload: RuntimeActionEvent) => void) | null;
};

export class RuntimeActionLogger {
  enabled: boolean;
  writeToStdout: boolean;
  writeLine: ((line: string, payload: RuntimeActionEvent) => void) | null;
  logFilePath: string;
  fileStream: fs.WriteStream | null;

  constructor({ enabled = true, writeToStdout = true, logFilePath = "", writeLine = null }: RuntimeActionLoggerOptions = {}) {
    this.enabled = enabled;
    this.writeToStdout = writeToStdout;
    this.writeLine = writeLine;
    this.logFilePath = resolveLogFilePath(logFilePath);
    this.fileStream = null;

    if (this.enabled && this.logFilePath) {
      fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: "a", encoding: "utf8" });
      this.fileStream.on("error", (error) => {
        this.fileStream = null;
        process.stderr.write(`runtime log file disabled: ${error.message}\n`);
      });
    }
  }

  attachToStore(store: ActionLogSource) {
    const previousActionListener = store.onActionLogged;

    store.onActionLogged = (action) => {
      if (previousActionListener) {
        try {
          previousActionListener(action);
        } catch (error) {
          process.stderr.write(`action listener failed: ${String(error)}\n`);
        }
      }
      this.logAction(action);
    };
  }

  logAction(action: ActionLogEntry) {
    if (!this.enabled) return;
    const payload = normalizeRuntimeActionEvent(action);
    const line = `${JSON.stringify(payload)}\n`;

    if (this.writeLine) {
      this.writeLine(line, payload);
    }

    if (this.writeToStdout) {
      process.stdout.write(formatPrettyLine(payload));
    }

    this.fileStream?.write(line);
  }

  close() {
    if (!this.fileStream) return;
    this.fileStream.end();
    this.fileStream = null;
  }
}
