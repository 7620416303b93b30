import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { ActionLogEntry } from "./runtimeActionLogger.ts";
import {
  DEFAULT_RECORDING_INTERVAL_SECONDS,
  defaultGuildSettings,
  normalizeAnalysisMode,
  normalizeRecordingInterval,
  type AnalysisMode,
  type GuildSettings
} from "./settings/guildSettings.ts";
import { safeJsonParse } from "./normalization/valueParsers.ts";
import { nowIso } from "./utils.ts";

const ACTION_LOG_RETENTION_DAYS_DEFAULT = 14;
const ACTION_LOG_PRUNE_EVERY_WRITES_DEFAULT = 250;
const ACTION_CONTENT_MAX_CHARS = 2000;

export type { ActionLogEntry };

export interface ActionLog {
  logAction(entry: ActionLogEntry): void;
}

export type StoredAction = {
  id: number;
  createdAt: string;
  guildId: string | null;
  channelId: string | null;
  userId: string | null;
  kind: string;
  content: string | null;
  metadata: unknown;
};

type StoreOptions = {
  actionLogRetentionDays?: number;
  actionLogPruneEveryWrites?: number;
  defaultRecordingIntervalSeconds?: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readText(row: Record<string, unknown>, key: string) {
  const value = row[key];
  return typeof value === "string" && value ? value : null;
}

function mapActionRow(row: unknown): StoredAction | null {
  if (!isRecord(row)) return null;
  return {
    id: Number(row.id) || 0,
    createdAt: readText(row, "created_at") ?? "",
    guildId: readText(row, "guild_id"),
    channelId: readText(row, "channel_id"),
    userId: readText(row, "user_id"),
    kind: readText(row, "kind") ?? "",
    content: readText(row, "content"),
    metadata: safeJsonParse(row.metadata, null)
  };
}

export class Store {
  dbPath: string;
  db: Database.Database | null;
  onActionLogged: ((action: ActionLogEntry) => void) | null;
  actionLogRetentionDays: number;
  actionLogPruneEveryWrites: number;
  actionWritesSincePrune: number;
  defaultRecordingIntervalSeconds: number;

  constructor(
    dbPath: string,
    {
      actionLogRetentionDays = ACTION_LOG_RETENTION_DAYS_DEFAULT,
      actionLogPruneEveryWrites = ACTION_LOG_PRUNE_EVERY_WRITES_DEFAULT,
      defaultRecordingIntervalSeconds = DEFAULT_RECORDING_INTERVAL_SECONDS
    }: StoreOptions = {}
  ) {
    this.dbPath = dbPath;
    this.db = null;
    this.onActionLogged = null;
    this.actionLogRetentionDays = Math.max(1, Math.floor(actionLogRetentionDays));
    this.actionLogPruneEveryWrites = Math.max(1, Math.floor(actionLogPruneEveryWrites));
    this.actionWritesSincePrune = 0;
    this.defaultRecordingIntervalSeconds = normalizeRecordingInterval(defaultRecordingIntervalSeconds);
  }

  init() {
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");

    db.exec(`
      CREATE TABLE IF NOT EXISTS guild_settings (
        guild_id TEXT PRIMARY KEY,
        api_key TEXT,
        analysis_mode TEXT NOT NULL DEFAULT 'debate',
        recording_interval INTEGER NOT NULL DEFAULT 300,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS actions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        created_at TEXT NOT NULL,
        guild_id TEXT,
        channel_id TEXT,
        user_id TEXT,
        kind TEXT NOT NULL,
        content TEXT,
        metadata TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_actions_kind_time ON actions(kind, created_at);
      CREATE INDEX IF NOT EXISTS idx_actions_guild_time ON actions(guild_id, created_at);
    `);

    this.db = db;
  }

  close() {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  requireDb() {
    if (!this.db) {
      throw new Error("Store is not initialized. Call init() first.");
    }
    return this.db;
  }

  getGuildSettings(guildId: string): GuildSettings {
    const row = this.requireDb()
      .prepare("SELECT guild_id, api_key, analysis_mode, recording_interval FROM guild_settings WHERE guild_id = ?")
      .get(String(guildId));

    if (!isRecord(row)) {
      return defaultGuildSettings(String(guildId), this.defaultRecordingIntervalSeconds);
    }

    return {
      guildId: String(guildId),
      analysisMode: normalizeAnalysisMode(row.analysis_mode),
      recordingIntervalSeconds: normalizeRecordingInterval(row.recording_interval),
      apiKey: readText(row, "api_key")
    };
  }

  setAnalysisMode(guildId: string, mode: AnalysisMode) {
    this.upsertGuildSettings(guildId, { analysisMode: mode });
    return this.getGuildSettings(guildId);
  }

  setRecordingInterval(guildId: string, seconds: number) {
    this.upsertGuildSettings(guildId, { recordingIntervalSeconds: normalizeRecordingInterval(seconds) });
    return this.getGuildSettings(guildId);
  }

  setApiKey(guildId: string, apiKey: string | null) {
    const normalized = String(apiKey ?? "").trim();
    this.upsertGuildSettings(guildId, { apiKey: normalized || null });
    return this.getGuildSettings(guildId);
  }

  upsertGuildSettings(guildId: string, patch: Partial<Omit<GuildSettings, "guildId">>) {
    const current = this.getGuildSettings(guildId);
    const next: GuildSettings = { ...current, ...patch, guildId: current.guildId };
    this.requireDb()
      .prepare(
        `INSERT INTO guild_settings(guild_id, api_key, analysis_mode, recording_interval, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(guild_id) DO UPDATE SET
           api_key = excluded.api_key,
           analysis_mode = excluded.analysis_mode,
           recording_interval = excluded.recording_interval,
           updated_at = excluded.updated_at`
      )
      .run(next.guildId, next.apiKey, next.analysisMode, next.recordingIntervalSeconds, nowIso());
  }

  logAction(action: ActionLogEntry) {
    const metadata = action.metadata ? JSON.stringify(action.metadata) : null;
    const createdAt = nowIso();
    const actionKind = String(action.kind);

    this.requireDb()
      .prepare(
        `INSERT INTO actions(created_at, guild_id, channel_id, user_id, kind, content, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        createdAt,
        action.guildId ? String(action.guildId) : null,
        action.channelId ? String(action.channelId) : null,
        action.userId ? String(action.userId) : null,
        actionKind,
        action.content ? String(action.content).slice(0, ACTION_CONTENT_MAX_CHARS) : null,
        metadata
      );

    this.actionWritesSincePrune += 1;
    if (this.actionWritesSincePrune >= this.actionLogPruneEveryWrites) {
      this.actionWritesSincePrune = 0;
      this.pruneActionLog({ now: createdAt });
    }

    if (this.onActionLogged) {
      const listener = this.onActionLogged;
      const loggedAction = { ...action, kind: actionKind, createdAt };
      queueMicrotask(() => {
        try {
          listener(loggedAction);
        } catch (error) {
          process.stderr.write(`action listener failed: ${String(error)}\n`);
        }
      });
    }
  }

  pruneActionLog({ now = nowIso() }: { now?: string } = {}) {
    const nowMs = Date.parse(now);
    const baseMs = Number.isFinite(nowMs) ? nowMs : Date.now();
    const cutoffIso = new Date(baseMs - this.actionLogRetentionDays * 24 * 60 * 60 * 1000).toISOString();
    const result = this.requireDb().prepare("DELETE FROM actions WHERE created_at < ?").run(cutoffIso);
    return { deletedActions: result.changes };
  }

  countActionsSince(kind: string, sinceIso: string) {
    const row = this.requireDb()
      .prepare("SELECT COUNT(*) AS count FROM actions WHERE kind = ? AND created_at >= ?")
      .get(String(kind), String(sinceIso));
    return isRecord(row) ? Number(row.count ?? 0) : 0;
  }

  getRecentActions(limit = 50, { guildId = null }: { guildId?: string | null } = {}) {
    const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit) || 50));
    const db = this.requireDb();
    const rows = guildId
      ? db
          .prepare("SELECT * FROM actions WHERE guild_id = ? ORDER BY id DESC LIMIT ?")
          .all(String(guildId), boundedLimit)
      : db.prepare("SELECT * FROM actions ORDER BY id DESC LIMIT ?").all(boundedLimit);

    const actions: StoredAction[] = [];
    for (const row of rows) {
      const mapped = mapActionRow(row);
      if (mapped) actions.push(mapped);
    }
    return actions;
  }
}
