import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { ActionLog, ActionLogEntry } from "./runtimeActionLogger.ts";
import { safeJsonParse } from "./normalization/valueParsers.ts";
import { clamp, nowIso } from "./utils.ts";

const ACTION_LOG_RETENTION_DAYS_DEFAULT = 14;
const ACTION_LOG_RETENTION_DAYS_MIN = 1;
const ACTION_LOG_RETENTION_DAYS_MAX = 3650;
const ACTION_LOG_MAX_ROWS_DEFAULT = 120_000;
const ACTION_LOG_MAX_ROWS_MIN = 1000;
const ACTION_LOG_MAX_ROWS_RUNTIME_MIN = 1;
const ACTION_LOG_MAX_ROWS_MAX = 5_000_000;
const ACTION_LOG_PRUNE_EVERY_WRITES = 250;

type ActionRow = {
  id: number;
  created_at: string;
  guild_id: string | null;
  channel_id: string | null;
  message_id: string | null;
  user_id: string | null;
  kind: string;
  content: string | null;
  metadata: string | null;
  usd_cost: number;
};

export type StoredAction = Omit<ActionRow, "metadata"> & {
  metadata: unknown;
};

type StoreOptions = {
  actionLogRetentionDays?: number;
  actionLogMaxRows?: number;
};

function resolveEnvBoundedInt(rawValue: unknown, fallback: number, min: number, max: number) {
  const parsed = Math.floor(Number(rawValue));
  if (!Number.isFinite(parsed)) return fallback;
  return clamp(parsed, min, max);
}

function mapActionRow(row: ActionRow): StoredAction {
  return {
    ...row,
    metadata: safeJsonParse(row.metadata, null)
  };
}

export class Store implements ActionLog {
  dbPath: string;
  private database: Database.Database | null;
  onActionLogged: ((action: ActionLogEntry) => void) | null;
  actionLogRetentionDays: number;
  actionLogMaxRows: number;
  actionWritesSincePrune: number;

  constructor(dbPath: string, { actionLogRetentionDays, actionLogMaxRows }: StoreOptions = {}) {
    this.dbPath = dbPath;
    this.database = null;
    this.onActionLogged = null;
    this.actionLogRetentionDays = resolveEnvBoundedInt(
      actionLogRetentionDays ?? process.env.ACTION_LOG_RETENTION_DAYS,
      ACTION_LOG_RETENTION_DAYS_DEFAULT,
      ACTION_LOG_RETENTION_DAYS_MIN,
      ACTION_LOG_RETENTION_DAYS_MAX
    );
    this.actionLogMaxRows = resolveEnvBoundedInt(
      actionLogMaxRows ?? process.env.ACTION_LOG_MAX_ROWS,
      ACTION_LOG_MAX_ROWS_DEFAULT,
      ACTION_LOG_MAX_ROWS_MIN,
      ACTION_LOG_MAX_ROWS_MAX
    );
    this.actionWritesSincePrune = 0;
  }

  get db() {
    if (!this.database) {
      throw new Error("Store used before init() or after close().");
    }
    return this.database;
  }

  init() {
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    this.database = new Database(this.dbPath);
    this.database.pragma("journal_mode = WAL");

    this.database.exec(`
      CREATE TABLE IF NOT EXISTS actions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        created_at TEXT NOT NULL,
        guild_id TEXT,
        channel_id TEXT,
        message_id TEXT,
        user_id TEXT,
        kind TEXT NOT NULL,
        content TEXT,
        metadata TEXT,
        usd_cost REAL NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS room_personas (
        guild_id TEXT PRIMARY KEY,
        persona_id TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_actions_kind_time ON actions(kind, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_actions_time ON actions(created_at DESC);
    `);

    this.pruneActionLog({ now: nowIso() });
  }

  logAction(action: ActionLogEntry) {
    const metadata = action.metadata ? JSON.stringify(action.metadata) : null;
    const createdAt = nowIso();
    const actionKind = String(action.kind);

    this.db
      .prepare(
        `INSERT INTO actions(
          created_at,
          guild_id,
          channel_id,
          message_id,
          user_id,
          kind,
          content,
          metadata,
          usd_cost
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        createdAt,
        action.guildId ? String(action.guildId) : null,
        action.channelId ? String(action.channelId) : null,
        action.messageId ? String(action.messageId) : null,
        action.userId ? String(action.userId) : null,
        actionKind,
        action.content ? String(action.content).slice(0, 2000) : null,
        metadata,
        Number(action.usdCost) || 0
      );

    try {
      this.maybePruneActionLog({ now: createdAt });
    } catch {
      // maintenance must never break action writes
    }

    if (this.onActionLogged) {
      const listener = this.onActionLogged;
      const loggedAction = { ...action, kind: actionKind, createdAt };
      queueMicrotask(() => {
        try {
          listener(loggedAction);
        } catch {
          // listener must never break store writes
        }
      });
    }
  }

  maybePruneActionLog({ now = nowIso() } = {}) {
    this.actionWritesSincePrune += 1;
    if (this.actionWritesSincePrune < ACTION_LOG_PRUNE_EVERY_WRITES) return;
    this.actionWritesSincePrune = 0;
    this.pruneActionLog({ now });
  }

  pruneActionLog({
    now = nowIso(),
    maxAgeDays = this.actionLogRetentionDays,
    maxRows = this.actionLogMaxRows
  } = {}) {
    const nowMs = Date.parse(String(now || ""));
    const referenceMs = Number.isFinite(nowMs) ? nowMs : Date.now();
    const boundedMaxAgeDays = clamp(
      Math.floor(Number(maxAgeDays) || this.actionLogRetentionDays),
      ACTION_LOG_RETENTION_DAYS_MIN,
      ACTION_LOG_RETENTION_DAYS_MAX
    );
    const boundedMaxRows = clamp(
      Math.floor(Number(maxRows) || this.actionLogMaxRows),
      ACTION_LOG_MAX_ROWS_RUNTIME_MIN,
      ACTION_LOG_MAX_ROWS_MAX
    );
    const cutoffIso = new Date(referenceMs - boundedMaxAgeDays * 24 * 60 * 60 * 1000).toISOString();

    let deletedActions = this.db.prepare("DELETE FROM actions WHERE created_at < ?").run(cutoffIso).changes;

    const oldestKeptRow = this.db
      .prepare<[number], { id: number }>(
        `SELECT id
         FROM actions
         ORDER BY id DESC
         LIMIT 1 OFFSET ?`
      )
      .get(Math.max(0, boundedMaxRows - 1));
    const oldestKeptId = Number(oldestKeptRow?.id || 0);
    if (Number.isInteger(oldestKeptId) && oldestKeptId > 0) {
      deletedActions += this.db.prepare("DELETE FROM actions WHERE id < ?").run(oldestKeptId).changes;
    }

    return { deletedActions };
  }

  countActionsSince(kind: string, sinceIso: string) {
    const row = this.db
      .prepare<[string, string], { count: number }>(
        "SELECT COUNT(*) AS count FROM actions WHERE kind = ? AND created_at >= ?"
      )
      .get(String(kind), String(sinceIso));
    return Number(row?.count ?? 0);
  }

  getRecentActions(limit = 200) {
    const parsedLimit = Number(limit);
    const boundedLimit = clamp(Number.isFinite(parsedLimit) ? Math.floor(parsedLimit) : 200, 1, 1000);
    const rows = this.db
      .prepare<[number], ActionRow>(
        `SELECT id, created_at, guild_id, channel_id, message_id, user_id, kind, content, metadata, usd_cost
         FROM actions
         ORDER BY id DESC
         LIMIT ?`
      )
      .all(boundedLimit);

    return rows.map(mapActionRow);
  }

  getVoiceSessionEvents(sessionId: string, limit = 500) {
    const sanitized = String(sessionId || "").replace(/[%_\\"]/g, "");
    if (!sanitized) return [];
    const boundedLimit = clamp(Math.floor(Number(limit) || 500), 1, 2000);

    const rows = this.db
      .prepare<[string, number], ActionRow>(
        `SELECT id, created_at, guild_id, channel_id, message_id, user_id, kind, content, metadata, usd_cost
         FROM actions
         WHERE kind LIKE 'voice\\_%' ESCAPE '\\'
           AND metadata LIKE ?
         ORDER BY id ASC
         LIMIT ?`
      )
      .all(`%"sessionId":"${sanitized}"%`, boundedLimit);

    return rows.map(mapActionRow);
  }

  getActivePersonaId(guildId: string) {
    const row = this.db
      .prepare<[string], { persona_id: string }>("SELECT persona_id FROM room_personas WHERE guild_id = ?")
      .get(String(guildId));
    return row?.persona_id ?? null;
  }

  setActivePersonaId(guildId: string, personaId: string) {
    this.db
      .prepare(
        `INSERT INTO room_personas(guild_id, persona_id, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(guild_id) DO UPDATE SET persona_id = excluded.persona_id, updated_at = excluded.updated_at`
      )
      .run(String(guildId), String(personaId), nowIso());
  }

  close() {
    if (this.database) {
      this.database.close();
      this.database = null;
    }
  }
}
