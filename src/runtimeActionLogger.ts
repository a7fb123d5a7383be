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
const SENSITIVE_KEY_PATTERN =
  /(api[-_]?key|token|secret|authorization|password|cookie|bearer|private[-_]?key)/i;

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
const BG_BLUE = "\x1b[44m";

type AgentName = "voice" | "bot" | "llm" | "speech" | "runtime";

const AGENT_STYLES: Record<AgentName, { bg: string; fg: string }> = {
  voice: { bg: BG_CYAN, fg: BLACK },
  bot: { bg: BG_GREEN, fg: BLACK },
  llm: { bg: BG_MAGENTA, fg: BLACK },
  speech: { bg: BG_BLUE, fg: WHITE },
  runtime: { bg: `\x1b[100m`, fg: WHITE } // bright-black bg
};

export type ActionLogEntry = {
  kind: string;
  guildId?: string | null;
  channelId?: string | null;
  messageId?: string | null;
  userId?: string | null;
  content?: string | null;
  metadata?: Record<string, unknown> | null;
  usdCost?: number;
  createdAt?: string;
};

export interface ActionLog {
  logAction(action: ActionLogEntry): void;
}

export type SanitizedValue =
  | string
  | number
  | boolean
  | null
  | SanitizedValue[]
  | { [key: string]: SanitizedValue };

export type RuntimeActionEvent = {
  ts: string;
  source: "store_action";
  level: "info" | "error";
  kind: string;
  event: string;
  agent: string;
  guild_id: string | null;
  channel_id: string | null;
  message_id: string | null;
  user_id: string | null;
  usd_cost: number;
  content: string | null;
  metadata: SanitizedValue;
};

function isAgentName(value: string): value is AgentName {
  return Object.hasOwn(AGENT_STYLES, value);
}

function formatAgentBadge(agent: string) {
  const style = isAgentName(agent) ? AGENT_STYLES[agent] : AGENT_STYLES.runtime;
  const label = ` ${(agent || "runtime").padEnd(10)} `;
  return `${style.bg}${style.fg}${BOLD}${label}${RESET}`;
}

function formatMetadataInline(metadata: SanitizedValue) {
  if (!metadata || typeof metadata !== "object" || Array.isArray(metadata)) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(metadata)) {
    if (v === null || v === undefined) continue;
    const val = typeof v === "object" ? JSON.stringify(v) : String(v);
    if (val.length > 80) continue; // skip bulky values
    parts.push(`${DIM}${k}${RESET}${DIM}=${RESET}${val}`);
  }
  return parts.length > 0 ? `  ${parts.join("  ")}` : "";
}

export function formatPrettyLine(payload: RuntimeActionEvent) {
  const time = (payload.ts || "").slice(11, 19); // HH:MM:SS
  const isError = payload.level === "error";

  const timePart = `${DIM}${time}${RESET}`;
  const agentPart = formatAgentBadge(payload.agent);
  const eventText = payload.event || payload.kind || "?";
  const eventPart = isError
    ? `${BG_RED}${WHITE}${BOLD} ${eventText} ${RESET}`
    : `${BOLD}${WHITE}${eventText}${RESET}`;
  const metaPart = formatMetadataInline(payload.metadata);

  return `${timePart} ${agentPart} ${eventPart}${metaPart}\n`;
}

function truncateString(value: unknown, maxLength = MAX_STRING_LENGTH) {
  const text = String(value ?? "");
  if (!text) return "";
  if (text.length <= maxLength) return text;
  const sliceLength = Math.max(0, maxLength - 1);
  return `${text.slice(0, sliceLength)}…`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  if (Array.isArray(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

type SanitizeOptions = {
  depth?: number;
  keyName?: string;
  seen?: WeakSet<object>;
};

function sanitizeValue(value: unknown, { depth = 0, keyName = "", seen = new WeakSet() }: SanitizeOptions = {}): SanitizedValue {
  if (keyName && SENSITIVE_KEY_PATTERN.test(keyName)) {
    return REDACTED_VALUE;
  }

  if (value === null || value === undefined) return null;

  if (typeof value === "string") {
    return truncateString(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "function" || typeof value === "symbol") {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: truncateString(value.name || "Error", 120),
      message: truncateString(value.message || "", 300),
      stack: truncateString(value.stack || "", 3_000)
    };
  }

  if (Buffer.isBuffer(value)) {
    return `[BUFFER ${value.length} bytes]`;
  }

  if (depth >= MAX_DEPTH) {
    return OMISSION_VALUE;
  }

  if (Array.isArray(value)) {
    const output: SanitizedValue[] = [];
    const boundedLength = Math.min(value.length, MAX_ARRAY_LENGTH);
    for (let i = 0; i < boundedLength; i += 1) {
      output.push(
        sanitizeValue(value[i], {
          depth: depth + 1,
          keyName,
          seen
        })
      );
    }
    if (value.length > MAX_ARRAY_LENGTH) {
      output.push(TRUNCATED_VALUE);
    }
    return output;
  }

  if (!isPlainObject(value)) {
    return truncateString(value);
  }

  if (seen.has(value)) {
    return CIRCULAR_VALUE;
  }
  seen.add(value);

  const output: { [key: string]: SanitizedValue } = {};
  const entries = Object.entries(value);
  const boundedLength = Math.min(entries.length, MAX_OBJECT_KEYS);
  for (let i = 0; i < boundedLength; i += 1) {
    const [entryKey, entryValue] = entries[i];
    output[entryKey] = sanitizeValue(entryValue, {
      depth: depth + 1,
      keyName: entryKey,
      seen
    });
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

function normalizeLevel(kind: string) {
  return kind.toLowerCase().includes("error") ? "error" : "info";
}

function resolveAgent(kind: string, metadata: unknown) {
  if (isPlainObject(metadata)) {
    const explicitAgent = normalizeIdentifier(metadata.agent, 80);
    if (explicitAgent) return explicitAgent;
  }

  if (kind.startsWith("voice_")) return "voice";
  if (kind.startsWith("llm_")) return "llm";
  if (kind.startsWith("asr_") || kind.startsWith("tts_")) return "speech";
  if (kind.startsWith("bot_")) return "bot";
  return "runtime";
}

export function normalizeRuntimeActionEvent(action: Partial<ActionLogEntry> | null | undefined): RuntimeActionEvent {
  const normalizedAction = action ?? {};
  const kind = normalizeIdentifier(normalizedAction.kind, 120) || "bot_runtime";
  const event = normalizeIdentifier(normalizedAction.content, 180) || kind;

  return {
    ts: normalizeIdentifier(normalizedAction.createdAt, 40) || nowIso(),
    source: "store_action",
    level: normalizeLevel(kind),
    kind,
    event,
    agent: resolveAgent(kind, normalizedAction.metadata),
    guild_id: normalizeIdentifier(normalizedAction.guildId, 80),
    channel_id: normalizeIdentifier(normalizedAction.channelId, 80),
    message_id: normalizeIdentifier(normalizedAction.messageId, 80),
    user_id: normalizeIdentifier(normalizedAction.userId, 80),
    usd_cost: Number(normalizedAction.usdCost) || 0,
    content: normalizeIdentifier(normalizedAction.content, MAX_STRING_LENGTH),
    metadata: sanitizeValue(normalizedAction.metadata, { keyName: "metadata" })
  };
}

function resolveLogFilePath(value: unknown) {
  const normalized = String(value || "").trim();
  if (!normalized) return "";
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

type RuntimeActionLoggerOptions = {
  enabled?: boolean;
  writeToStdout?: boolean;
  logFilePath?: string;
  writeLine?: ((line: string, payload: RuntimeActionEvent) => void) | null;
};

export type ActionListenerHost = {
  onActionLogged: ((action: ActionLogEntry) => void) | null;
};

export class RuntimeActionLogger {
  enabled: boolean;
  writeToStdout: boolean;
  writeLine: ((line: string, payload: RuntimeActionEvent) => void) | null;
  logFilePath: string;
  fileStream: fs.WriteStream | null;

  constructor({ enabled = true, writeToStdout = true, logFilePath = "", writeLine = null }: RuntimeActionLoggerOptions = {}) {
    this.enabled = Boolean(enabled);
    this.writeToStdout = Boolean(writeToStdout);
    this.writeLine = writeLine;
    this.logFilePath = resolveLogFilePath(logFilePath);
    this.fileStream = null;

    if (this.enabled && this.logFilePath) {
      fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      this.fileStream = fs.createWriteStream(this.logFilePath, {
        flags: "a",
        encoding: "utf8"
      });
      this.fileStream.on("error", () => {
        this.fileStream = null;
      });
    }
  }

  attachToStore(store: ActionListenerHost) {
    const previousActionListener = store.onActionLogged;

    store.onActionLogged = (action) => {
      if (previousActionListener) {
        try {
          previousActionListener(action);
        } catch {
          // keep runtime logger resilient
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
      try {
        this.writeLine(line, payload);
      } catch {
        // in-test sink should never break runtime logging
      }
    }

    if (this.writeToStdout) {
      try {
        process.stdout.write(formatPrettyLine(payload));
      } catch {
        // stdout failures should not interrupt runtime behavior
      }
    }

    if (this.fileStream) {
      try {
        this.fileStream.write(line);
      } catch {
        // file failures should not interrupt runtime behavior
      }
    }
  }

  close() {
    if (!this.fileStream) return;
    this.fileStream.end();
    this.fileStream = null;
  }
}
