import type { Persona } from "../voice/voiceTypes.ts";
import type { JoinResult } from "../voice/voiceRoomManager.ts";

export type VoiceCommandName = "join" | "leave" | "persona" | "personas";

export type VoiceCommand = {
  name: VoiceCommandName;
  args: string;
};

const COMMAND_ALIASES: Record<string, VoiceCommandName> = {
  vjoin: "join",
  join: "join",
  vleave: "leave",
  leave: "leave",
  persona: "persona",
  personas: "personas"
};

export function parseVoiceCommand(content: string, prefix: string): VoiceCommand | null {
  const text = String(content || "").trim();
  if (!prefix || !text.startsWith(prefix)) return null;

  const [head = "", ...rest] = text.slice(prefix.length).trim().split(/\s+/);
  const name = Object.hasOwn(COMMAND_ALIASES, head.toLowerCase()) ? COMMAND_ALIASES[head.toLowerCase()] : null;
  if (!name) return null;
  return { name, args: rest.join(" ") };
}

export function describeJoinResult(result: JoinResult, voiceChannelId: string) {
  switch (result.status) {
    case "joined":
      return `joined <#${voiceChannelId}>.`;
    case "moved":
      return `moved to <#${voiceChannelId}>.`;
    case "already_joined":
      return "already here.";
  }
}

export function formatPersonaList(personas: Persona[], activeId: string) {
  return personas
    .map((persona) => `${persona.id === activeId ? "*" : "-"} \`${persona.id}\` ${persona.name}`)
    .join("\n");
}
