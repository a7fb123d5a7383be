import test from "node:test";
import assert from "node:assert/strict";
import { describeJoinResult, formatPersonaList, parseVoiceCommand } from "./voiceCommands.ts";
import { BUILTIN_PERSONAS } from "../personas.ts";

test("parseVoiceCommand resolves aliases and keeps the arguments", () => {
  assert.deepEqual(parseVoiceCommand("!vjoin", "!"), { name: "join", args: "" });
  assert.deepEqual(parseVoiceCommand("  !LEAVE now ", "!"), { name: "leave", args: "now" });
  assert.deepEqual(parseVoiceCommand("!persona   pirate", "!"), { name: "persona", args: "pirate" });
  assert.deepEqual(parseVoiceCommand("?personas", "?"), { name: "personas", args: "" });
});

test("parseVoiceCommand ignores other messages", () => {
  assert.equal(parseVoiceCommand("join the call", "!"), null);
  assert.equal(parseVoiceCommand("!dance", "!"), null);
  assert.equal(parseVoiceCommand("!constructor", "!"), null);
  assert.equal(parseVoiceCommand("!", "!"), null);
});

test("describeJoinResult mentions the voice channel", () => {
  assert.equal(describeJoinResult({ status: "joined", sessionId: "s" }, "123"), "joined <#123>.");
  assert.equal(describeJoinResult({ status: "moved", sessionId: "s" }, "456"), "moved to <#456>.");
  assert.equal(describeJoinResult({ status: "already_joined", sessionId: "s" }, "123"), "already here.");
});

test("formatPersonaList marks the active persona", () => {
  const [first, second] = BUILTIN_PERSONAS;
  const lines = formatPersonaList([first, second], second.id).split("\n");

  assert.deepEqual(lines, [`- \`${first.id}\` ${first.name}`, `* \`${second.id}\` ${second.name}`]);
});
