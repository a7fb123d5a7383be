import test from "node:test";
import assert from "node:assert/strict";
import { BUILTIN_PERSONAS, PersonaService } from "./personas.ts";

function createPersonaStore(initial: Record<string, string> = {}) {
  const active = new Map(Object.entries(initial));
  return {
    active,
    getActivePersonaId: (guildId: string) => active.get(guildId) ?? null,
    setActivePersonaId: (guildId: string, personaId: string) => {
      active.set(guildId, personaId);
    }
  };
}

test("rooms without a stored choice use the default persona", () => {
  const service = new PersonaService({ store: createPersonaStore() });
  assert.equal(service.getActivePersona("guild-1").id, "default");
});

test("setActivePersona switches one room and ignores unknown ids", () => {
  const store = createPersonaStore();
  const service = new PersonaService({ store });

  assert.equal(service.setActivePersona("guild-1", " Pirate ")?.name, "Captain");
  assert.equal(service.getActivePersona("guild-1").id, "pirate");
  assert.equal(service.getActivePersona("guild-2").id, "default");

  assert.equal(service.setActivePersona("guild-1", "wizard"), null);
  assert.equal(store.active.get("guild-1"), "pirate");
});

test("a stale stored id falls back to the default persona", () => {
  const service = new PersonaService({ store: createPersonaStore({ "guild-1": "retired" }) });
  assert.equal(service.getActivePersona("guild-1").id, "default");
});

test("persona lists must contain the default persona", () => {
  const withoutDefault = BUILTIN_PERSONAS.filter((persona) => persona.id !== "default");
  assert.throws(() => new PersonaService({ store: createPersonaStore(), personas: withoutDefault }), /default/);
  assert.equal(new PersonaService({ store: createPersonaStore() }).listPersonas().length, 6);
});
