import type { Snapshot } from "@mudprobe/schemas";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(value: unknown, fallback = 0): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function ids(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry === "string") out.push(entry);
    else if (typeof entry === "number") out.push(String(entry));
    else if (isRecord(entry)) {
      // Some bridge builds send monsters as objects
      const id = str(entry.id) ?? str(entry.name);
      if (id !== undefined) out.push(id);
    }
  }
  return out;
}

/**
 * Normalise an `observe_game_state` payload. Missing sections come back
 * zeroed; a payload carrying `error` yields an empty snapshot with it set.
 */
export function readSnapshot(raw: Record<string, unknown>): Snapshot {
  const character = isRecord(raw.character) ? raw.character : {};
  const location = isRecord(raw.location) ? raw.location : {};
  const combat = isRecord(raw.combat) ? raw.combat : {};
  const automation = isRecord(raw.automation) ? raw.automation : {};

  const hp = num(character.hp);
  const maxHp = typeof character.maxHp === "number" ? character.maxHp : undefined;
  const hpPercent = typeof character.hpPercent === "number"
    ? character.hpPercent
    : maxHp !== undefined && maxHp > 0 ? Math.trunc((hp * 100) / maxHp) : 0;

  const error = raw.error === undefined || raw.error === null ? undefined : String(raw.error);
  const name = str(character.name);
  const level = typeof character.level === "number" ? character.level : undefined;
  const roomId = location.roomId === undefined || location.roomId === null ? undefined : String(location.roomId);

  return {
    character: {
      ...(name !== undefined ? { name } : {}),
      ...(level !== undefined ? { level } : {}),
      hp,
      ...(maxHp !== undefined ? { maxHp } : {}),
      hpPercent,
    },
    location: {
      name: str(location.roomName) ?? str(location.name) ?? "",
      ...(roomId !== undefined ? { roomId } : {}),
      exits: ids(location.exits),
      monsters: ids(location.monsters),
      items: ids(location.items),
    },
    combat: {
      inCombat: combat.inCombat === true,
      targetedMonster: str(combat.targetedMonster) ?? null,
    },
    automation: {
      autoGong: automation.autoGong === true,
      autoAttack: automation.autoAttack === true,
      autoShield: automation.autoShield === true,
    },
    ...(error !== undefined ? { error } : {}),
    raw,
  };
}
