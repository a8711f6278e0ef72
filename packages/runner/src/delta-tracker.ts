import type { CombatEvent, ErrorRecord, HpChange, MonitoringData, Snapshot } from "@mudprobe/schemas";

export const ERROR_KEYWORDS = ["error", "can't afford", "failed", "invalid"] as const;
/** Output lines scanned per tick. */
export const ERROR_SCAN_LINES = 20;

export interface DeltaSummary {
  hpChange?: HpChange;
  appeared: string[];
  vanished: string[];
  combatEvent?: CombatEvent;
  newErrors: ErrorRecord[];
}

function isErrorLine(line: string): boolean {
  const lower = line.toLowerCase();
  return ERROR_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Fold the difference between two consecutive snapshots into `data`.
 * Cycle and kill counters move by at most one per call, however many
 * monsters came or went.
 */
export function applyDelta(
  previous: Snapshot,
  current: Snapshot,
  recentOutput: string[],
  elapsedSeconds: number,
  data: MonitoringData
): DeltaSummary {
  const summary: DeltaSummary = { appeared: [], vanished: [], newErrors: [] };

  if (current.character.hp !== previous.character.hp) {
    const change: HpChange = {
      time: elapsedSeconds,
      from: previous.character.hp,
      to: current.character.hp,
      percent: current.character.hpPercent,
    };
    data.hpChanges.push(change);
    summary.hpChange = change;
  }

  const before = new Set(previous.location.monsters);
  const after = new Set(current.location.monsters);
  summary.appeared = [...after].filter((id) => !before.has(id));
  summary.vanished = [...before].filter((id) => !after.has(id));
  if (summary.appeared.length > 0) data.cycles += 1;
  if (summary.vanished.length > 0) data.monstersKilled += 1;

  if (current.combat.inCombat) {
    const event: CombatEvent = {
      time: elapsedSeconds,
      target: current.combat.targetedMonster,
      hp: current.character.hp,
      hpPercent: current.character.hpPercent,
    };
    data.combatEvents.push(event);
    summary.combatEvent = event;
  }

  const seen = new Set(data.errors.map((e) => e.message));
  for (const line of recentOutput.slice(-ERROR_SCAN_LINES)) {
    if (!isErrorLine(line) || seen.has(line)) continue;
    seen.add(line);
    const record: ErrorRecord = { time: elapsedSeconds, message: line };
    data.errors.push(record);
    data.issues.push(`[${elapsedSeconds}s] ERROR: ${line.slice(0, 60)}...`);
    summary.newErrors.push(record);
  }

  return summary;
}
