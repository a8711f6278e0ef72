import type { MonitoringData } from "@mudprobe/schemas";

export function createMonitoringData(): MonitoringData {
  return {
    cycles: 0,
    monstersKilled: 0,
    combatEvents: [],
    hpChanges: [],
    errors: [],
    interventions: [],
    decisions: [],
    issues: [],
  };
}
