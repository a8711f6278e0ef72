import type { MonitoringData, RunStats } from "@mudprobe/schemas";

export interface Verdict {
  passed: boolean;
  failureReason: string | null;
}

/**
 * Any intervention fails the run: the automation should have coped alone.
 * Interventions outrank issues when naming the reason.
 */
export function computeVerdict(data: MonitoringData): Verdict {
  const interventions = data.interventions.length;
  const issues = data.issues.length;
  if (interventions === 0 && issues === 0) return { passed: true, failureReason: null };
  return {
    passed: false,
    failureReason: interventions > 0
      ? `${interventions} oracle intervention(s) required`
      : `${issues} issue(s) detected`,
  };
}

export function buildStats(data: MonitoringData): RunStats {
  return {
    cycles: data.cycles,
    kills: data.monstersKilled,
    combatEvents: data.combatEvents.length,
    hpChanges: data.hpChanges.length,
    errors: data.errors.length,
    decisions: data.decisions.length,
    interventions: data.interventions.length,
  };
}

export function buildFailureDescription(feature: string, data: MonitoringData): string {
  const parts: string[] = [];
  if (data.interventions.length > 0) {
    parts.push(`${data.interventions.length} oracle intervention(s) required during ${feature} test`);
    for (const i of data.interventions) {
      parts.push(`  - [${i.time}s] ${i.reason}: ${i.action.slice(0, 100)}`);
    }
  }
  if (data.issues.length > 0) {
    parts.push(`${data.issues.length} issue(s) detected during test`);
  }
  return parts.join("\n");
}

export function buildAnalysisContext(durationSeconds: number, data: MonitoringData): Record<string, unknown> {
  return {
    test_duration: durationSeconds,
    interventions: data.interventions,
    issues: data.issues,
    cycles: data.cycles,
    kills: data.monstersKilled,
    combat_events: data.combatEvents.slice(-10),
    hp_changes: data.hpChanges.slice(-10),
    errors: data.errors,
    decisions: data.decisions,
  };
}
