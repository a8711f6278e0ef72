import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

export interface ResultTarget {
  dir: string;
  /** Explicit report path; the bug analysis still goes to `dir`. */
  output?: string;
  slug: string;
  /** Unix seconds shared by every file of one run. */
  timestamp: number;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatLocalTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export async function writeReport(report: object, target: ResultTarget): Promise<string> {
  const path = target.output ?? join(target.dir, `test_results_${target.slug}_${target.timestamp}.json`);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(report, null, 2) + "\n", "utf-8");
  return path;
}

export async function writeBugAnalysis(
  analysis: string,
  target: ResultTarget,
  generatedAt: Date = new Date()
): Promise<string> {
  const path = join(target.dir, `bug_analysis_${target.slug}_${target.timestamp}.md`);
  await mkdir(target.dir, { recursive: true });
  const header = `# Bug Analysis: ${target.slug}\n\nGenerated: ${formatLocalTime(generatedAt)}\n\n`;
  await writeFile(path, header + analysis, "utf-8");
  return path;
}
