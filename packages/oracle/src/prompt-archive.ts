import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface ArchivedPrompt {
  timestamp: string;
  kind: string;
  context: string;
  text: string;
  length: number;
  lineCount: number;
}

function safeName(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}

function fileStamp(date: Date): string {
  // 20260118_142501_123
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}_${iso.slice(20, 23)}`;
}

/** Writes every prompt sent to the oracle into a directory, one JSON file each. */
export class PromptArchive {
  private dir: string;
  private ready: Promise<void> | undefined;
  private now: () => Date;

  constructor(dir: string, now: () => Date = () => new Date()) {
    this.dir = dir;
    this.now = now;
  }

  async save(kind: string, context: string, text: string): Promise<string> {
    this.ready ??= mkdir(this.dir, { recursive: true }).then(
      () => undefined,
      (err: unknown) => {
        // A failed mkdir is retried on the next save.
        this.ready = undefined;
        throw err;
      }
    );
    await this.ready;

    const at = this.now();
    const safeContext = safeName(context);
    const name = safeContext
      ? `prompt_${safeName(kind)}_${safeContext}_${fileStamp(at)}.json`
      : `prompt_${safeName(kind)}_${fileStamp(at)}.json`;
    const record: ArchivedPrompt = {
      timestamp: at.toISOString(),
      kind,
      context,
      text,
      length: text.length,
      lineCount: text.split("\n").length,
    };
    const path = join(this.dir, name);
    await writeFile(path, JSON.stringify(record, null, 2), "utf-8");
    return path;
  }
}
