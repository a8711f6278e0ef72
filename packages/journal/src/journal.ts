import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@mudprobe/schemas";
import { validateJournalEventData } from "@mudprobe/schemas";
import { redactPayload } from "./redact.js";

export interface JournalOptions {
  fsync?: boolean;
  redact?: boolean;
  /** Hold an advisory lockfile so two runs never interleave writes. Default: true */
  lock?: boolean;
  /** "truncate" (default) drops a broken tail on init; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL log of run events. Each line carries the SHA-256 of the
 * previous line, so any edit after the fact breaks the chain.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private runIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.redact = options?.redact ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);

    let validCount = lines.length;
    let prevHash: string | undefined;
    let maxSeq = -1;
    const index = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      let event: JournalEvent;
      try {
        event = JSON.parse(line) as JournalEvent;
      } catch {
        // A torn write from a crash can only be the last line.
        if (this.recovery === "strict" || i !== lines.length - 1) {
          throw new Error(`Journal line ${i} is not valid JSON`);
        }
        validCount = i;
        break;
      }
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        validCount = i;
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    if (validCount < lines.length) {
      const kept = lines.slice(0, validCount);
      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, kept.length > 0 ? kept.join("\n") + "\n" : "", "utf-8");
      await rename(tmpPath, this.filePath);
      console.error(`[journal] truncated ${lines.length - validCount} unreadable event(s) from ${this.filePath}`);
    }

    this.runIndex = index;
    this.nextSeq = maxSeq + 1;
    this.lastHash = validCount > 0 ? prevHash : undefined;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const body = this.redact ? redactPayload(payload) : payload;
      const seq = this.nextSeq;

      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: runId,
        type,
        payload: isRecord(body) ? body : {},
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance in-memory state once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;

      const bucket = this.runIndex.get(runId);
      if (bucket) bucket.push(event);
      else this.runIndex.set(runId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`[journal] listener failed on ${event.type}:`, err);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but a failed write is logged and reported as null. */
  async tryEmit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(runId, type, payload);
    } catch (err) {
      console.error(`[journal] failed to record ${type}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSession(runId: string): JournalEvent[] {
    return [...(this.runIndex.get(runId) ?? [])];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number; count: number }> {
    if (!existsSync(this.filePath)) return { valid: true, count: 0 };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      let event: JournalEvent;
      try {
        event = JSON.parse(line) as JournalEvent;
      } catch {
        return { valid: false, brokenAt: i, count: lines.length };
      }
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i, count: lines.length };
      }
      prevHash = this.hash(line);
    }
    return { valid: true, count: lines.length };
  }

  /** Wait for pending writes and release the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.locked) {
      await this.releaseLock();
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(retried = false): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (!isErrno(err) || err.code !== "EEXIST" || retried) throw err;
      const owner = parseInt((await readFile(this.lockPath, "utf-8").catch(() => "")).trim(), 10);
      if (!Number.isNaN(owner) && isProcessAlive(owner)) {
        throw new Error(`Journal is locked by process ${owner} (lockfile: ${this.lockPath})`);
      }
      // Stale lock left behind by a dead process
      await unlink(this.lockPath).catch(() => undefined);
      await this.acquireLock(true);
    }
  }

  private async releaseLock(): Promise<void> {
    await unlink(this.lockPath).catch(() => undefined);
    this.locked = false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrno(err) && err.code === "EPERM";
  }
}
