import type { BridgeResult, Snapshot } from "@mudprobe/schemas";
import { BridgeTransportError } from "./errors.js";
import { readSnapshot } from "./snapshot.js";

export const DEFAULT_BRIDGE_URL = "http://localhost:3000";
const DEFAULT_TIMEOUT_MS = 10_000;

export interface BridgeClientOptions {
  url?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toBridgeResult(value: unknown): BridgeResult {
  if (!isRecord(value)) return { value };
  const { success, error, ...rest } = value;
  const result: BridgeResult = Object.assign({}, rest);
  if (typeof success === "boolean") result.success = success;
  if (error !== undefined && error !== null) result.error = String(error);
  return result;
}

/**
 * Client for the game's HTTP tool bridge. Every call resolves; transport
 * problems come back as `{ error }` so callers treat them like tool errors.
 */
export class BridgeClient {
  readonly url: string;
  private timeoutMs: number;

  constructor(options: BridgeClientOptions = {}) {
    this.url = options.url ?? DEFAULT_BRIDGE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async callTool(method: string, params: Record<string, unknown> = {}): Promise<BridgeResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ method, params }),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new BridgeTransportError(`Bridge returned HTTP ${response.status} for ${method}`, method);
      }
      const body: unknown = await response.json();
      if (!isRecord(body) || !("result" in body)) {
        throw new BridgeTransportError(`Bridge response for ${method} has no result`, method);
      }
      return toBridgeResult(body.result);
    } catch (err) {
      if (controller.signal.aborted) {
        return { error: `Bridge request ${method} timed out after ${this.timeoutMs}ms` };
      }
      return { error: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timer);
    }
  }

  async observeState(): Promise<Snapshot> {
    return readSnapshot(await this.callTool("observe_game_state"));
  }

  /** An empty command is a status check: the game answers with the prompt. */
  sendCommand(command = ""): Promise<BridgeResult> {
    return this.callTool("send_command", { command });
  }

  waitForOutput(pattern: string, timeoutMs = 5000): Promise<BridgeResult> {
    return this.callTool("wait_for_output", { pattern, timeout_ms: timeoutMs });
  }

  async getRecentOutput(count = 20): Promise<string[]> {
    const result = await this.callTool("get_recent_output", { count });
    if (!Array.isArray(result.lines)) return [];
    return result.lines.filter((line): line is string => typeof line === "string");
  }

  setAutomation(feature: string, enabled: boolean): Promise<BridgeResult> {
    return this.callTool("set_automation", { feature, enabled });
  }
}
