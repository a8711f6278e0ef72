import { readFile, readdir } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { ConfigError } from "./errors.js";

export const FEATURES_DIR = fileURLToPath(new URL("../features/", import.meta.url));

export function slugify(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "-");
}

export async function listBuiltinFeatures(dir = FEATURES_DIR): Promise<string[]> {
  const entries = await readdir(dir);
  return entries.filter((e) => e.endsWith(".md")).map((e) => e.slice(0, -3)).sort();
}

/** Built-in test instructions for a feature, looked up by its slug. */
export async function loadFeatureInstructions(feature: string, dir = FEATURES_DIR): Promise<string> {
  const slug = slugify(feature);
  try {
    return await readFile(join(dir, `${slug}.md`), "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      const known = await listBuiltinFeatures(dir);
      throw new ConfigError(
        `No built-in instructions for "${feature}". Known features: ${known.join(", ") || "none"}. ` +
        "Use the custom command to test anything else."
      );
    }
    throw err;
  }
}

export async function loadGameContext(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read game context ${path}: ${reason}`);
  }
}
