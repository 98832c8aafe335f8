import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { serverLog } from "../logger";

/** Parse KEY=VALUE lines. Blank lines and `#` comments are skipped; surrounding quotes are stripped. */
export function parseEnvFile(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const value = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    out[key] = value;
  }
  return out;
}

/**
 * Load .env from the project root into `env` (process.env by default).
 * Variables that are already set win over the file.
 * Returns the keys that were applied.
 */
export function loadEnvFromProject(projectRoot: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = join(projectRoot, ".env");
  if (!existsSync(envPath)) return [];
  try {
    const parsed = parseEnvFile(readFileSync(envPath, "utf-8"));
    const applied: string[] = [];
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key]) continue;
      env[key] = value;
      applied.push(key);
    }
    serverLog.debug({ path: envPath, count: applied.length }, "Loaded .env from project root");
    return applied;
  } catch (err) {
    serverLog.warn({ path: envPath, error: String(err) }, "Could not load .env");
    return [];
  }
}
