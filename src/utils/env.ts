import fs from "node:fs";
import path from "node:path";

import { ConfigurationError, getErrorCode } from "../errors.js";

export const ENV_PREFIX = "ABLATIONS_";

let envLoaded = false;

/**
 * Loads `.env.local` from `process.cwd()` once.
 *
 * - Does not override already-set `process.env` values.
 * - Missing file is silently ignored.
 */
export function loadLocalEnv(): void {
  if (envLoaded) {
    return;
  }
  loadEnvFromFile(path.join(process.cwd(), ".env.local"), { override: false });
  envLoaded = true;
}

export function loadEnvFromFile(
  filePath: string,
  { override = false }: { override?: boolean } = {},
): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error: unknown) {
    if (getErrorCode(error) === "ENOENT") {
      return;
    }
    throw error;
  }

  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }
  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  let value = match[2] ?? "";
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1);
  } else if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    value = value.slice(1, -1);
  } else {
    const commentIndex = value.indexOf(" #");
    if (commentIndex >= 0) {
      value = value.slice(0, commentIndex);
    }
    value = value.trim();
  }
  return [key, value];
}

/** Reads `ABLATIONS_<name>`; blank values count as unset. */
export function readPrefixedEnv(name: string): string | undefined {
  const value = process.env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

export function readPrefixedEnvNumber(name: string): number | undefined {
  const raw = readPrefixedEnv(name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got "${raw}".`);
  }
  return parsed;
}

export function readPrefixedEnvFlag(name: string): boolean {
  const raw = readPrefixedEnv(name)?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}
