import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { getErrorCode, toError } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import type { LlmTextResult } from "./types.js";

const CachedResponseSchema = z.object({
  text: z.string(),
  costUsd: z.number().nonnegative().default(0),
  model: z.string().default(""),
});
export type CachedResponse = z.infer<typeof CachedResponseSchema>;

/**
 * Raw model responses keyed by record id, stored as `<dir>/<key>.response.json`. Only responses
 * that parsed are stored, so a retry after a malformed answer always samples again.
 */
export class ResponseCache {
  readonly #dir: string;
  readonly #logger: Logger;

  constructor(dir: string, logger: Logger = silentLogger) {
    this.#dir = dir;
    this.#logger = logger;
  }

  pathFor(key: string): string {
    return path.join(this.#dir, `${encodeURIComponent(key)}.response.json`);
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    const filePath = this.pathFor(key);
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error: unknown) {
      if (getErrorCode(error) === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    try {
      const parsed = CachedResponseSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        return parsed.data;
      }
      this.#logger.warn(`Ignoring invalid cached response ${filePath}`);
    } catch (error: unknown) {
      this.#logger.warn(`Ignoring unreadable cached response ${filePath}: ${toError(error).message}`);
    }
    return undefined;
  }

  async put(key: string, result: LlmTextResult): Promise<void> {
    await mkdir(this.#dir, { recursive: true });
    const entry: CachedResponse = { text: result.text, costUsd: result.costUsd, model: result.modelVersion };
    await writeFile(this.pathFor(key), `${JSON.stringify(entry, null, 2)}\n`, "utf8");
  }
}
