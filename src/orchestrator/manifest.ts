import { mkdir, open, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, getErrorCode, toError } from "../errors.js";
import { formatZodIssues, toJsonLines } from "../parser.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export const MANIFEST_FILE_NAME = "manifest.jsonl";
export const RUN_PARAMETERS_FILE_NAME = "run.json";

/** Settings that shape every output of a run; results are only reused under identical settings. */
export type RunParameters = Readonly<Record<string, string | number | boolean | null>>;

const RunParametersSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const ManifestEntrySchema = z.object({
  id: z.string().min(1),
  status: z.literal("succeeded"),
  completedAt: z.string(),
  output: z.unknown(),
});
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/** Durable record of finished tasks; a record listed here is never run again. */
export interface RunManifest<T> {
  load(): Promise<Map<string, T>>;
  recordSuccess(id: string, output: T): Promise<void>;
}

export type JsonlRunManifestOptions<T> = {
  readonly outputDir: string;
  readonly outputSchema: z.ZodType<T>;
  /** Lines written to `<outputDir>/<id>.jsonl` before the manifest entry. */
  readonly detailLines?: (output: T) => readonly unknown[];
  /** Stored as `<outputDir>/run.json` on first load; a later load with other values fails. */
  readonly parameters?: RunParameters;
  readonly logger?: Logger;
  readonly now?: () => Date;
};

/**
 * Append-only JSONL manifest. Appends are serialized and synced, so a crash loses at most the
 * line being written, which `load` then skips.
 */
export class JsonlRunManifest<T> implements RunManifest<T> {
  readonly path: string;
  readonly #options: JsonlRunManifestOptions<T>;
  readonly #logger: Logger;
  #tail: Promise<void> = Promise.resolve();

  constructor(options: JsonlRunManifestOptions<T>) {
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
    this.path = path.join(options.outputDir, MANIFEST_FILE_NAME);
  }

  detailPath(id: string): string {
    return path.join(this.#options.outputDir, `${id}.jsonl`);
  }

  async load(): Promise<Map<string, T>> {
    if (this.#options.parameters) {
      await this.#claimParameters(this.#options.parameters);
    }
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error: unknown) {
      if (getErrorCode(error) === "ENOENT") {
        return new Map();
      }
      throw error;
    }
    const completed = new Map<string, T>();
    for (const [index, rawLine] of text.split("\n").entries()) {
      const line = rawLine.trim();
      if (!line) {
        continue;
      }
      const entry = this.#parseLine(line);
      if (typeof entry === "string") {
        this.#logger.warn(`${this.path} line ${index + 1} skipped: ${entry}`);
        continue;
      }
      completed.set(entry.id, entry.output);
    }
    return completed;
  }

  recordSuccess(id: string, output: T): Promise<void> {
    const next = this.#tail.then(() => this.#append(id, output));
    // The caller sees a failed write; later writes still run.
    this.#tail = next.catch((error: unknown) => {
      this.#logger.debug(`manifest write for ${id} failed: ${toError(error).message}`);
    });
    return next;
  }

  async #claimParameters(parameters: RunParameters): Promise<void> {
    const filePath = path.join(this.#options.outputDir, RUN_PARAMETERS_FILE_NAME);
    let text: string | undefined;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error: unknown) {
      if (getErrorCode(error) !== "ENOENT") {
        throw error;
      }
    }
    if (text === undefined) {
      await mkdir(this.#options.outputDir, { recursive: true });
      await writeFile(filePath, `${JSON.stringify(parameters, null, 2)}\n`, "utf8");
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error: unknown) {
      throw new ConfigurationError(`${filePath} is not valid JSON: ${toError(error).message}`, { cause: error });
    }
    const stored = RunParametersSchema.safeParse(json);
    if (!stored.success) {
      throw new ConfigurationError(`${filePath} is invalid: ${formatZodIssues(stored.error.issues)}`);
    }
    const keys = [...new Set([...Object.keys(parameters), ...Object.keys(stored.data)])].sort();
    const differences = keys
      .filter((key) => (parameters[key] ?? null) !== (stored.data[key] ?? null))
      .map((key) => `${key} ${JSON.stringify(parameters[key] ?? null)} (stored ${JSON.stringify(stored.data[key] ?? null)})`);
    if (differences.length > 0) {
      throw new ConfigurationError(
        `${this.#options.outputDir} holds results of a run with other settings: ${differences.join(", ")}. ` +
          "Use another output directory.",
      );
    }
  }

  #parseLine(line: string): { readonly id: string; readonly output: T } | string {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error: unknown) {
      return `invalid JSON (${toError(error).message})`;
    }
    const entry = ManifestEntrySchema.safeParse(json);
    if (!entry.success) {
      return formatZodIssues(entry.error.issues);
    }
    const output = this.#options.outputSchema.safeParse(entry.data.output);
    if (!output.success) {
      return `invalid output: ${formatZodIssues(output.error.issues)}`;
    }
    return { id: entry.data.id, output: output.data };
  }

  async #append(id: string, output: T): Promise<void> {
    const { outputDir, detailLines, now } = this.#options;
    await mkdir(outputDir, { recursive: true });
    if (detailLines) {
      await writeFile(this.detailPath(id), `${toJsonLines(detailLines(output))}\n`, "utf8");
    }
    const entry: ManifestEntry = {
      id,
      status: "succeeded",
      completedAt: (now?.() ?? new Date()).toISOString(),
      output,
    };
    const handle = await open(this.path, "a");
    try {
      await handle.appendFile(`${JSON.stringify(entry)}\n`, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
