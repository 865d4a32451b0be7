import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, toError } from "./errors.js";
import { parseJsonLines } from "./parser.js";
import { AblationSuggestionSchema, type PaperRecord } from "./types.js";

const PAPER_SOURCE_EXTENSIONS = [".tex", ".bib", ".bbl", ".md", ".txt"] as const;

/**
 * Accepts a JSON array, a JSON-encoded array string, or a JSONL string. Anything else is passed
 * through so the array schema reports it.
 */
export function decodeEmbeddedList(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return [];
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    const items: unknown[] = [];
    for (const line of trimmed.split(/\r?\n/u)) {
      if (!line.trim()) {
        continue;
      }
      try {
        items.push(JSON.parse(line));
      } catch {
        return value;
      }
    }
    return items;
  }
}

const DatasetRowSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  paper_title: z.string().default(""),
  paper_abstract: z.string().default(""),
  paper_source: z.string().optional(),
  paper_path: z.string().optional(),
  ablations_in_paper: z.preprocess(decodeEmbeddedList, z.array(AblationSuggestionSchema)).optional(),
  review_text: z.preprocess(decodeEmbeddedList, z.array(z.string())).optional(),
  num_ablation_suggestions: z.number().int().nonnegative().optional(),
});
type DatasetRow = z.infer<typeof DatasetRowSchema>;

/** Concatenates the paper's text files as `<file name="...">` blocks, grouped by extension. */
export async function loadPaperSource(directory: string): Promise<string> {
  let entries: string[];
  try {
    entries = await readdir(directory, { recursive: true });
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read paper directory ${directory}: ${toError(error).message}`, {
      cause: error,
    });
  }
  const sorted = [...entries].map((entry) => entry.split(path.sep).join("/")).sort();
  const blocks: string[] = [];
  for (const extension of PAPER_SOURCE_EXTENSIONS) {
    for (const relativePath of sorted) {
      if (!relativePath.endsWith(extension)) {
        continue;
      }
      const content = await readFile(path.join(directory, relativePath), "utf8");
      blocks.push(`<file name="${relativePath}">\n${content}\n</file>\n`);
    }
  }
  return blocks.join("");
}

async function toPaperRecord(row: DatasetRow, baseDir: string): Promise<PaperRecord> {
  let source = row.paper_source ?? "";
  if (!source && row.paper_path) {
    source = await loadPaperSource(path.resolve(baseDir, row.paper_path));
  }
  return {
    id: row.id,
    title: row.paper_title,
    abstract: row.paper_abstract,
    source,
    ablations: row.ablations_in_paper ?? [],
    reviews: row.review_text ?? [],
    reviewAblationCount: row.num_ablation_suggestions ?? 0,
  };
}

export type LoadPaperRecordsOptions = {
  /** Keep only these ids, in dataset order. */
  readonly ids?: readonly string[];
  readonly limit?: number;
};

/** Reads a JSONL dataset. Any invalid row fails the whole load. */
export async function loadPaperRecords(
  filePath: string,
  options: LoadPaperRecordsOptions = {},
): Promise<PaperRecord[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read dataset ${filePath}: ${toError(error).message}`, { cause: error });
  }
  const { items: rows, errors } = parseJsonLines(text, DatasetRowSchema, { uniqueKey: (row) => row.id });
  const firstError = errors[0];
  if (firstError) {
    throw new ConfigurationError(
      `Dataset ${filePath} line ${firstError.lineNumber} is invalid: ${firstError.message}` +
        (errors.length > 1 ? ` (and ${errors.length - 1} more)` : ""),
    );
  }
  const wanted = options.ids ? new Set(options.ids) : undefined;
  const selected = rows.filter((row) => !wanted || wanted.has(row.id));
  const limited = options.limit !== undefined ? selected.slice(0, options.limit) : selected;
  const baseDir = path.dirname(filePath);
  return Promise.all(limited.map((row) => toPaperRecord(row, baseDir)));
}
