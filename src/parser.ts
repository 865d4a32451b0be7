import type { z } from "zod";

import { MalformedOutputError, type LineError } from "./errors.js";

export type ParseMode = "lenient" | "strict";

export type JsonLinesOptions<T> = {
  /**
   * `lenient` reports bad lines and keeps the rest; `strict` rejects the whole body when any line
   * is bad (sandbox submissions).
   */
  readonly mode?: ParseMode;
  /** Items whose key repeats an earlier item's key are reported and dropped. */
  readonly uniqueKey?: (item: T) => string;
};

export type JsonLinesResult<T> = {
  readonly items: T[];
  readonly errors: LineError[];
};

export type StructuredOutput<T> = {
  readonly discussion: string;
  readonly predictions: T[];
  readonly errors: LineError[];
};

const DISCUSSION_TAG = "discussion";
const PREDICTIONS_TAG = "predictions";
const CODE_FENCE = /^```[A-Za-z0-9_-]*$/u;

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let index = text.indexOf(needle);
  while (index >= 0) {
    count += 1;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

function extractBlock(raw: string, tag: string): string {
  const open = `<${tag}>`;
  const close = `</${tag}>`;
  const count = countOccurrences(raw, open);
  if (count === 0) {
    throw new MalformedOutputError(`Missing ${open} block.`);
  }
  if (count > 1) {
    throw new MalformedOutputError(`Expected exactly one ${open} block, found ${count}.`);
  }
  const start = raw.indexOf(open) + open.length;
  const end = raw.indexOf(close, start);
  if (end < 0) {
    throw new MalformedOutputError(`Unclosed ${open} block.`);
  }
  return raw.slice(start, end);
}

export function formatZodIssues(issues: readonly z.core.$ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function describeLineErrors(errors: readonly LineError[]): string {
  return errors.map((error) => `line ${error.lineNumber}: ${error.message}`).join("\n");
}

export function parseJsonLines<T>(
  text: string,
  schema: z.ZodType<T>,
  options: JsonLinesOptions<T> = {},
): JsonLinesResult<T> {
  const items: T[] = [];
  const errors: LineError[] = [];
  const seenKeys = new Set<string>();
  const lines = text.split(/\r?\n/u);

  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    if (!line || CODE_FENCE.test(line)) {
      continue;
    }
    const lineNumber = index + 1;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push({ lineNumber, line, message: `Invalid JSON: ${message}` });
      continue;
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      errors.push({ lineNumber, line, message: formatZodIssues(parsed.error.issues) });
      continue;
    }
    if (options.uniqueKey) {
      const key = options.uniqueKey(parsed.data);
      if (seenKeys.has(key)) {
        errors.push({ lineNumber, line, message: `Duplicate entry "${key}".` });
        continue;
      }
      seenKeys.add(key);
    }
    items.push(parsed.data);
  }

  if (options.mode === "strict" && errors.length > 0) {
    throw new MalformedOutputError(
      `${errors.length} invalid line(s):\n${describeLineErrors(errors)}`,
      errors,
    );
  }
  return { items, errors };
}

/**
 * Splits raw model output into its `<discussion>` text and validated `<predictions>` lines.
 *
 * Missing or repeated blocks raise `MalformedOutputError` in both modes.
 */
export function parseStructuredOutput<T>(
  raw: string,
  schema: z.ZodType<T>,
  options: JsonLinesOptions<T> = {},
): StructuredOutput<T> {
  const discussion = extractBlock(raw, DISCUSSION_TAG).trim();
  const predictionsBlock = extractBlock(raw, PREDICTIONS_TAG);
  const { items, errors } = parseJsonLines(predictionsBlock, schema, options);
  return { discussion, predictions: items, errors };
}

export function toJsonLines(items: readonly unknown[]): string {
  return items.map((item) => JSON.stringify(item)).join("\n");
}

export function renderStructuredOutput({
  discussion,
  predictions,
}: {
  readonly discussion: string;
  readonly predictions: readonly unknown[];
}): string {
  return [
    `<${DISCUSSION_TAG}>`,
    discussion,
    `</${DISCUSSION_TAG}>`,
    "",
    `<${PREDICTIONS_TAG}>`,
    toJsonLines(predictions),
    `</${PREDICTIONS_TAG}>`,
    "",
  ].join("\n");
}
