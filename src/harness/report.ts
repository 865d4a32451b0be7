import type { TaskFailure } from "../orchestrator/orchestrator.js";
import type { AggregateScores, MetricSummary } from "../scoring.js";

export type ReportRow = {
  readonly id: string;
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
  readonly ndcg?: number | null;
  readonly costUsd: number;
};

export type ReportInput = {
  readonly title: string;
  /** Rendered as a bullet list under the title, in order. */
  readonly details: readonly (readonly [label: string, value: string])[];
  readonly aggregate: AggregateScores;
  readonly rows: readonly ReportRow[];
  readonly failures: readonly TaskFailure[];
};

function fixed(value: number, digits = 3): string {
  return value.toFixed(digits);
}

function metric(summary: MetricSummary): string {
  return `${fixed(summary.mean)} ± ${fixed(summary.stdDev)}`;
}

function cell(text: string): string {
  return text.replace(/\r?\n/gu, " ").replace(/\|/gu, "\\|");
}

function table(header: readonly string[], rows: readonly (readonly string[])[]): string[] {
  return [
    `| ${header.join(" | ")} |`,
    `| ${header.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.map(cell).join(" | ")} |`),
  ];
}

/** Markdown summary: aggregate metrics over succeeded records, then the per-record table and failures. */
export function renderReport(input: ReportInput): string {
  const { aggregate } = input;
  const metricRows = [
    ["Precision", metric(aggregate.precision)],
    ["Recall", metric(aggregate.recall)],
    ["F1", metric(aggregate.f1)],
  ];
  if (aggregate.ndcg !== null) {
    metricRows.push(["nDCG", metric(aggregate.ndcg)]);
  }
  const lines: string[] = [`# ${input.title}`, ""];
  for (const [label, value] of input.details) {
    lines.push(`- ${label}: ${value}`);
  }
  lines.push(
    `- Records: ${aggregate.succeeded} succeeded, ${aggregate.failed} failed` +
      (aggregate.failed > 0 ? " (excluded from the metrics)" : ""),
    "",
    ...table(["Metric", "Mean ± std"], metricRows),
    "",
    `Cost: $${fixed(aggregate.totalCostUsd, 4)} total, $${fixed(aggregate.meanCostUsd, 4)} per record.`,
    "",
    "## Records",
    "",
  );
  if (input.rows.length === 0) {
    lines.push("No succeeded records.");
  } else {
    const withNdcg = aggregate.ndcg !== null;
    lines.push(
      ...table(
        withNdcg
          ? ["Record", "Precision", "Recall", "F1", "nDCG", "Cost (USD)"]
          : ["Record", "Precision", "Recall", "F1", "Cost (USD)"],
        input.rows.map((row) => [
          row.id,
          fixed(row.precision),
          fixed(row.recall),
          fixed(row.f1),
          ...(withNdcg ? [typeof row.ndcg === "number" ? fixed(row.ndcg) : "-"] : []),
          fixed(row.costUsd, 4),
        ]),
      ),
    );
  }
  if (input.failures.length > 0) {
    lines.push(
      "",
      "## Failures",
      "",
      ...table(
        ["Record", "Error", "Message", "Attempts"],
        input.failures.map((failure) => [failure.id, failure.errorClass, failure.message, String(failure.attempts)]),
      ),
    );
  }
  lines.push("");
  return lines.join("\n");
}
