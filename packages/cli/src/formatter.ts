import type { ChalkInstance } from "chalk";
import type { ParseReport, RunSummary } from "@trainlog/core";
import type { CliError } from "./errors.js";

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify({
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      exitCode: error.exitCode,
    });
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join("\n");
}

function pad(value: string, width: number): string {
  if (value.length >= width) {
    return value;
  }
  return value + " ".repeat(width - value.length);
}

function padStart(value: string, width: number): string {
  if (value.length >= width) {
    return value;
  }
  return " ".repeat(width - value.length) + value;
}

/**
 * Render rows as space-aligned columns; the first row is the header
 */
export function formatColumns(rows: readonly (readonly string[])[], numeric: readonly boolean[] = []): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    row
      .map((cell, index) => {
        const width = widths[index] ?? cell.length;
        return numeric[index] ? padStart(cell, width) : pad(cell, width);
      })
      .join("  ")
      .trimEnd(),
  );
}

export function formatParseSummary(report: ParseReport): string {
  return `Run '${report.runName}': parsed ${report.linesParsed}/${report.totalLinesSeen} lines -> trainlog.csv, best_results.csv`;
}

export function formatHours(hours: number): string {
  return hours.toFixed(2);
}

export function formatRunSummary(summary: RunSummary, c: ChalkInstance): string {
  const lines: string[] = [];
  lines.push(c.bold(`Run ${summary.runName}`));
  lines.push(`  records:     ${summary.records}`);
  lines.push(`  episodes:    ${summary.episodes}`);
  lines.push(`  total hours: ${formatHours(summary.totalHours)}`);
  lines.push(`  successes:   ${summary.bestSuccesses} (reward >= ${summary.successThreshold})`);

  lines.push("");
  lines.push(c.bold(`Steps (bucket width ${summary.bucketWidth})`));
  if (summary.buckets.length === 0) {
    lines.push("  (no records)");
  } else {
    const rows = [
      ["bucket", "records", "mean t", "successes", "episodes"],
      ...summary.buckets.map((b) => [
        String(b.bucket),
        String(b.records),
        b.meanStepTime.toFixed(3),
        String(b.successes),
        String(b.episodes),
      ]),
    ];
    for (const line of formatColumns(rows, [true, true, true, true, true])) {
      lines.push(`  ${line}`);
    }
  }

  lines.push("");
  lines.push(c.bold(`Top ${summary.top.length} by return`));
  if (summary.top.length === 0) {
    lines.push("  (no episodes)");
  } else {
    const rows = [
      ["episode", "step", "ret", "reward", "decision"],
      ...summary.top.map((r) => [r.episode, String(r.step), String(r.ret), String(r.reward), r.decision]),
    ];
    for (const line of formatColumns(rows, [true, true, true, true, false])) {
      lines.push(`  ${line}`);
    }
  }

  return lines.join("\n");
}
