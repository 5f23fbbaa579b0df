import type { AnalysisError } from "../common/errors.js";
import { clamp } from "../common/math.js";
import type { LabeledValue, PresentationModel } from "../types.js";

const SEPARATOR = "==================";
const BAR_WIDTH = 40;
const BAR_CHAR = "█";

export interface FormatPresentationOptions {
  barWidth?: number;
}

export function formatPresentation(
  model: PresentationModel,
  options: FormatPresentationOptions = {},
): string {
  const lines = [
    "MPIE – IITJ",
    "Mathematical Pattern Discovery Engine | RL-powered structure finder",
    SEPARATOR,
    `Best explanatory column: ${model.bestColumn}`,
    SEPARATOR,
    ...model.metrics.map((metric) => `${metric.label}: ${formatMetricValue(metric.value)}`),
    SEPARATOR,
    "Top discovered relations (R²)",
    ...formatBarChart(model.chartSeries, options.barWidth ?? BAR_WIDTH),
    SEPARATOR,
    "Analysis complete!",
  ];
  return lines.join("\n");
}

export function formatMetricValue(value: number): string {
  return value.toFixed(3);
}

/** Horizontal bars, first entry on top; lengths scale with the value clamped to [0, 1]. */
export function formatBarChart(series: readonly LabeledValue[], width: number = BAR_WIDTH): string[] {
  if (series.length === 0) {
    return ["(no relations found)"];
  }
  const labelWidth = Math.max(...series.map((entry) => entry.label.length));
  return series.map((entry) => {
    const length = Number.isFinite(entry.value) ? Math.round(clamp(entry.value, 0, 1) * width) : 0;
    const bar = BAR_CHAR.repeat(length).padEnd(width, " ");
    return `${entry.label.padEnd(labelWidth, " ")} |${bar}| ${formatMetricValue(entry.value)}`;
  });
}

export function formatAnalysisError(error: AnalysisError): string {
  switch (error.kind) {
    case "process_failed":
      return `Agent crashed:\n\n${error.output}`;
    case "malformed_output": {
      const head = `Malformed report (${error.field}): ${error.reason}`;
      return error.detail ? `${head}\n${error.detail}` : head;
    }
  }
}
