import test from "node:test";
import assert from "node:assert/strict";
import { MalformedOutputError, ProcessFailedError } from "../src/common/errors.js";
import { ConsoleTransport } from "../src/transports/console.js";
import {
  formatAnalysisError,
  formatBarChart,
  formatMetricValue,
  formatPresentation,
} from "../src/transports/format.js";
import type { PresentationModel } from "../src/types.js";

const model: PresentationModel = {
  bestColumn: "temperature",
  metrics: [
    { label: "Accuracy", value: 0.91 },
    { label: "Stability", value: 0.77 },
  ],
  chartSeries: [
    { label: "pressure→volume", value: 0.88 },
    { label: "time→temperature", value: 0.65 },
  ],
  rawReport: "raw",
};

test("formatPresentation renders heading, metrics and chart", () => {
  const text = formatPresentation(model, { barWidth: 20 });
  assert.equal(
    text,
    [
      "MPIE – IITJ",
      "Mathematical Pattern Discovery Engine | RL-powered structure finder",
      "==================",
      "Best explanatory column: temperature",
      "==================",
      "Accuracy: 0.910",
      "Stability: 0.770",
      "==================",
      "Top discovered relations (R²)",
      `pressure→volume  |${"█".repeat(18)}  | 0.880`,
      `time→temperature |${"█".repeat(13)}       | 0.650`,
      "==================",
      "Analysis complete!",
    ].join("\n"),
  );
});

test("formatBarChart clamps bars into the unit interval", () => {
  const lines = formatBarChart(
    [
      { label: "a→b", value: 1.4 },
      { label: "c→d", value: -0.3 },
    ],
    4,
  );
  assert.deepEqual(lines, ["a→b |████| 1.400", "c→d |    | -0.300"]);
});

test("formatBarChart notes an empty relation list", () => {
  assert.deepEqual(formatBarChart([]), ["(no relations found)"]);
});

test("formatMetricValue uses three decimals", () => {
  assert.equal(formatMetricValue(0.5), "0.500");
  assert.equal(formatMetricValue(12), "12.000");
});

test("formatAnalysisError shows the crashed process output verbatim", () => {
  const error = new ProcessFailedError(2, "Traceback (most recent call last):\nValueError: bad csv\n");
  assert.equal(
    formatAnalysisError(error),
    "Agent crashed:\n\nTraceback (most recent call last):\nValueError: bad csv\n",
  );
});

test("formatAnalysisError names the malformed field and offending line", () => {
  const error = new MalformedOutputError(
    "relations",
    "Relation line does not match grammar",
    "a → b R²=0.3",
  );
  assert.equal(
    formatAnalysisError(error),
    "Malformed report (relations): Relation line does not match grammar\na → b R²=0.3",
  );
  assert.equal(
    formatAnalysisError(new MalformedOutputError("bestColumn", 'Marker "Best column:" not found')),
    'Malformed report (bestColumn): Marker "Best column:" not found',
  );
});

test("ConsoleTransport writes the model to out and errors to err", () => {
  const out: string[] = [];
  const err: string[] = [];
  const transport = new ConsoleTransport({
    out: (text) => out.push(text),
    err: (text) => err.push(text),
  });

  transport.showPresentation(model);
  transport.showError(new ProcessFailedError(1, "boom"));

  assert.equal(out.length, 1);
  assert.ok(out[0].startsWith("MPIE – IITJ\n"));
  assert.ok(out[0].endsWith("Analysis complete!\n"));
  assert.deepEqual(err, ["Agent crashed:\n\nboom\n"]);
});
