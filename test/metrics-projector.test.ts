import test from "node:test";
import assert from "node:assert/strict";
import { displayCase, outOfRangeRelations, projectReport } from "../src/report/metrics.js";
import type { AnalysisReport } from "../src/types.js";

const report: AnalysisReport = {
  bestColumn: "temperature",
  rewardBreakdown: [
    { name: "stability", value: 0.77 },
    { name: "accuracy", value: 0.91 },
    { name: "rMSE", value: 0.12 },
  ],
  relations: [
    { source: "time", target: "temperature", fitScore: 0.65 },
    { source: "pressure", target: "volume", fitScore: 0.88 },
  ],
};

test("projectReport keeps reward order and display-cases labels", () => {
  const model = projectReport(report, "raw text");
  assert.deepEqual(model.metrics, [
    { label: "Stability", value: 0.77 },
    { label: "Accuracy", value: 0.91 },
    { label: "RMSE", value: 0.12 },
  ]);
});

test("projectReport keeps relation rank order instead of sorting by score", () => {
  const model = projectReport(report, "raw text");
  assert.deepEqual(model.chartSeries, [
    { label: "time→temperature", value: 0.65 },
    { label: "pressure→volume", value: 0.88 },
  ]);
});

test("projectReport passes best column and raw report through", () => {
  const raw = "Best column: temperature\n  trailing spaces  \n";
  const model = projectReport(report, raw);
  assert.equal(model.bestColumn, "temperature");
  assert.equal(model.rawReport, raw);
  assert.ok(Object.isFrozen(model));
  assert.ok(Object.isFrozen(model.chartSeries));
});

test("projectReport yields an empty chart for a report without relations", () => {
  const model = projectReport({ ...report, relations: [] }, "");
  assert.deepEqual(model.chartSeries, []);
});

test("displayCase only touches the first character", () => {
  assert.equal(displayCase("accuracy"), "Accuracy");
  assert.equal(displayCase("mean_abs_error"), "Mean_abs_error");
  assert.equal(displayCase("fitScore"), "FitScore");
  assert.equal(displayCase("éclat"), "Éclat");
  assert.equal(displayCase("2nd order"), "2nd order");
  assert.equal(displayCase(""), "");
});

test("outOfRangeRelations lists scores outside the unit interval", () => {
  const flagged = outOfRangeRelations({
    ...report,
    relations: [
      { source: "a", target: "b", fitScore: 0 },
      { source: "c", target: "d", fitScore: -0.1 },
      { source: "e", target: "f", fitScore: 1 },
      { source: "g", target: "h", fitScore: 1.01 },
    ],
  });
  assert.deepEqual(
    flagged.map((relation) => relation.source),
    ["c", "g"],
  );
});
