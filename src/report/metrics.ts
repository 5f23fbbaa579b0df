import { isUnitInterval } from "../common/math.js";
import type { AnalysisReport, LabeledValue, PresentationModel, Relation } from "../types.js";
import { RELATION_ARROW } from "./grammar.js";

export function projectReport(report: AnalysisReport, rawReport: string): PresentationModel {
  const metrics = report.rewardBreakdown.map(
    (component): LabeledValue => Object.freeze({ label: displayCase(component.name), value: component.value }),
  );
  const chartSeries = report.relations.map(
    (relation): LabeledValue => Object.freeze({ label: relationLabel(relation), value: relation.fitScore }),
  );
  return Object.freeze({
    bestColumn: report.bestColumn,
    metrics: Object.freeze(metrics),
    chartSeries: Object.freeze(chartSeries),
    rawReport,
  });
}

// First character only; the rest keeps the report's own casing.
export function displayCase(name: string): string {
  if (!name) {
    return name;
  }
  const first = String.fromCodePoint(name.codePointAt(0) ?? 0);
  return first.toUpperCase() + name.slice(first.length);
}

export function relationLabel(relation: Relation): string {
  return `${relation.source}${RELATION_ARROW}${relation.target}`;
}

/** Relations whose fit score is outside [0, 1]; kept, but worth a warning. */
export function outOfRangeRelations(report: AnalysisReport): Relation[] {
  return report.relations.filter((relation) => !isUnitInterval(relation.fitScore));
}
