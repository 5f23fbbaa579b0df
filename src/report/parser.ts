import { ReportParseError } from "../common/errors.js";
import type { AnalysisReport, Relation, RewardComponent } from "../types.js";
import {
  BEST_COLUMN_MARKER,
  RELATIONS_MARKER,
  RELATION_LINE,
  REWARD_BREAKDOWN_MARKER,
  markerBlockLines,
  normalizeLineEndings,
  restOfMarkerLine,
} from "./grammar.js";
import { parseRewardLiteral } from "./rewardLiteral.js";

/**
 * Builds an {@link AnalysisReport} from analyzer output. Every section is
 * located by its own marker, so section order does not matter. Throws
 * {@link ReportParseError} on the first missing or malformed section.
 */
export function parseReport(raw: string): AnalysisReport {
  const text = normalizeLineEndings(raw);
  const bestColumn = extractBestColumn(text);
  const rewardBreakdown = extractRewardBreakdown(text);
  const relations = extractRelations(text);

  return Object.freeze({
    bestColumn,
    rewardBreakdown: Object.freeze(rewardBreakdown.map((entry) => Object.freeze(entry))),
    relations: Object.freeze(relations.map((entry) => Object.freeze(entry))),
  });
}

export function extractBestColumn(text: string): string {
  const rest = restOfMarkerLine(text, BEST_COLUMN_MARKER);
  if (rest === undefined) {
    throw new ReportParseError("bestColumn", `Marker "${BEST_COLUMN_MARKER}" not found`);
  }
  const value = rest.trim();
  if (!value) {
    throw new ReportParseError("bestColumn", "Best column is empty", rest);
  }
  return value;
}

export function extractRewardBreakdown(text: string): RewardComponent[] {
  const rest = restOfMarkerLine(text, REWARD_BREAKDOWN_MARKER);
  if (rest === undefined) {
    throw new ReportParseError(
      "rewardBreakdown",
      `Marker "${REWARD_BREAKDOWN_MARKER}" not found`,
    );
  }
  const literal = rest.trim();
  let entries: RewardComponent[];
  try {
    entries = parseRewardLiteral(literal);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReportParseError("rewardBreakdown", message, literal);
  }
  if (entries.length === 0) {
    throw new ReportParseError("rewardBreakdown", "Reward break-down has no components", literal);
  }
  return entries;
}

export function extractRelations(text: string): Relation[] {
  const lines = markerBlockLines(text, RELATIONS_MARKER);
  if (lines === undefined) {
    throw new ReportParseError("relations", `Marker "${RELATIONS_MARKER}" not found`);
  }
  return lines.map(parseRelationLine);
}

export function parseRelationLine(line: string): Relation {
  const trimmed = line.trim();
  const match = trimmed.match(RELATION_LINE);
  if (!match) {
    throw new ReportParseError("relations", "Relation line does not match grammar", trimmed);
  }
  const source = match[1].trim();
  const target = match[2].trim();
  if (!source || !target) {
    throw new ReportParseError("relations", "Relation endpoint is empty", trimmed);
  }
  return { source, target, fitScore: Number(match[4]) };
}
