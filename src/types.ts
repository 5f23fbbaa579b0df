export type ReportField = "bestColumn" | "rewardBreakdown" | "relations";

export interface RewardComponent {
  readonly name: string;
  readonly value: number;
}

export interface Relation {
  readonly source: string;
  readonly target: string;
  readonly fitScore: number;
}

export interface AnalysisReport {
  readonly bestColumn: string;
  /** Source order of the report line. */
  readonly rewardBreakdown: readonly RewardComponent[];
  /** Rank order, best first. */
  readonly relations: readonly Relation[];
}

export interface LabeledValue {
  readonly label: string;
  readonly value: number;
}

export interface PresentationModel {
  readonly bestColumn: string;
  readonly metrics: readonly LabeledValue[];
  readonly chartSeries: readonly LabeledValue[];
  readonly rawReport: string;
}

export interface ProcessResult {
  exitCode: number;
  output: string;
}

export type ProcessRunner = (
  executablePath: string,
  args: readonly string[],
  inputPath: string,
) => Promise<ProcessResult>;

export interface RunConfig {
  dataPath: string;
  modelDir: string;
  analyzerRelPath: string;
  python: string;
  outDir: string;
  download: boolean;
  debug: boolean;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  bestColumn: string;
  metricCount: number;
  relationCount: number;
  artifactPath?: string;
}
