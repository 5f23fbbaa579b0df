import { writeReportArtifact } from "./artifact.js";
import { Logger } from "./logger.js";
import { createSnapshotGate, resolveLocalSnapshot, type SnapshotResolver } from "./model/snapshot.js";
import { createAnalyzer } from "./pipeline.js";
import { ConsoleTransport } from "./transports/console.js";
import type { ProcessRunner, RunConfig, RunSummary } from "./types.js";

export interface RunOptions {
  logger?: Logger;
  transport?: ConsoleTransport;
  runner?: ProcessRunner;
  /** Shared across runs; build it once with {@link createAnalyzerResolver}. */
  resolveAnalyzer: SnapshotResolver;
  now?: () => Date;
}

/** Once-only lookup of the analyzer script inside the configured model directory. */
export function createAnalyzerResolver(
  config: Pick<RunConfig, "modelDir" | "analyzerRelPath">,
): SnapshotResolver {
  return createSnapshotGate(() =>
    resolveLocalSnapshot({ modelDir: config.modelDir, analyzerRelPath: config.analyzerRelPath }),
  );
}

export async function run(config: RunConfig, options: RunOptions): Promise<RunSummary> {
  const logger = options.logger ?? new Logger({ debugEnabled: config.debug });
  const transport = options.transport ?? new ConsoleTransport();
  const now = options.now ?? (() => new Date());
  const startedAt = now().toISOString();

  const analyzerPath = await options.resolveAnalyzer();
  logger.info(`Analyzer resolved: ${analyzerPath}`);

  const analyzer = createAnalyzer({
    executablePath: config.python,
    args: [analyzerPath],
    runner: options.runner,
    logger,
  });

  logger.info(`Analyzing ${config.dataPath}`);
  const model = await analyzer.analyze(config.dataPath);
  transport.showPresentation(model);

  let artifactPath: string | undefined;
  if (config.download) {
    artifactPath = await writeReportArtifact(config.outDir, model.rawReport, now());
    logger.info(`Raw report written to ${artifactPath}`);
  }

  return {
    startedAt,
    finishedAt: now().toISOString(),
    bestColumn: model.bestColumn,
    metricCount: model.metrics.length,
    relationCount: model.chartSeries.length,
    artifactPath,
  };
}
