import { MalformedOutputError, ProcessFailedError, ReportParseError } from "./common/errors.js";
import { Logger } from "./logger.js";
import { outOfRangeRelations, projectReport } from "./report/metrics.js";
import { parseReport } from "./report/parser.js";
import { runProcess } from "./runner/processRunner.js";
import type { AnalysisReport, PresentationModel, ProcessRunner } from "./types.js";

export interface AnalyzerOptions {
  executablePath: string;
  args?: readonly string[];
  runner?: ProcessRunner;
  logger?: Logger;
}

export interface Analyzer {
  /**
   * Runs the analyzer on `inputPath` and projects its report. Rejects with
   * {@link ProcessFailedError} or {@link MalformedOutputError}; never retries.
   */
  analyze(inputPath: string): Promise<PresentationModel>;
}

export function createAnalyzer(options: AnalyzerOptions): Analyzer {
  const runner = options.runner ?? runProcess;
  const args = options.args ?? [];
  const logger = options.logger ?? new Logger();

  return {
    async analyze(inputPath: string): Promise<PresentationModel> {
      logger.debug(`Running ${options.executablePath} ${args.join(" ")} --data ${inputPath}`);
      const startedMs = Date.now();
      const result = await runner(options.executablePath, args, inputPath);
      logger.debug(
        `Analyzer exited with code ${result.exitCode} after ${Date.now() - startedMs}ms ` +
          `(${result.output.length} chars).`,
      );

      if (result.exitCode !== 0) {
        throw new ProcessFailedError(result.exitCode, result.output);
      }

      let report: AnalysisReport;
      try {
        report = parseReport(result.output);
      } catch (error) {
        if (error instanceof ReportParseError) {
          throw new MalformedOutputError(error.field, error.message, error.detail);
        }
        throw error;
      }

      for (const relation of outOfRangeRelations(report)) {
        logger.warn(
          `Fit score outside [0, 1]: ${relation.source} → ${relation.target} R²=${relation.fitScore}`,
        );
      }
      return projectReport(report, result.output);
    },
  };
}
