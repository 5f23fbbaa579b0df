#!/usr/bin/env node
import { isAnalysisError, stringifyError } from "./common/errors.js";
import { buildRunConfig } from "./config.js";
import { createAnalyzerResolver, run } from "./orchestrator.js";
import { ConsoleTransport } from "./transports/console.js";

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const transport = new ConsoleTransport();
  const resolveAnalyzer = createAnalyzerResolver(config);
  await resolveAnalyzer();
  try {
    const summary = await run(config, { transport, resolveAnalyzer });
    process.stderr.write(
      `Finished. best_column=${summary.bestColumn} metrics=${summary.metricCount} ` +
        `relations=${summary.relationCount} artifact=${summary.artifactPath ?? "-"}\n`,
    );
  } catch (error) {
    if (!isAnalysisError(error)) {
      throw error;
    }
    transport.showError(error);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
