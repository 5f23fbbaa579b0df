import { access } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { resolve } from "node:path";

export type SnapshotResolver = () => Promise<string>;

/**
 * Runs `resolver` at most once; every caller shares the same pending or
 * settled path. A failed resolution is forgotten so the next call tries again.
 */
export function createSnapshotGate(resolver: SnapshotResolver): SnapshotResolver {
  let pending: Promise<string> | undefined;
  return () => {
    if (!pending) {
      pending = resolver().catch((error: unknown) => {
        pending = undefined;
        throw error;
      });
    }
    return pending;
  };
}

export interface LocalSnapshotOptions {
  modelDir: string;
  analyzerRelPath: string;
}

/** Path of the analyzer script inside an already fetched model directory. */
export async function resolveLocalSnapshot(options: LocalSnapshotOptions): Promise<string> {
  const analyzerPath = resolve(options.modelDir, options.analyzerRelPath);
  try {
    await access(analyzerPath, fsConstants.R_OK);
  } catch {
    throw new Error(
      `Analyzer ${options.analyzerRelPath} not found in model directory ${options.modelDir}`,
    );
  }
  return analyzerPath;
}
