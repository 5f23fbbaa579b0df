import { z } from "zod";
import type { RunConfig } from "./types.js";

const schema = z.object({
  dataPath: z.string().min(1, "--data <path-to-csv-or-txt> is required"),
  modelDir: z.string().min(1),
  analyzerRelPath: z.string().min(1),
  python: z.string().min(1),
  outDir: z.string().min(1),
  download: z.boolean(),
  debug: z.boolean(),
});

const DEFAULTS = {
  modelDir: "hf_cache",
  analyzerRelPath: "analyze.py",
  python: "python",
  outDir: ".",
  download: true,
  debug: false,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);

  return schema.parse({
    dataPath: readString(args, "data", ""),
    modelDir: readString(args, "model-dir", env.MPIE_MODEL_DIR || DEFAULTS.modelDir),
    analyzerRelPath: readString(args, "analyzer", DEFAULTS.analyzerRelPath),
    python: readString(args, "python", env.MPIE_PYTHON || DEFAULTS.python),
    outDir: readString(args, "out-dir", DEFAULTS.outDir),
    download: readBool(args, "download", DEFAULTS.download),
    debug: readBool(args, "debug", DEFAULTS.debug),
  });
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  return fallback;
}
