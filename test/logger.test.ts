import test from "node:test";
import assert from "node:assert/strict";
import { Logger } from "../src/logger.js";

test("Logger writes level-tagged lines to its sink", () => {
  const lines: string[] = [];
  const logger = new Logger({ write: (line) => lines.push(line) });

  logger.info("analyzer resolved");
  logger.error("analyzer crashed");

  assert.equal(lines.length, 2);
  assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] analyzer resolved\n$/);
  assert.match(lines[1], /\[ERROR\] analyzer crashed\n$/);
});

test("Logger drops debug lines unless enabled", () => {
  const quiet: string[] = [];
  const verbose: string[] = [];
  new Logger({ write: (line) => quiet.push(line) }).debug("hidden");
  new Logger({ debugEnabled: true, write: (line) => verbose.push(line) }).debug("shown");

  assert.deepEqual(quiet, []);
  assert.equal(verbose.length, 1);
  assert.match(verbose[0], /\[DEBUG\] shown\n$/);
});
