#!/usr/bin/env node
/**
 * inboxcast: turn a raw newsletter email into narration-ready text.
 *
 * Usage:
 *   inboxcast --input-file issue.eml --json-output
 *   inboxcast --input-file issue.eml --route-tag levine --json-output
 *   cat issue.eml | inboxcast --write-text-file --output-dir emails
 */

import { buffer } from "node:stream/consumers";
import { runCli, type CliIo } from "./run.js";
import { log } from "../logger.js";

const io: CliIo = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
  readStdin: () => buffer(process.stdin),
};

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), io);
}

main().catch(async (err: unknown) => {
  await log("error", `Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
