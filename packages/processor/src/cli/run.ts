import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { isEngineError, NoRenderableContentError } from "../errors.js";
import { decodeMessage } from "../mime/message-decoder.js";
import { processMessage } from "../cleaning/pipeline.js";
import { planEpisode } from "../sources/episode-planner.js";
import { writeTextFile } from "../storage/text-writer.js";
import { loadConfig } from "../config.js";
import { initLogger, log } from "../logger.js";

export interface CliOptions {
  inputFile?: string;
  binary: boolean;
  jsonOutput: boolean;
  writeTextFile: boolean;
  outputDir?: string;
  routeTag?: string;
  base?: string;
  rawEmail?: string;
}

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<Buffer>;
}

/** Bad command line; reported like an engine error, exit code 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: inboxcast [options] [RAW_EMAIL]

  --input-file PATH   Read the raw email from a file (bytes for .eml or --binary)
  --binary            Read --input-file as bytes
  --json-output       Print the processed email as JSON
  --write-text-file   Save the body text as <date>-<subject>.txt
  --output-dir DIR    Directory for --write-text-file (default: config output_dir)
  --route-tag TAG     Newsletter preset; adds the planned episode to the JSON
  --base DIR          Data directory (default: ~/.inboxcast)

Without RAW_EMAIL or --input-file the email is read from stdin.`;

const VALUE_FLAGS = new Set(["--input-file", "--output-dir", "--route-tag", "--base"]);

/**
 * Parse CLI arguments (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { binary: false, jsonOutput: false, writeTextFile: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      switch (arg) {
        case "--input-file":
          opts.inputFile = value;
          break;
        case "--output-dir":
          opts.outputDir = value;
          break;
        case "--route-tag":
          opts.routeTag = value;
          break;
        case "--base":
          opts.base = value;
          break;
      }
      continue;
    }

    switch (arg) {
      case "--binary":
        opts.binary = true;
        break;
      case "--json-output":
        opts.jsonOutput = true;
        break;
      case "--no-json-output":
        opts.jsonOutput = false;
        break;
      case "--write-text-file":
        opts.writeTextFile = true;
        break;
      case "--no-write-text-file":
        opts.writeTextFile = false;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        if (opts.rawEmail !== undefined) {
          throw new UsageError("Only one RAW_EMAIL argument is accepted");
        }
        opts.rawEmail = arg;
    }
  }

  return opts;
}

/**
 * Input precedence: --input-file, then the positional argument, then stdin.
 */
export async function readInput(opts: CliOptions, io: CliIo): Promise<Buffer | string> {
  if (opts.inputFile !== undefined) {
    const asBytes = opts.binary || extname(opts.inputFile).toLowerCase() === ".eml";
    try {
      return asBytes ? await readFile(opts.inputFile) : await readFile(opts.inputFile, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new UsageError(`Input file not found: ${opts.inputFile}`);
      }
      throw err;
    }
  }
  if (opts.rawEmail !== undefined) {
    return opts.rawEmail;
  }
  return io.readStdin();
}

/**
 * Run one invocation and return the exit code. Engine and usage errors are
 * printed as "Error: <message>"; anything else propagates.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n${USAGE}\n`);
      return 2;
    }
    throw err;
  }

  await initLogger(opts.base);
  const config = await loadConfig(opts.base);

  try {
    const raw = await readInput(opts, io);
    const message = decodeMessage(raw);
    const doc = processMessage(message);
    await log("info", `Processed "${doc.subject_raw}" (${doc.date})`);

    const routeTag = opts.routeTag ?? config.default_route_tag;

    if (opts.jsonOutput) {
      const payload = routeTag
        ? {
            document: doc,
            episode: planEpisode(doc, message, {
              routeTag,
              ttsModel: config.tts_model,
              ttsVoice: config.tts_voice,
            }),
          }
        : doc;
      io.stdout(JSON.stringify(payload, null, 2) + "\n");
    }

    if (opts.writeTextFile) {
      const path = await writeTextFile(doc, opts.outputDir ?? config.output_dir);
      await log("info", `Wrote ${path}`);
      io.stdout(`Body text saved to ${path}\n`);
    }

    if (!opts.jsonOutput && !opts.writeTextFile) {
      io.stdout(
        "Processing complete. Use --json-output or --write-text-file to output the results.\n"
      );
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n`);
      return 2;
    }
    if (!isEngineError(err)) throw err;

    await log(err instanceof NoRenderableContentError ? "warn" : "error", `${err.code}: ${err.message}`);
    io.stderr(`Error: ${err.message}\n`);
    return 1;
  }
}
