#!/usr/bin/env node
/**
 * CLI entrypoint for imdb-bronze-ingest.
 *
 * Usage:
 *   imdb-ingest --force-download
 *   imdb-ingest --tables title.basics --tables title.ratings
 *   imdb-ingest --dry-run
 */
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { config as loadDotenv } from "dotenv";

import { assertCredentials, describeConfig, loadConfig, type IngestConfig } from "./config.js";
import { ConfigError, errorMessage } from "./core/exceptions.js";
import { createLogger, setLogFile, setLogLevel } from "./core/logger.js";
import { ExitStatus, type RunOptions, type TableDescriptor } from "./core/types.js";
import { Ingestor } from "./index.js";

export const USAGE = `
imdb-ingest: load the IMDb datasets into the BigQuery bronze layer

Usage:
  imdb-ingest [options]

Options:
  --force-download       Re-download and re-convert even if local files exist
  --skip-bigquery        Stop after publishing to the bucket (no load job)
  --tables <name>        Table to process, repeatable (default: all tables)
  --fail-fast            Stop on the first failed table
  --cleanup              Delete downloaded files after a fully successful run
  --dry-run              Print the resolved configuration and exit
  -v, --verbose          Enable debug logging
  -h, --help             Show this help
`.trim();

export interface CliArgs {
  forceDownload: boolean;
  skipBigquery: boolean;
  tables: string[];
  failFast: boolean;
  cleanup: boolean;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      "force-download": { type: "boolean", default: false },
      "skip-bigquery": { type: "boolean", default: false },
      tables: { type: "string", multiple: true, default: [] },
      "fail-fast": { type: "boolean", default: false },
      cleanup: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    forceDownload: values["force-download"] ?? false,
    skipBigquery: values["skip-bigquery"] ?? false,
    tables: values.tables ?? [],
    failFast: values["fail-fast"] ?? false,
    cleanup: values.cleanup ?? false,
    dryRun: values["dry-run"] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces Ingestor.fromConfig, mainly for tests. */
  createIngestor?: (config: IngestConfig) => Ingestor;
  print?: (line: string) => void;
}

/** Run the CLI and return the process exit code. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const log = createLogger("cli");

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    log.error(errorMessage(err));
    print(USAGE);
    return ExitStatus.TotalFailure;
  }

  if (args.help) {
    print(USAGE);
    return ExitStatus.Success;
  }

  let config: IngestConfig;
  let tables: TableDescriptor[];
  let ingestor: Ingestor;
  try {
    config = loadConfig(deps.env ?? process.env);
    setLogLevel(args.verbose ? "debug" : config.logLevel);
    setLogFile(config.logFile);
    if (!args.skipBigquery && !args.dryRun) assertCredentials(config);
    ingestor = (deps.createIngestor ?? ((c) => Ingestor.fromConfig(c)))(config);
    tables = ingestor.describe(args.tables);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.error(err.message);
    return ExitStatus.TotalFailure;
  }

  if (args.dryRun) {
    print("DRY RUN MODE - No changes will be made");
    print("Configuration:");
    for (const line of describeConfig(config)) print(`  ${line}`);
    print(`  Tables: ${tables.map((t) => t.name).join(", ")}`);
    print(`  Force download: ${args.forceDownload}`);
    print(`  Skip BigQuery: ${args.skipBigquery}`);
    return ExitStatus.Success;
  }

  const opts: RunOptions = {
    force: args.forceDownload,
    skipLoad: args.skipBigquery,
    failFast: args.failFast,
    cleanup: args.cleanup,
  };
  const result = await ingestor.runPipeline(tables, opts);
  return result.status;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  loadDotenv();
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = ExitStatus.TotalFailure;
    },
  );
}
