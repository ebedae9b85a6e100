/**
 * CLI tests: argument parsing, dry-run output and exit codes.
 */
import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { main, parseCliArgs, USAGE } from "../src/cli.js";
import type { IngestConfig } from "../src/config.js";
import { TABLE_CATALOGUE } from "../src/catalogue.js";
import { setLogFile, setLogLevel } from "../src/core/logger.js";
import { Fetcher } from "../src/stages/fetcher.js";
import {
  BASE_URL,
  RATINGS_TSV,
  fakeFetch,
  makeIngestor,
  makeTmpDir,
  recordingLogger,
  writeFile,
} from "./fixtures.js";

function envFor(dir: string): NodeJS.ProcessEnv {
  return {
    GCP_PROJECT_ID: "test-project",
    GCS_BUCKET_NAME: "test-bucket",
    GOOGLE_APPLICATION_CREDENTIALS: join(dir, "credentials.json"),
    IMDB_BASE_URL: BASE_URL,
    RAW_DATA_FOLDER: join(dir, "raw"),
    PARQUET_DATA_FOLDER: join(dir, "parquet"),
    STORAGE_PROVIDER: "disk",
    STORAGE_PATH: join(dir, "blob"),
    LOG_LEVEL: "error",
    LOG_FILE: join(dir, "logs", "ingestion.log"),
  };
}

function harness(bodies: Record<string, string> = { [`${BASE_URL}title.ratings.tsv.gz`]: RATINGS_TSV }) {
  const dir = makeTmpDir();
  const printed: string[] = [];
  const fetchFn = fakeFetch(bodies);
  const createIngestor = (config: IngestConfig) => {
    const logger = recordingLogger();
    const fetcher = new Fetcher({ fetchFn, logger });
    return makeIngestor(dir, { config, logger, stages: { fetcher } }).ingestor;
  };
  return {
    dir,
    printed,
    fetchFn,
    deps: { env: envFor(dir), createIngestor, print: (line: string) => printed.push(line) },
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel("info");
  setLogFile(null);
});

describe("parseCliArgs", () => {
  test("defaults", () => {
    expect(parseCliArgs([])).toEqual({
      forceDownload: false,
      skipBigquery: false,
      tables: [],
      failFast: false,
      cleanup: false,
      dryRun: false,
      verbose: false,
      help: false,
    });
  });

  test("repeatable tables and short flags", () => {
    const args = parseCliArgs([
      "--tables",
      "title.basics",
      "--tables",
      "title.ratings",
      "--force-download",
      "--fail-fast",
      "-v",
    ]);
    expect(args.tables).toEqual(["title.basics", "title.ratings"]);
    expect(args.forceDownload).toBe(true);
    expect(args.failFast).toBe(true);
    expect(args.verbose).toBe(true);
  });

  test("unknown flags are rejected", () => {
    expect(() => parseCliArgs(["--bogus"])).toThrow();
  });
});

describe("main", () => {
  test("--help prints usage and exits 0", async () => {
    const { deps, printed } = harness();
    expect(await main(["--help"], deps)).toBe(0);
    expect(printed).toEqual([USAGE]);
  });

  test("a bad flag prints usage and exits 2", async () => {
    const { deps, printed } = harness();
    expect(await main(["--nope"], deps)).toBe(2);
    expect(printed).toEqual([USAGE]);
  });

  test("--dry-run prints the resolved configuration", async () => {
    const { deps, printed, dir, fetchFn } = harness();
    const code = await main(["--dry-run", "--tables", "title.ratings"], deps);

    expect(code).toBe(0);
    expect(printed).toEqual([
      "DRY RUN MODE - No changes will be made",
      "Configuration:",
      "  Project: test-project",
      "  Bucket: test-bucket",
      "  Dataset: bronze",
      "  Region: EU",
      "  Storage: disk",
      `  Raw folder: ${join(dir, "raw")}`,
      `  Parquet folder: ${join(dir, "parquet")}`,
      "  Write mode: overwrite",
      `  Log file: ${join(dir, "logs", "ingestion.log")}`,
      "  Tables: title.ratings",
      "  Force download: false",
      "  Skip BigQuery: false",
    ]);
    expect(fetchFn.calls).toEqual([]);
  });

  test("missing configuration exits 2", async () => {
    const { deps } = harness();
    const env = { ...deps.env, GCP_PROJECT_ID: undefined };
    expect(await main(["--dry-run"], { ...deps, env })).toBe(2);
  });

  test("a malformed table name exits 2", async () => {
    const { deps } = harness();
    expect(await main(["--dry-run", "--tables", "title..x"], deps)).toBe(2);
  });

  test("a table outside the catalogue exits 2 and is logged to the log file", async () => {
    const { deps, dir, fetchFn } = harness();
    expect(await main(["--tables", "title.foo", "--skip-bigquery"], deps)).toBe(2);
    expect(fetchFn.calls).toEqual([]);

    const lines = readFileSync(join(dir, "logs", "ingestion.log"), "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ - cli - ERROR - /);
    expect(lines[0].endsWith(
      `Configuration error: Unknown tables: title.foo (available: ${TABLE_CATALOGUE.join(", ")})`,
    )).toBe(true);
  });

  test("a missing credentials file exits 2 unless the load is skipped", async () => {
    const { deps, fetchFn } = harness();
    expect(await main(["--tables", "title.ratings"], deps)).toBe(2);
    expect(fetchFn.calls).toEqual([]);
    expect(await main(["--tables", "title.ratings", "--skip-bigquery"], deps)).toBe(0);
  });

  test("a successful run exits 0", async () => {
    const { deps, dir } = harness();
    writeFile(join(dir, "credentials.json"), "{}");
    expect(await main(["--tables", "title.ratings"], deps)).toBe(0);
  });

  test("a partially failed run exits 1", async () => {
    const { deps, dir } = harness();
    writeFile(join(dir, "credentials.json"), "{}");
    expect(await main(["--tables", "title.ratings", "--tables", "name.basics"], deps)).toBe(1);
  });

  test("a fully failed run exits 2", async () => {
    const { deps, dir } = harness({});
    writeFile(join(dir, "credentials.json"), "{}");
    expect(await main(["--tables", "title.ratings"], deps)).toBe(2);
  });
});
