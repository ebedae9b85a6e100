/**
 * Transform stage – tab-delimited text (optionally gzip-compressed) to Parquet.
 */
import { createReadStream } from "node:fs";
import { mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Gunzip } from "fflate";
import { parquetWriteBuffer } from "hyparquet-writer";

import { errorMessage, FormatError } from "../core/exceptions.js";
import { createLogger, type Logger } from "../core/logger.js";
import type { ConversionReport, ParquetCodec } from "../core/types.js";

/** Literal token the IMDb files use for a missing value. */
export const NULL_SENTINEL = "\\N";

const ROW_GROUP_SIZE = 100_000;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export type ColumnType = "INT32" | "INT64" | "DOUBLE" | "STRING";

export interface ParsedTable {
  header: string[];
  columns: (string | null)[][];
  rows: number;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/** Yield decompressed chunks; gzip is detected from the magic bytes. */
async function* readBytes(path: string): AsyncGenerator<Uint8Array> {
  let gunzip: Gunzip | null = null;
  let first = true;
  const pending: Uint8Array[] = [];

  for await (const chunk of createReadStream(path)) {
    const bytes: Uint8Array = chunk;
    if (first) {
      first = false;
      if (isGzip(bytes)) gunzip = new Gunzip((data) => pending.push(data));
    }
    if (!gunzip) {
      yield bytes;
      continue;
    }
    gunzip.push(bytes);
    yield* pending.splice(0);
  }

  if (gunzip) {
    gunzip.push(new Uint8Array(0), true);
    yield* pending.splice(0);
  }
}

async function* readLines(path: string): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  let rest = "";
  for await (const bytes of readBytes(path)) {
    rest += decoder.decode(bytes, { stream: true });
    const lines = rest.split("\n");
    rest = lines.pop() ?? "";
    for (const line of lines) yield line.endsWith("\r") ? line.slice(0, -1) : line;
  }
  rest += decoder.decode();
  if (rest.length > 0) yield rest.endsWith("\r") ? rest.slice(0, -1) : rest;
}

/**
 * Parse a delimited file into per-column string arrays. No quote handling:
 * the IMDb files contain literal quote characters. Blank lines are skipped
 * unless the file has a single column, where they are empty values.
 */
export async function parseDelimited(path: string, delimiter = "\t"): Promise<ParsedTable> {
  let header: string[] | null = null;
  let columns: (string | null)[][] = [];
  let rows = 0;
  let lineNo = 0;

  for await (const line of readLines(path)) {
    lineNo++;
    if (header === null) {
      header = line.split(delimiter);
      columns = header.map(() => []);
      continue;
    }
    if (line === "" && header.length > 1) continue;
    const fields = line.split(delimiter);
    if (fields.length !== header.length) {
      throw new FormatError(
        `${path} line ${lineNo}: expected ${header.length} fields, found ${fields.length}`,
      );
    }
    fields.forEach((value, i) => columns[i].push(value === NULL_SENTINEL ? null : value));
    rows++;
  }

  if (header === null || (header.length === 1 && header[0] === "")) {
    throw new FormatError(`${path}: no header row`);
  }
  return { header, columns, rows };
}

// ---------------------------------------------------------------------------
// Type inference
// ---------------------------------------------------------------------------

const INTEGER = /^-?\d+$/;

/**
 * Narrowest type that reproduces every non-null value exactly when printed
 * back ("007" or "1.50" stay strings).
 */
export function inferColumnType(values: readonly (string | null)[]): ColumnType {
  let int32 = true;
  let int64 = true;
  let double = true;
  let seen = false;

  for (const v of values) {
    if (v === null) continue;
    seen = true;
    if (int64 && INTEGER.test(v) && BigInt(v).toString() === v) {
      const big = BigInt(v);
      if (big < INT64_MIN || big > INT64_MAX) int64 = false;
      if (big < BigInt(INT32_MIN) || big > BigInt(INT32_MAX)) int32 = false;
    } else {
      int32 = false;
      int64 = false;
    }
    if (double) {
      const n = Number(v);
      if (v.trim() === "" || !Number.isFinite(n) || String(n) !== v) double = false;
    }
    if (!int64 && !double) return "STRING";
  }

  if (!seen) return "STRING";
  if (int32) return "INT32";
  if (int64) return "INT64";
  return double ? "DOUBLE" : "STRING";
}

function encodeColumn(values: (string | null)[], type: ColumnType) {
  switch (type) {
    case "INT32":
    case "DOUBLE":
      return values.map((v) => (v === null ? null : Number(v)));
    case "INT64":
      return values.map((v) => (v === null ? null : BigInt(v)));
    case "STRING":
      return values;
  }
}

/**
 * Column source for the writer. Text columns carry no physical type so the
 * writer annotates them as UTF8 byte arrays; an all-null text column has no
 * value to detect from and is declared BYTE_ARRAY.
 */
function columnSource(name: string, values: (string | null)[], type: ColumnType) {
  const data = encodeColumn(values, type);
  if (type !== "STRING") return { name, data, type };
  if (values.every((v) => v === null)) return { name, data, type: "BYTE_ARRAY" as const };
  return { name, data };
}

// ---------------------------------------------------------------------------
// Transformer
// ---------------------------------------------------------------------------

export interface TransformerOptions {
  codec?: ParquetCodec;
  logger?: Logger;
}

export class Transformer {
  private codec: ParquetCodec;
  private log: Logger;

  constructor(opts: TransformerOptions = {}) {
    this.codec = opts.codec ?? "snappy";
    this.log = opts.logger ?? createLogger("transformer");
  }

  async transform(rawPath: string, columnarPath: string): Promise<ConversionReport> {
    this.log.info(`Converting ${rawPath} to ${columnarPath}`);

    const rawBytes = await stat(rawPath).then(
      (s) => s.size,
      (err: unknown) => {
        throw new FormatError(`input not found: ${rawPath}`, { cause: err });
      },
    );

    let table: ParsedTable;
    try {
      table = await parseDelimited(rawPath);
    } catch (err) {
      if (err instanceof FormatError) throw err;
      throw new FormatError(`${rawPath}: ${errorMessage(err)}`, { cause: err });
    }
    this.log.info(`Read ${table.rows.toLocaleString("en-US")} rows with ${table.header.length} columns`);

    const columnData = table.header.map((name, i) => {
      const type = inferColumnType(table.columns[i]);
      this.log.debug(`  ${name}: ${type}`);
      return columnSource(name, table.columns[i], type);
    });
    const writeOptions = {
      columnData,
      compressed: this.codec === "snappy",
      statistics: true,
      rowGroupSize: ROW_GROUP_SIZE,
    };

    await mkdir(dirname(columnarPath), { recursive: true });
    const partPath = `${columnarPath}.part`;
    try {
      const buffer = parquetWriteBuffer(writeOptions);
      await writeFile(partPath, new Uint8Array(buffer));
      await rename(partPath, columnarPath);
    } catch (err) {
      await rm(partPath, { force: true });
      throw new FormatError(`${columnarPath}: ${errorMessage(err)}`, { cause: err });
    }

    const columnarBytes = (await stat(columnarPath)).size;
    const report: ConversionReport = {
      rows: table.rows,
      columns: table.header.length,
      rawBytes,
      columnarBytes,
      compressionRatio: rawBytes > 0 ? 1 - columnarBytes / rawBytes : 0,
    };
    this.log.info(
      `Conversion complete: ${columnarPath} (${(report.compressionRatio * 100).toFixed(1)}% size reduction)`,
    );
    return report;
  }
}
