import { strFromU8, strToU8, unzipSync, zipSync } from "fflate";
import { MatrixError, normalizeError } from "../errors";
import { Matrix } from "../matrix";
import { PackedStore } from "../store";

export type ArchiveValue = number | string | boolean | null;

export type NamedMatrix<V extends ArchiveValue = ArchiveValue> = {
  name: string;
  matrix: Matrix<V>;
};

const MATRIX_FORMAT = "tessera-matrix";
const MATRIX_VERSION = 1;
const ENTRY_SUFFIX = ".json";

type MatrixDocument = {
  format: typeof MATRIX_FORMAT;
  version: number;
  rows: number;
  columns: number;
  default: ArchiveValue;
  cells: ArchiveValue[];
};

function toBytes(data: ArrayBuffer | Uint8Array): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArchiveValue(value: unknown): value is ArchiveValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function formatError(context: string, detail: string, cause?: unknown): MatrixError {
  return new MatrixError("E_ARCHIVE_FORMAT", `${context}: ${detail}`, { cause });
}

function parseDocument(content: Uint8Array, context: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(strFromU8(content));
  } catch (error) {
    throw formatError(context, normalizeError(error).message, error);
  }
  if (!isRecord(parsed)) {
    throw formatError(context, "expected a JSON object");
  }
  return parsed;
}

function documentToMatrix(document: Record<string, unknown>, context: string): Matrix<ArchiveValue> {
  const { version, rows, columns, cells } = document;
  const defaultValue = document.default;
  if (version !== MATRIX_VERSION) {
    throw formatError(context, `unsupported version ${String(version)}`);
  }
  if (
    typeof rows !== "number" ||
    typeof columns !== "number" ||
    !Number.isInteger(rows) ||
    !Number.isInteger(columns) ||
    rows < 1 ||
    columns < 1
  ) {
    throw formatError(context, "rows and columns must be positive integers");
  }
  if (!isArchiveValue(defaultValue)) {
    throw formatError(context, "default must be a number, string, boolean or null");
  }
  if (!Array.isArray(cells) || !cells.every(isArchiveValue)) {
    throw formatError(context, "cells must be an array of numbers, strings, booleans or nulls");
  }
  if (cells.length > rows * columns) {
    throw formatError(
      context,
      `${cells.length} cells do not fit shape (${rows} x ${columns})`
    );
  }
  const store = PackedStore.fromValues<ArchiveValue>(cells, rows * columns, defaultValue);
  return Matrix.fromStore(store, rows, columns);
}

/**
 * Encodes one matrix as UTF-8 JSON. Only the cells below the sparse extent
 * are written, so the extent is restored on read.
 */
export function writeMatrix<V extends ArchiveValue>(matrix: Matrix<V>): Uint8Array {
  // JSON has no NaN or Infinity; they would come back as null
  if (!isArchiveValue(matrix.defaultValue)) {
    throw formatError("writeMatrix", `default ${String(matrix.defaultValue)} cannot be stored`);
  }
  const cells = matrix.store.sparseValues();
  const bad = cells.findIndex((cell) => !isArchiveValue(cell));
  if (bad >= 0) {
    throw formatError("writeMatrix", `cell ${bad} (${String(cells[bad])}) cannot be stored`);
  }
  const document: MatrixDocument = {
    format: MATRIX_FORMAT,
    version: MATRIX_VERSION,
    rows: matrix.rows,
    columns: matrix.columns,
    default: matrix.defaultValue,
    cells,
  };
  return strToU8(JSON.stringify(document));
}

export function readMatrix(data: ArrayBuffer | Uint8Array): Matrix<ArchiveValue> {
  const document = parseDocument(toBytes(data), "readMatrix");
  if (document.format !== MATRIX_FORMAT) {
    throw formatError("readMatrix", `unknown format ${String(document.format)}`);
  }
  return documentToMatrix(document, "readMatrix");
}

export function writeArchive<V extends ArchiveValue>(entries: readonly NamedMatrix<V>[]): Uint8Array {
  if (entries.length === 0) {
    throw formatError("writeArchive", "at least one matrix entry is required");
  }
  const archive: Record<string, Uint8Array> = {};
  for (const entry of entries) {
    const key = entry.name.length > 0 ? `${entry.name}${ENTRY_SUFFIX}` : `matrix${ENTRY_SUFFIX}`;
    if (key in archive) {
      throw formatError("writeArchive", `duplicate entry "${key}"`);
    }
    archive[key] = writeMatrix(entry.matrix);
  }
  return zipSync(archive);
}

export function readArchive(data: ArrayBuffer | Uint8Array): NamedMatrix[] {
  let archive: Record<string, Uint8Array>;
  try {
    archive = unzipSync(toBytes(data));
  } catch (error) {
    throw formatError("readArchive", normalizeError(error).message, error);
  }
  const results: NamedMatrix[] = [];
  for (const [name, content] of Object.entries(archive)) {
    if (!name.endsWith(ENTRY_SUFFIX)) {
      continue;
    }
    const context = `readArchive(${name})`;
    const document = parseDocument(content, context);
    if (document.format !== MATRIX_FORMAT) {
      console.warn(`[tessera] Skipping archive entry "${name}": not a matrix document`);
      continue;
    }
    results.push({
      name: name.slice(0, -ENTRY_SUFFIX.length),
      matrix: documentToMatrix(document, context),
    });
  }
  return results;
}
