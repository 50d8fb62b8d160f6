export type MatrixErrorCode =
  | "E_INDEX_OUT_OF_RANGE"
  | "E_POSITION_OUT_OF_BOUNDS"
  | "E_SHAPE_MISMATCH"
  | "E_INVALID_DIMENSION"
  | "E_NOT_FOUND"
  | "E_ARCHIVE_FORMAT";

const ERROR_CODES: readonly MatrixErrorCode[] = [
  "E_INDEX_OUT_OF_RANGE",
  "E_POSITION_OUT_OF_BOUNDS",
  "E_SHAPE_MISMATCH",
  "E_INVALID_DIMENSION",
  "E_NOT_FOUND",
  "E_ARCHIVE_FORMAT",
];

export class MatrixError extends Error {
  readonly code: MatrixErrorCode;

  constructor(code: MatrixErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MatrixError";
    this.code = code;
  }
}

export function isMatrixError(error: unknown, code?: MatrixErrorCode): error is MatrixError {
  if (!(error instanceof MatrixError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

function isErrorCode(value: string): value is MatrixErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

/**
 * Splits a `"E_CODE: detail"` message into its parts. Returns null when the
 * prefix is not one of the library's codes.
 */
export function parseErrorString(message: string): { code: MatrixErrorCode; message: string } | null {
  const separatorIndex = message.indexOf(": ");
  if (separatorIndex <= 0) {
    return null;
  }
  const code = message.slice(0, separatorIndex);
  if (!isErrorCode(code)) {
    return null;
  }
  return { code, message: message.slice(separatorIndex + 2) };
}

export function normalizeError(error: unknown): Error {
  if (error instanceof MatrixError) {
    return error;
  }
  if (error instanceof Error) {
    const parsed = parseErrorString(error.message);
    return parsed ? new MatrixError(parsed.code, parsed.message, { cause: error }) : error;
  }
  const coerced = typeof error === "string" ? error : String(error);
  const parsed = parseErrorString(coerced);
  if (parsed) {
    return new MatrixError(parsed.code, parsed.message);
  }
  return new Error(coerced);
}
