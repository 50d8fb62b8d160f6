import type { Matrix } from "./matrix";

export type OutputFormat = {
  delimiter: string; // between cells of a row
  lineEnding: string; // between rows
  padTo: number; // min cell width
  align: "left" | "right";
  formatValue: (value: unknown) => string;
};

const DEFAULT_OUTPUT_FORMAT: OutputFormat = {
  delimiter: "\t",
  lineEnding: "\n",
  padTo: 0,
  align: "right",
  formatValue: (value) => String(value),
};

let CURRENT_OUTPUT_FORMAT: OutputFormat = { ...DEFAULT_OUTPUT_FORMAT };
const OUTPUT_FORMAT_STACK: OutputFormat[] = [];

export function setOutputFormat(options: Partial<OutputFormat>): void {
  CURRENT_OUTPUT_FORMAT = { ...CURRENT_OUTPUT_FORMAT, ...options };
}

export function getOutputFormat(): OutputFormat {
  return { ...CURRENT_OUTPUT_FORMAT };
}

export function resetOutputFormat(): void {
  CURRENT_OUTPUT_FORMAT = { ...DEFAULT_OUTPUT_FORMAT };
  OUTPUT_FORMAT_STACK.length = 0;
}

/**
 * Saves the current format on the stack and applies `options` on top of it.
 * The returned function unwinds the stack to this entry, dropping any scope
 * opened after it; it does nothing after the first call or after
 * {@link resetOutputFormat}.
 */
function pushOutputFormat(options: Partial<OutputFormat>): () => void {
  const depth = OUTPUT_FORMAT_STACK.length;
  OUTPUT_FORMAT_STACK.push(CURRENT_OUTPUT_FORMAT);
  setOutputFormat(options);
  const saved = OUTPUT_FORMAT_STACK[depth];
  return () => {
    if (OUTPUT_FORMAT_STACK[depth] !== saved) {
      return;
    }
    CURRENT_OUTPUT_FORMAT = saved;
    OUTPUT_FORMAT_STACK.length = depth;
  };
}

export async function withOutputFormat<T>(
  options: Partial<OutputFormat>,
  fn: () => T | Promise<T>
): Promise<T> {
  const restore = pushOutputFormat(options);
  try {
    return await fn();
  } finally {
    restore();
  }
}

// For callers that cannot await
export function scopedOutputFormat(options: Partial<OutputFormat>): { restore(): void } {
  return { restore: pushOutputFormat(options) };
}

export function formatMatrix<V>(matrix: Matrix<V>, options: Partial<OutputFormat> = {}): string {
  const format = { ...CURRENT_OUTPUT_FORMAT, ...options };
  const pad = (cell: string): string => {
    if (format.padTo <= 0) {
      return cell;
    }
    return format.align === "left" ? cell.padEnd(format.padTo) : cell.padStart(format.padTo);
  };
  const lines = matrix
    .toNested()
    .map((values) => values.map((value) => pad(format.formatValue(value))).join(format.delimiter));
  const header = `Matrix(${matrix.rows}x${matrix.columns}, default=${format.formatValue(matrix.defaultValue)})`;
  return [header, ...lines].join(format.lineEnding);
}
