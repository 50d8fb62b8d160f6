import { MatrixError } from "./errors";

/**
 * Mutable view handed to {@link PackedStore.build} and
 * {@link PackedStore.update}. Writes land in a private copy; the writer is
 * closed once the callback returns, and any later call on it throws.
 */
export interface StoreWriter<V> {
  readonly length: number;
  readonly sparseExtent: number;
  get(index: number): V;
  set(index: number, value: V): void;
  reset(index: number): void;
}

function ensureLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new MatrixError(
      "E_INVALID_DIMENSION",
      `PackedStore: length (${length}) must be a non-negative integer`
    );
  }
}

function ensureIndex(index: number, length: number, context: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new MatrixError(
      "E_INDEX_OUT_OF_RANGE",
      `${context}: index ${index} is outside 0..${length - 1}`
    );
  }
}

type OpenWriter<V> = { writer: StoreWriter<V>; close(): void };

function createWriter<V>(cells: V[], length: number, defaultValue: V): OpenWriter<V> {
  let closed = false;
  const ensureOpen = (context: string): void => {
    if (closed) {
      throw new Error(`${context}: writer is closed once its callback returns`);
    }
  };
  const writer: StoreWriter<V> = {
    length,
    get sparseExtent() {
      return cells.length;
    },
    get(index) {
      ensureOpen("PackedStore.get");
      ensureIndex(index, length, "PackedStore.get");
      return index < cells.length ? cells[index] : defaultValue;
    },
    set(index, value) {
      ensureOpen("PackedStore.set");
      ensureIndex(index, length, "PackedStore.set");
      while (cells.length < index) {
        cells.push(defaultValue);
      }
      cells[index] = value;
    },
    reset(index) {
      ensureOpen("PackedStore.reset");
      ensureIndex(index, length, "PackedStore.reset");
      // the extent is a watermark and never moves back
      if (index < cells.length) {
        cells[index] = defaultValue;
      }
    },
  };
  return {
    writer,
    close() {
      closed = true;
    },
  };
}

function writeWith<V>(
  cells: V[],
  length: number,
  defaultValue: V,
  fn: (writer: StoreWriter<V>) => void
): V[] {
  const { writer, close } = createWriter(cells, length, defaultValue);
  try {
    fn(writer);
  } finally {
    close();
  }
  return cells;
}

/**
 * Fixed-length cell array with a single default value.
 *
 * Only the cells below the high-water mark are held; everything at or beyond
 * it reads back as the default. A store never changes after construction:
 * `set` and `reset` return a new store.
 */
export class PackedStore<V> {
  // cells.length is the high-water mark
  private readonly cells: readonly V[];
  readonly length: number;
  readonly defaultValue: V;

  private constructor(cells: readonly V[], length: number, defaultValue: V) {
    this.cells = cells;
    this.length = length;
    this.defaultValue = defaultValue;
  }

  static create<V>(length: number, defaultValue: V): PackedStore<V> {
    ensureLength(length);
    return new PackedStore<V>([], length, defaultValue);
  }

  /**
   * Copies the first `min(values.length, length)` values; the extent is the
   * number copied.
   */
  static fromValues<V>(values: readonly V[], length: number, defaultValue: V): PackedStore<V> {
    ensureLength(length);
    const copied = values.slice(0, Math.min(values.length, length));
    return new PackedStore<V>(copied, length, defaultValue);
  }

  static build<V>(
    length: number,
    defaultValue: V,
    fn: (writer: StoreWriter<V>) => void
  ): PackedStore<V> {
    ensureLength(length);
    const cells = writeWith<V>([], length, defaultValue, fn);
    return new PackedStore<V>(cells, length, defaultValue);
  }

  get sparseExtent(): number {
    return this.cells.length;
  }

  get(index: number): V {
    ensureIndex(index, this.length, "PackedStore.get");
    return index < this.cells.length ? this.cells[index] : this.defaultValue;
  }

  set(index: number, value: V): PackedStore<V> {
    return this.update((writer) => writer.set(index, value));
  }

  reset(index: number): PackedStore<V> {
    return this.update((writer) => writer.reset(index));
  }

  update(fn: (writer: StoreWriter<V>) => void): PackedStore<V> {
    const cells = writeWith(this.cells.slice(), this.length, this.defaultValue, fn);
    return new PackedStore<V>(cells, this.length, this.defaultValue);
  }

  sparseValues(): V[] {
    return this.cells.slice();
  }

  toArray(): V[] {
    const out = this.cells.slice();
    while (out.length < this.length) {
      out.push(this.defaultValue);
    }
    return out;
  }
}
