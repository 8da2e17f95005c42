/**
 * Append-only output that can be truncated back to an earlier position.
 * The engine writes through this interface so the same scan can either
 * measure the output or produce it.
 */
export interface OutputSink {
  /** Number of bytes written so far. */
  readonly position: number;
  write(byte: number): void;
  writeBytes(bytes: Uint8Array): void;
  /**
   * Discards everything after `position`.
   * @throws {RangeError} If `position` is negative or past the current position
   */
  rewind(position: number): void;
}

function assertRewindTarget(target: number, current: number): void {
  if (!Number.isInteger(target) || target < 0 || target > current) {
    throw new RangeError(
      `Cannot rewind to position ${String(target)}; current position is ${String(current)}`,
    );
  }
}

/**
 * Sink that keeps the written bytes in a growable buffer.
 */
export class BufferSink implements OutputSink {
  private buffer: Uint8Array;
  private length = 0;

  constructor(initialCapacity = 0) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 16));
  }

  get position(): number {
    return this.length;
  }

  write(byte: number): void {
    this.reserve(1);
    this.buffer[this.length++] = byte;
  }

  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  rewind(position: number): void {
    assertRewindTarget(position, this.length);
    this.length = position;
  }

  /**
   * Copies the written bytes into a Buffer.
   */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.length));
  }

  private reserve(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }
}

/**
 * Sink that only tracks sizes. Used to answer "would anything change" and
 * to size the real output buffer without materializing the output.
 */
export class CountingSink implements OutputSink {
  private current = 0;
  private maximum = 0;

  get position(): number {
    return this.current;
  }

  /** Largest position reached at any point, including before rewinds. */
  get maximumPosition(): number {
    return this.maximum;
  }

  write(_byte: number): void {
    this.advance(1);
  }

  writeBytes(bytes: Uint8Array): void {
    this.advance(bytes.length);
  }

  rewind(position: number): void {
    assertRewindTarget(position, this.current);
    this.current = position;
  }

  private advance(count: number): void {
    this.current += count;
    if (this.current > this.maximum) this.maximum = this.current;
  }
}
