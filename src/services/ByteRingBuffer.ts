export const DEFAULT_MAX_BUFFER_BYTES = 3 * 1024 * 1024;

const INITIAL_CAPACITY = 64 * 1024;

export type TrimOutcome = 'none' | 'trimmed' | 'cleared';

export interface ByteRingBufferOptions {
  /** Hard cap on buffered bytes. */
  maxBytes?: number;
  /** Pattern the overflow policy trims back to. */
  marker: Uint8Array;
}

/**
 * Growable byte accumulator for partially received stream data.
 *
 * Bytes live in `store[start, end)`. Removing a prefix only advances `start`;
 * the live region is compacted back to offset 0 when an append needs room.
 * When an append pushes the length past `maxBytes`, the buffer is trimmed to
 * begin at the last occurrence of `marker`, or cleared when there is none,
 * and storage grown for the oversized append is released.
 */
export class ByteRingBuffer {
  private store: Uint8Array;
  private start = 0;
  private end = 0;
  private readonly maxBytes: number;
  private readonly marker: Uint8Array;

  constructor(options: ByteRingBufferOptions) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BUFFER_BYTES;
    this.marker = options.marker;
    this.store = new Uint8Array(Math.min(INITIAL_CAPACITY, this.maxBytes));
  }

  get length(): number {
    return this.end - this.start;
  }

  get capacity(): number {
    return this.store.length;
  }

  append(chunk: Uint8Array): TrimOutcome {
    if (chunk.length === 0) {
      return 'none';
    }
    this.reserve(chunk.length);
    this.store.set(chunk, this.end);
    this.end += chunk.length;

    if (this.length <= this.maxBytes) {
      return 'none';
    }
    return this.enforceCap();
  }

  /** First offset >= `from` where `pattern` matches, or -1. */
  indexOf(pattern: Uint8Array, from = 0): number {
    const length = this.length;
    if (pattern.length === 0 || from < 0 || from > length - pattern.length) {
      return -1;
    }
    const view = this.view();
    const first = pattern[0];
    const last = length - pattern.length;
    let i = view.indexOf(first, from);
    while (i !== -1 && i <= last) {
      if (matchesAt(view, pattern, i)) {
        return i;
      }
      i = view.indexOf(first, i + 1);
    }
    return -1;
  }

  lastIndexOf(pattern: Uint8Array): number {
    const length = this.length;
    if (pattern.length === 0 || pattern.length > length) {
      return -1;
    }
    const view = this.view();
    const first = pattern[0];
    let i = view.lastIndexOf(first, length - pattern.length);
    while (i !== -1) {
      if (matchesAt(view, pattern, i)) {
        return i;
      }
      if (i === 0) {
        break;
      }
      i = view.lastIndexOf(first, i - 1);
    }
    return -1;
  }

  /** Copy of the bytes in `[from, to)`. */
  slice(from: number, to: number): Uint8Array {
    return this.view().slice(from, to);
  }

  /** Remove `[from, to)`. A prefix removal is O(1). */
  removeRange(from: number, to: number): void {
    const length = this.length;
    const lo = Math.max(0, Math.min(from, length));
    const hi = Math.max(lo, Math.min(to, length));
    if (hi === lo) {
      return;
    }
    if (lo === 0) {
      this.start += hi;
    } else {
      this.store.copyWithin(this.start + lo, this.start + hi, this.end);
      this.end -= hi - lo;
    }
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  clear(): void {
    this.start = 0;
    this.end = 0;
  }

  private view(): Uint8Array {
    return this.store.subarray(this.start, this.end);
  }

  private reserve(extra: number): void {
    if (this.end + extra <= this.store.length) {
      return;
    }
    const length = this.length;
    if (length + extra <= this.store.length) {
      this.store.copyWithin(0, this.start, this.end);
    } else {
      let next = Math.max(this.store.length * 2, 1);
      while (next < length + extra) {
        next *= 2;
      }
      const grown = new Uint8Array(next);
      grown.set(this.view());
      this.store = grown;
    }
    this.start = 0;
    this.end = length;
  }

  private enforceCap(): TrimOutcome {
    const lastMarker = this.lastIndexOf(this.marker);
    let outcome: TrimOutcome = 'cleared';
    if (lastMarker > 0) {
      this.removeRange(0, lastMarker);
      if (this.length <= this.maxBytes) {
        outcome = 'trimmed';
      }
    }
    if (outcome === 'cleared') {
      this.clear();
    }
    this.shrink();
    return outcome;
  }

  private shrink(): void {
    let target = Math.min(INITIAL_CAPACITY, this.maxBytes);
    while (target < this.length) {
      target *= 2;
    }
    if (target >= this.store.length) {
      return;
    }
    const length = this.length;
    const shrunk = new Uint8Array(target);
    shrunk.set(this.view());
    this.store = shrunk;
    this.start = 0;
    this.end = length;
  }
}

function matchesAt(source: Uint8Array, pattern: Uint8Array, offset: number): boolean {
  for (let j = 1; j < pattern.length; j++) {
    if (source[offset + j] !== pattern[j]) {
      return false;
    }
  }
  return true;
}
