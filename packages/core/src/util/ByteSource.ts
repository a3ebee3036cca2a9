// packages/core/src/util/ByteSource.ts
import { assertSliceBounds } from './range.js';

/**
 * Minimal random-access reader the container decoder consumes.
 */
export interface RandomAccessSource {
  /** total length in bytes */
  readonly length: number;
  /**
   * return a copy of bytes `[offset, offset + len)`
   * throws if the range is out of bounds
   */
  read(offset: number, len: number): Promise<Uint8Array>;
}

/**
 * Unified, zero‑copy accessor for Blob | Uint8Array.
 * Slices are read on‑demand so even multi‑gigabyte Blobs are handled
 * without loading them fully into memory.
 */
export class ByteSource implements RandomAccessSource {
  constructor(private readonly src: Blob | Uint8Array) {}

  /** Total byte length of the underlying data */
  get length(): number {
    if (this.src instanceof Uint8Array) return this.src.byteLength;
    return this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as Uint8Array.
   * The returned view is a fresh copy — safe to mutate by caller.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);

    // Uint8Array path – cheapest
    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }

    // Blob path – use slice() + arrayBuffer()
    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }
}
