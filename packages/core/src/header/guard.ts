import { HeaderTooShortError } from '../errors/index.js';

export function requireLength(buf: Uint8Array, size: number, what: string): void {
  if (buf.byteLength < size) {
    throw new HeaderTooShortError(
      `${what} needs 0x${size.toString(16)} bytes, got 0x${buf.byteLength.toString(16)}`,
    );
  }
}
