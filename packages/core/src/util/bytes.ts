/* ------------------------------------------------------------------
   Little helpers over Uint8Array used by the header decoders
   ------------------------------------------------------------------ */

export function view(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/** Fixed-width ASCII field, cut at the first NUL. */
export function readAscii(buf: Uint8Array, offset: number, len: number): string {
  let s = '';
  for (let i = offset; i < offset + len; i++) {
    if (buf[i] === 0) break;
    s += String.fromCharCode(buf[i]);
  }
  return s;
}

export function magic(text: string): number {
  if (text.length !== 4) throw new TypeError(`magic must be 4 chars: ${text}`);
  return (
    text.charCodeAt(0) |
    (text.charCodeAt(1) << 8) |
    (text.charCodeAt(2) << 16) |
    (text.charCodeAt(3) << 24)
  ) >>> 0;
}

export function toHex(buf: Uint8Array): string {
  let s = '';
  for (const b of buf) s += b.toString(16).padStart(2, '0');
  return s;
}

export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new TypeError(`Invalid hex string of length ${hex.length}`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  return out;
}

/** `0x` + upper-case, zero padded — matches how ids are usually written. */
export function formatId(value: bigint | number, width = 16): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}
