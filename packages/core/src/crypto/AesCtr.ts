import { ctr } from '@noble/ciphers/aes.js';
import { AES_BLOCK_SIZE, AES_KEY_SIZE } from '../config/constants.js';
import { CipherError } from '../errors/index.js';

/**
 * AES-128 in counter mode with a seekable keystream.
 *
 * ## Counter
 * - The 16-byte IV is the initial counter block; it is incremented as one
 *   128-bit big-endian integer per block, carrying across all bytes.
 *
 * ## Seeking
 * - {@link decryptAt} starts the keystream at an arbitrary byte position:
 *   the counter is advanced by `offset / 16` blocks and the first
 *   `offset % 16` keystream bytes are discarded.
 *
 * Encryption and decryption are the same XOR; both names exist so call sites
 * read the way the data flows.
 */
export class AesCtrCipher {
  private readonly key: Uint8Array;
  private readonly iv : Uint8Array;

  constructor(key: Uint8Array, iv: Uint8Array) {
    if (key.byteLength !== AES_KEY_SIZE) {
      throw new CipherError(`AES-CTR key must be ${AES_KEY_SIZE} bytes, got ${key.byteLength}`);
    }
    if (iv.byteLength !== AES_BLOCK_SIZE) {
      throw new CipherError(`AES-CTR counter must be ${AES_BLOCK_SIZE} bytes, got ${iv.byteLength}`);
    }
    this.key = key.slice();
    this.iv  = iv.slice();
  }

  /** XOR `buf` in place with the keystream starting at byte `offset`. */
  decryptAt(offset: number, buf: Uint8Array): Uint8Array {
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new CipherError(`Invalid keystream offset: ${offset}`);
    }
    if (buf.byteLength === 0) return buf;

    const skip    = offset % AES_BLOCK_SIZE;
    const counter = advanceCounter(this.iv, Math.floor(offset / AES_BLOCK_SIZE));

    const padded = new Uint8Array(skip + buf.byteLength);
    padded.set(buf, skip);
    const out = ctr(this.key, counter).decrypt(padded);
    buf.set(out.subarray(skip));
    return buf;
  }

  encryptAt(offset: number, buf: Uint8Array): Uint8Array {
    return this.decryptAt(offset, buf);
  }
}

/** `counter + blocks` as a 128-bit big-endian integer, wrapping at 2^128. */
export function advanceCounter(counter: Uint8Array, blocks: number): Uint8Array {
  const out = counter.slice();
  let carry = blocks;
  for (let i = out.length - 1; i >= 0 && carry > 0; i--) {
    const sum = out[i] + (carry % 256);
    out[i]    = sum & 0xff;
    carry     = Math.floor(carry / 256) + (sum >> 8);
  }
  return out;
}
