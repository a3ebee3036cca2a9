import { AES_KEY_SIZE } from '../config/constants.js';
import { toHex } from '../util/bytes.js';
import type { KeyProvider, KeyResolution } from '../types/index.js';

/** Key slots the decoder asks for. */
export const KeySlot = {
  NCCHSecure1: 0x2C,
} as const;

export type KeySlotId = (typeof KeySlot)[keyof typeof KeySlot];

const MASK_128 = (1n << 128n) - 1n;
const SCRAMBLER_CONSTANT = 0x1FF9E9AAC5FE0408024591DC5D52768An;

function toBigInt(bytes: Uint8Array): bigint {
  return BigInt(`0x${toHex(bytes) || '0'}`);
}

function toBytes(value: bigint): Uint8Array {
  const out = new Uint8Array(AES_KEY_SIZE);
  let v = value;
  for (let i = AES_KEY_SIZE - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

function rol128(value: bigint, bits: bigint): bigint {
  return ((value << bits) | (value >> (128n - bits))) & MASK_128;
}

/**
 * Hardware key scrambler: `ROL((ROL(KeyX, 2) ^ KeyY) + C, 87)` over
 * 128-bit big-endian integers.
 */
export function scrambleKey(keyX: Uint8Array, keyY: Uint8Array): Uint8Array {
  if (keyX.byteLength !== AES_KEY_SIZE || keyY.byteLength !== AES_KEY_SIZE) {
    throw new RangeError(`KeyX and KeyY must be ${AES_KEY_SIZE} bytes`);
  }
  const mixed = (rol128(toBigInt(keyX), 2n) ^ toBigInt(keyY)) + SCRAMBLER_CONSTANT;
  return toBytes(rol128(mixed & MASK_128, 87n));
}

export interface SlotKeys {
  keyX?: Uint8Array;
  /** a pre-computed normal key; wins over KeyX when both are set */
  normalKey?: Uint8Array;
}

/**
 * In-memory key table. Each lookup derives the normal key from the slot's
 * KeyX and the KeyY it is given; nothing is cached between calls.
 */
export class ScramblerKeyProvider implements KeyProvider {
  private readonly slots = new Map<number, SlotKeys>();

  constructor(slots: Iterable<[number, SlotKeys]> = []) {
    for (const [slot, keys] of slots) this.setSlot(slot, keys);
  }

  setSlot(slot: number, keys: SlotKeys): void {
    for (const k of [keys.keyX, keys.normalKey]) {
      if (k && k.byteLength !== AES_KEY_SIZE) {
        throw new RangeError(`Slot 0x${slot.toString(16)} key must be ${AES_KEY_SIZE} bytes`);
      }
    }
    const prev = this.slots.get(slot) ?? {};
    this.slots.set(slot, {
      keyX     : keys.keyX?.slice() ?? prev.keyX,
      normalKey: keys.normalKey?.slice() ?? prev.normalKey,
    });
  }

  resolveNormalKey(slot: number, keyY: Uint8Array): KeyResolution {
    const keys = this.slots.get(slot);
    if (keys?.normalKey) return { available: true, key: keys.normalKey.slice() };
    if (!keys?.keyX) {
      return { available: false, reason: `Slot 0x${slot.toString(16).toUpperCase()} KeyX missing` };
    }
    return { available: true, key: scrambleKey(keys.keyX, keyY) };
  }
}
