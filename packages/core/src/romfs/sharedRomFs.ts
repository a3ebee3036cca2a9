// packages/core/src/romfs/sharedRomFs.ts
import {
  IVFC_HEADER_SIZE,
  IVFC_MAGIC,
  IVFC_VERSION,
  MEDIA_UNIT,
  NCCH_HEADER_SIZE,
} from '../config/constants.js';
import { ContractViolationError } from '../errors/index.js';
import { decodeIvfcHeader } from '../header/ivfc.js';
import { decodeNcchHeader } from '../header/ncch.js';

function check(cond: boolean, msg: string): asserts cond {
  if (!cond) throw new ContractViolationError(msg);
}

export function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

/**
 * Pull the level-3 payload (the RomFS proper) out of a fully resident,
 * already decrypted container, e.g. a shared system archive.
 *
 * The input is trusted; any inconsistency throws {@link ContractViolationError}.
 */
export function loadSharedRomFs(data: Uint8Array): Uint8Array {
  check(data.byteLength >= NCCH_HEADER_SIZE, 'NCCH size is too small');
  const header = decodeNcchHeader(data.subarray(0, NCCH_HEADER_SIZE));

  const offset = header.romfsOffset * MEDIA_UNIT;
  check(data.byteLength >= offset + IVFC_HEADER_SIZE, 'NCCH size is too small');
  const ivfc = decodeIvfcHeader(data.subarray(offset, offset + IVFC_HEADER_SIZE));

  check(ivfc.magic === IVFC_MAGIC, 'IVFC magic is incorrect');
  check(ivfc.version === IVFC_VERSION, 'IVFC version is incorrect');

  const level = ivfc.levels[2];
  check(level.blockSizeLog2 < 32, `IVFC block size 2^${level.blockSizeLog2} is out of range`);
  check(level.size <= BigInt(Number.MAX_SAFE_INTEGER), 'IVFC level 3 size is out of range');
  const size = Number(level.size);

  // level 3 starts at the first block boundary after header + master hash
  const dataOffset = offset
    + alignUp(IVFC_HEADER_SIZE + ivfc.masterHashSize, 2 ** level.blockSizeLog2);
  check(data.byteLength >= dataOffset + size, 'NCCH size is too small for the RomFS payload');

  return data.slice(dataOffset, dataOffset + size);
}
