import { AES_BLOCK_SIZE, EXHEADER_OFFSET } from '../config/constants.js';
import { UnsupportedVersionError } from '../errors/index.js';
import type { SectionCounters } from '../types/index.js';

function u32BE(target: Uint8Array, at: number, value: number): void {
  new DataView(target.buffer, target.byteOffset, target.byteLength).setUint32(at, value >>> 0, false);
}

/**
 * Initial counter blocks for the ExHeader and ExeFS of a container.
 *
 * - Version 0 / 2: partition id byte-reversed, then a section tag at byte 8
 *   (1 = ExHeader, 2 = ExeFS).
 * - Version 1: partition id as stored, then the section's byte offset
 *   big-endian in the last four bytes, as if the whole image were a single
 *   CTR stream.
 *
 * @throws {UnsupportedVersionError} for any other version
 */
export function deriveCounters(
  version       : number,
  partitionId   : Uint8Array,
  exefsByteOffset: number,
): SectionCounters {
  if (partitionId.byteLength !== 8) {
    throw new RangeError(`Partition id must be 8 bytes, got ${partitionId.byteLength}`);
  }
  const exheader = new Uint8Array(AES_BLOCK_SIZE);
  const exefs    = new Uint8Array(AES_BLOCK_SIZE);

  switch (version) {
    case 0:
    case 2: {
      const reversed = partitionId.slice().reverse();
      exheader.set(reversed, 0);
      exefs.set(reversed, 0);
      exheader[8] = 1;
      exefs[8]    = 2;
      break;
    }
    case 1:
      exheader.set(partitionId, 0);
      exefs.set(partitionId, 0);
      u32BE(exheader, 12, EXHEADER_OFFSET);
      u32BE(exefs, 12, exefsByteOffset);
      break;
    default:
      throw new UnsupportedVersionError(`Unknown NCCH version ${version}`);
  }
  return { exheader, exefs };
}
