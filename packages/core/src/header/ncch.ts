// packages/core/src/header/ncch.ts
import { NCCH_HEADER_SIZE, NcchFlag } from '../config/constants.js';
import { readAscii, view } from '../util/bytes.js';
import { requireLength } from './guard.js';

export interface NcchHeader {
  signature        : Uint8Array;   // 0x100 bytes, RSA-2048 over 0x100..0x200
  magic            : number;
  /** media units */
  contentSize      : number;
  /** raw little-endian bytes; the counters are built from these */
  partitionId      : Uint8Array;
  makerCode        : number;
  version          : number;
  programId        : bigint;
  productCode      : string;
  extendedHeaderSize: number;
  flags            : Uint8Array;   // 8 bytes
  fixedKey         : boolean;
  noRomFs          : boolean;
  noCrypto         : boolean;
  plainRegionOffset: number;
  plainRegionSize  : number;
  logoRegionOffset : number;
  logoRegionSize   : number;
  exefsOffset      : number;
  exefsSize        : number;
  exefsHashRegionSize: number;
  romfsOffset      : number;
  romfsSize        : number;
  romfsHashRegionSize: number;
}

/**
 * Decode the 0x200-byte outer header. Nothing is validated here;
 * the magic check belongs to the caller.
 */
export function decodeNcchHeader(buf: Uint8Array): NcchHeader {
  requireLength(buf, NCCH_HEADER_SIZE, 'NCCH header');
  const dv    = view(buf);
  const flags = buf.slice(0x188, 0x190);

  return {
    signature         : buf.slice(0x000, 0x100),
    magic             : dv.getUint32(0x100, true),
    contentSize       : dv.getUint32(0x104, true),
    partitionId       : buf.slice(0x108, 0x110),
    makerCode         : dv.getUint16(0x110, true),
    version           : dv.getUint16(0x112, true),
    programId         : dv.getBigUint64(0x118, true),
    productCode       : readAscii(buf, 0x150, 0x10),
    extendedHeaderSize: dv.getUint32(0x180, true),
    flags,
    fixedKey          : (flags[7] & NcchFlag.fixedKey) !== 0,
    noRomFs           : (flags[7] & NcchFlag.noMountRomFs) !== 0,
    noCrypto          : (flags[7] & NcchFlag.noCrypto) !== 0,
    plainRegionOffset : dv.getUint32(0x190, true),
    plainRegionSize   : dv.getUint32(0x194, true),
    logoRegionOffset  : dv.getUint32(0x198, true),
    logoRegionSize    : dv.getUint32(0x19C, true),
    exefsOffset       : dv.getUint32(0x1A0, true),
    exefsSize         : dv.getUint32(0x1A4, true),
    exefsHashRegionSize: dv.getUint32(0x1A8, true),
    romfsOffset       : dv.getUint32(0x1B0, true),
    romfsSize         : dv.getUint32(0x1B4, true),
    romfsHashRegionSize: dv.getUint32(0x1B8, true),
  };
}
