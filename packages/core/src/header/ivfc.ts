// packages/core/src/header/ivfc.ts
import { IVFC_HEADER_SIZE } from '../config/constants.js';
import { view } from '../util/bytes.js';
import { requireLength } from './guard.js';

export interface IvfcLevel {
  offset       : bigint;
  size         : bigint;
  /** log2 of the level's block size */
  blockSizeLog2: number;
}

export interface IvfcHeader {
  magic         : number;
  version       : number;
  masterHashSize: number;
  levels        : [IvfcLevel, IvfcLevel, IvfcLevel];
}

export function decodeIvfcHeader(buf: Uint8Array): IvfcHeader {
  requireLength(buf, IVFC_HEADER_SIZE, 'IVFC header');
  const dv = view(buf);
  const level = (i: number): IvfcLevel => {
    const base = 0x0C + i * 0x18;
    return {
      offset       : dv.getBigUint64(base, true),
      size         : dv.getBigUint64(base + 8, true),
      blockSizeLog2: dv.getUint32(base + 16, true),
    };
  };
  return {
    magic         : dv.getUint32(0x00, true),
    version       : dv.getUint32(0x04, true),
    masterHashSize: dv.getUint32(0x08, true),
    levels        : [level(0), level(1), level(2)],
  };
}
