// packages/core/src/header/exheader.ts
import { EXHEADER_SIZE } from '../config/constants.js';
import { readAscii, view } from '../util/bytes.js';
import { requireLength } from './guard.js';

export interface CodeSegment {
  address : number;
  numPages: number;
  size    : number;
}

export interface StorageInfo {
  /** legacy single ext save data id; also carries extdata ids 3..5 */
  extSaveDataId            : bigint;
  systemSaveDataIds        : [number, number];
  /** also carries extdata ids 0..2 */
  storageAccessibleUniqueIds: bigint;
  /** six 20-bit ids in slot order 0..5 */
  extdataIds               : bigint[];
  accessInfo               : bigint;
  otherAttributes          : number;
}

export interface ExtendedHeader {
  name            : string;
  remasterVersion : number;
  text            : CodeSegment;
  ro              : CodeSegment;
  data            : CodeSegment;
  stackSize       : number;
  bssSize         : number;
  /** non-zero entries of the dependency list */
  dependencies    : bigint[];
  saveDataSize    : bigint;
  jumpId          : bigint;
  programId       : bigint;
  coreVersion     : number;
  idealProcessor  : number;
  affinityMask    : number;
  systemMode      : number;
  priority        : number;
  storageInfo     : StorageInfo;
  resourceLimitCategory: number;
}

const JUMP_ID_OFFSET = 0x1C8;
const DEPENDENCY_COUNT = 48;
const EXTDATA_ID_MASK = 0xFFFFFn;

function segment(dv: DataView, off: number): CodeSegment {
  return {
    address : dv.getUint32(off, true),
    numPages: dv.getUint32(off + 4, true),
    size    : dv.getUint32(off + 8, true),
  };
}

function extdataTriplet(word: bigint): bigint[] {
  return [0n, 20n, 40n].map((shift) => (word >> shift) & EXTDATA_ID_MASK);
}

/** Jump id as stored, without decoding the rest of the header. */
export function peekJumpId(buf: Uint8Array): bigint {
  requireLength(buf, JUMP_ID_OFFSET + 8, 'ExHeader jump id');
  return view(buf).getBigUint64(JUMP_ID_OFFSET, true);
}

export function decodeExtendedHeader(buf: Uint8Array): ExtendedHeader {
  requireLength(buf, EXHEADER_SIZE, 'ExHeader');
  const dv = view(buf);

  const dependencies: bigint[] = [];
  for (let i = 0; i < DEPENDENCY_COUNT; i++) {
    const id = dv.getBigUint64(0x40 + i * 8, true);
    if (id !== 0n) dependencies.push(id);
  }

  const extSaveDataId = dv.getBigUint64(0x230, true);
  const uniqueIds     = dv.getBigUint64(0x240, true);
  let accessInfo = 0n;
  for (let i = 6; i >= 0; i--) accessInfo = (accessInfo << 8n) | BigInt(buf[0x248 + i]);

  const flags0 = buf[0x20E];

  return {
    name           : readAscii(buf, 0x000, 8),
    remasterVersion: dv.getUint16(0x00E, true),
    text           : segment(dv, 0x010),
    stackSize      : dv.getUint32(0x01C, true),
    ro             : segment(dv, 0x020),
    data           : segment(dv, 0x030),
    bssSize        : dv.getUint32(0x03C, true),
    dependencies,
    saveDataSize   : dv.getBigUint64(0x1C0, true),
    jumpId         : dv.getBigUint64(JUMP_ID_OFFSET, true),
    programId      : dv.getBigUint64(0x200, true),
    coreVersion    : dv.getUint32(0x208, true),
    idealProcessor : flags0 & 0b11,
    affinityMask   : (flags0 >> 2) & 0b11,
    systemMode     : flags0 >> 4,
    priority       : buf[0x20F],
    storageInfo: {
      extSaveDataId,
      systemSaveDataIds: [dv.getUint32(0x238, true), dv.getUint32(0x23C, true)],
      storageAccessibleUniqueIds: uniqueIds,
      extdataIds     : [...extdataTriplet(uniqueIds), ...extdataTriplet(extSaveDataId)],
      accessInfo,
      otherAttributes: buf[0x24F],
    },
    resourceLimitCategory: buf[0x36F],
  };
}
