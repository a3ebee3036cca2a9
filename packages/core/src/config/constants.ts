// packages/core/src/config/constants.ts
import { magic } from '../util/bytes.js';

/** All offsets and sizes in the outer header count in media units. */
export const MEDIA_UNIT = 0x200;

export const NCCH_MAGIC = magic('NCCH');
export const IVFC_MAGIC = magic('IVFC');
export const IVFC_VERSION = 0x10000;

export const NCCH_HEADER_SIZE     = 0x200;
/** SCI + ACI + access descriptor: the whole range under the ExHeader counter. */
export const EXHEADER_SIZE        = 0x800;
export const EXEFS_HEADER_SIZE    = 0x200;
export const IVFC_HEADER_SIZE     = 0x60;

/** The ExHeader always directly follows the outer header. */
export const EXHEADER_OFFSET      = NCCH_HEADER_SIZE;

export const EXEFS_MAX_SECTIONS   = 8;
export const EXEFS_NAME_LENGTH    = 8;

export const AES_BLOCK_SIZE = 16;
export const AES_KEY_SIZE   = 16;

/** Bits of `NcchHeader.flags[7]`. */
export const NcchFlag = {
  fixedKey   : 0x01,
  noMountRomFs: 0x02,
  noCrypto   : 0x04,
} as const;

/** Storage-info "other attributes": the extdata id list is in use. */
export const EXTENDED_EXTDATA_ACCESS = 0x01;
