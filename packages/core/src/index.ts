// packages/core/src/index.ts

export {
  NcchContainer,
  type NcchContainerOptions,
} from './container/NcchContainer.js';
export { loadSharedRomFs } from './romfs/sharedRomFs.js';

export { AesCtrCipher, advanceCounter } from './crypto/AesCtr.js';
export { deriveCounters } from './crypto/counters.js';
export {
  KeySlot,
  ScramblerKeyProvider,
  scrambleKey,
  type KeySlotId,
  type SlotKeys,
} from './crypto/keys.js';

export { decodeNcchHeader, type NcchHeader } from './header/ncch.js';
export {
  decodeExtendedHeader,
  type CodeSegment,
  type ExtendedHeader,
  type StorageInfo,
} from './header/exheader.js';
export {
  decodeExeFsHeader,
  findSection,
  type ExeFsHeader,
  type ExeFsSection,
} from './header/exefs.js';
export { decodeIvfcHeader, type IvfcHeader, type IvfcLevel } from './header/ivfc.js';

export * from './config/constants.js';
export * from './errors/index.js';
export type * from './types/index.js';

export { ByteSource, type RandomAccessSource } from './util/ByteSource.js';
export { fromHex, toHex } from './util/bytes.js';
export { createLogger, LogLevel, type Logger, type Verbosity } from './util/logger.js';
