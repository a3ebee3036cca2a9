// packages/core/src/container/NcchContainer.ts
import {
  EXEFS_HEADER_SIZE,
  EXHEADER_OFFSET,
  EXHEADER_SIZE,
  EXTENDED_EXTDATA_ACCESS,
  MEDIA_UNIT,
  NCCH_HEADER_SIZE,
  NCCH_MAGIC,
} from '../config/constants.js';
import { AesCtrCipher } from '../crypto/AesCtr.js';
import { deriveCounters } from '../crypto/counters.js';
import { KeySlot } from '../crypto/keys.js';
import {
  EncryptedButNoKeyError,
  InvalidFormatError,
  NotFoundError,
  ReadFailedError,
  StatusError,
  UnsupportedVersionError,
} from '../errors/index.js';
import {
  decodeExeFsHeader,
  findSection,
  type ExeFsHeader,
  type ExeFsSection,
} from '../header/exefs.js';
import { decodeExtendedHeader, peekJumpId, type ExtendedHeader } from '../header/exheader.js';
import { decodeNcchHeader, type NcchHeader } from '../header/ncch.js';
import type {
  CryptoState,
  KeyProvider,
  KeyResolution,
  NcchResult,
  SectionCounters,
} from '../types/index.js';
import { formatId } from '../util/bytes.js';
import type { RandomAccessSource } from '../util/ByteSource.js';
import { createLogger, LogLevel, type Logger, type Verbosity } from '../util/logger.js';

/**
 * Options for configuring an {@link NcchContainer}.
 */
export interface NcchContainerOptions {
  /** Resolves the Secure1 normal key; without one, only fixed-key and plaintext containers decrypt */
  keyProvider? : KeyProvider;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?     : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?      : (msg: string) => void;
}

/**
 * Crypto state of one load attempt. `state` is only ever moved from
 * `encrypted` to `plaintext` by {@link markPlaintext}; everything after the
 * ExHeader step reads it from here.
 */
interface CryptoContext {
  state         : CryptoState;
  primaryKey    : Uint8Array | null;
  counters      : SectionCounters | null;
  /** why the container cannot be decrypted, if it cannot */
  pendingFailure: string | null;
}

interface ExeFsRegion {
  /** byte offset of the ExeFS header */
  offset: number;
  /** `null` when the header is encrypted and no key could be resolved */
  header: ExeFsHeader | null;
}

interface LoadedState {
  header  : NcchHeader;
  exheader: ExtendedHeader | null;
  exefs   : ExeFsRegion | null;
  crypto  : CryptoContext;
}

const LOW_32 = 0xFFFFFFFFn;

function markPlaintext(crypto: CryptoContext): void {
  crypto.state = 'plaintext';
}

function ok<T>(value: T): NcchResult<T> {
  return { status: 'Success', value };
}

/**
 * Streaming decoder for one NCCH container.
 *
 * All public methods resolve to a status rather than throwing for
 * malformed-but-readable input. `load()` runs implicitly and only once
 * successfully; a failed attempt commits nothing and is retried by the
 * next call.
 */
export class NcchContainer {
  private loaded: LoadedState | null = null;

  private readonly keyProvider: KeyProvider | undefined;
  private readonly log        : Logger;

  constructor(
    private readonly source: RandomAccessSource,
    opt: NcchContainerOptions = {},
  ) {
    this.keyProvider = opt.keyProvider;
    this.log         = createLogger(opt.verbose ?? 0, opt.logger);
  }

  /** `unknown` until a load succeeds. */
  get cryptoState(): CryptoState {
    return this.loaded?.crypto.state ?? 'unknown';
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Loading
  // ════════════════════════════════════════════════════════════════════════

  async load(): Promise<NcchResult<void>> {
    if (this.loaded) return ok(undefined);
    this.log.log(LogLevel.info, 'Loading NCCH container');
    return this.attempt(async () => {
      this.loaded = await this.parse();
    });
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Sections and metadata
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Read and decrypt one ExeFS section, e.g. `.code`, `icon` or `banner`.
   * The first descriptor with exactly this name wins.
   */
  async loadSectionByName(name: string): Promise<NcchResult<Uint8Array>> {
    return this.withLoaded(async ({ exefs, crypto }) => {
      if (!exefs) throw new ReadFailedError('Container has no ExeFS');
      if (!exefs.header) {
        throw new EncryptedButNoKeyError(crypto.pendingFailure ?? 'ExeFS header is still encrypted');
      }

      const section = findSection(exefs.header, name);
      if (!section) throw new NotFoundError(`ExeFS section "${name}" not found`);

      const logical = EXEFS_HEADER_SIZE + section.offset;
      this.log.log(
        LogLevel.debug,
        `Section ${name} - offset: 0x${section.offset.toString(16)}, size: 0x${section.size.toString(16)}`,
      );

      const buf = await this.readExact(exefs.offset + logical, section.size, `section ${name}`);
      if (crypto.state === 'encrypted') {
        this.cipherFor(crypto, 'exefs').decryptAt(logical, buf);
      }
      return buf;
    });
  }

  /** Occupied ExeFS slots, in slot order. */
  async listSections(): Promise<NcchResult<ExeFsSection[]>> {
    return this.withLoaded(async ({ exefs, crypto }) => {
      if (!exefs) throw new NotFoundError('Container has no ExeFS');
      if (!exefs.header) {
        throw new EncryptedButNoKeyError(crypto.pendingFailure ?? 'ExeFS header is still encrypted');
      }
      return exefs.header.sections.filter((s) => s.name !== '');
    });
  }

  async readProgramId(): Promise<NcchResult<bigint>> {
    return this.withLoaded(async ({ header }) => header.programId);
  }

  /**
   * Extdata id the application stores its extra data under.
   *
   * With the extended access attribute set, several ids can be listed; the
   * first non-zero one is taken as the main one.
   */
  async readExtDataId(): Promise<NcchResult<bigint>> {
    return this.withLoaded(async ({ exheader }) => {
      if (!exheader) throw new NotFoundError('Container has no ExHeader');
      const info = exheader.storageInfo;

      if (info.otherAttributes & EXTENDED_EXTDATA_ACCESS) {
        const id = info.extdataIds.find((candidate) => candidate !== 0n);
        if (id === undefined) throw new NotFoundError('All extdata ids are zero');
        return id;
      }
      return info.extSaveDataId;
    });
  }

  async readHeader(): Promise<NcchResult<NcchHeader>> {
    return this.withLoaded(async ({ header }) => header);
  }

  async readExtendedHeader(): Promise<NcchResult<ExtendedHeader>> {
    return this.withLoaded(async ({ exheader }) => {
      if (!exheader) throw new NotFoundError('Container has no ExHeader');
      return exheader;
    });
  }

  async hasExeFs(): Promise<boolean> {
    const r = await this.withLoaded(async ({ exefs }) => exefs !== null);
    return r.status === 'Success' && r.value;
  }

  async hasExtendedHeader(): Promise<boolean> {
    const r = await this.withLoaded(async ({ exheader }) => exheader !== null);
    return r.status === 'Success' && r.value;
  }

  /** Whether the outer header declares a RomFS region. */
  async hasRomFs(): Promise<boolean> {
    const r = await this.withLoaded(async ({ header }) => header.romfsSize !== 0);
    return r.status === 'Success' && r.value;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  INTERNAL
  // ════════════════════════════════════════════════════════════════════════

  private async parse(): Promise<LoadedState> {
    const header = decodeNcchHeader(await this.readExact(0, NCCH_HEADER_SIZE, 'NCCH header'));
    if (header.magic !== NCCH_MAGIC) {
      throw new InvalidFormatError('Invalid input format. Missing NCCH magic.');
    }

    const crypto = this.resolveCrypto(header);
    const exheader = header.extendedHeaderSize !== 0
      ? await this.parseExtendedHeader(header, crypto)
      : null;
    const exefs = header.exefsSize !== 0
      ? await this.parseExeFs(header, crypto)
      : null;

    return { header, exheader, exefs, crypto };
  }

  private resolveCrypto(header: NcchHeader): CryptoContext {
    if (header.noCrypto) {
      this.log.log(LogLevel.debug, 'No crypto');
      return { state: 'plaintext', primaryKey: null, counters: null, pendingFailure: null };
    }

    const crypto: CryptoContext = {
      state: 'encrypted', primaryKey: null, counters: null, pendingFailure: null,
    };

    if (header.fixedKey) {
      this.log.log(LogLevel.debug, 'Fixed-key crypto');
      crypto.primaryKey = new Uint8Array(16);
    } else {
      const keyY = header.signature.slice(0, 16);
      const resolved: KeyResolution = this.keyProvider
        ? this.keyProvider.resolveNormalKey(KeySlot.NCCHSecure1, keyY)
        : { available: false, reason: 'No key provider configured' };
      if (resolved.available) {
        crypto.primaryKey = resolved.key;
      } else {
        this.log.log(LogLevel.error, `Secure1 key unavailable: ${resolved.reason}`);
        crypto.pendingFailure = resolved.reason;
      }
    }

    try {
      crypto.counters = deriveCounters(
        header.version,
        header.partitionId,
        header.exefsOffset * MEDIA_UNIT,
      );
      this.log.log(LogLevel.debug, `NCCH version ${header.version}`);
    } catch (err) {
      if (!(err instanceof UnsupportedVersionError)) throw err;
      this.log.log(LogLevel.error, err.message);
      crypto.pendingFailure ??= err.message;
    }
    return crypto;
  }

  private async parseExtendedHeader(
    header: NcchHeader,
    crypto: CryptoContext,
  ): Promise<ExtendedHeader> {
    const raw = await this.readExact(EXHEADER_OFFSET, EXHEADER_SIZE, 'ExHeader');

    if (crypto.state === 'encrypted') {
      // Masked to 32 bits to tolerate images merged from a title and its update.
      if ((peekJumpId(raw) & LOW_32) === (header.programId & LOW_32)) {
        this.log.log(
          LogLevel.warn,
          'NCCH is marked as encrypted but with decrypted exheader. Force no crypto scheme.',
        );
        markPlaintext(crypto);
      } else {
        this.cipherFor(crypto, 'exheader').decryptAt(0, raw);
      }
    }

    const exheader = decodeExtendedHeader(raw);
    this.log.log(LogLevel.debug, [
      `Name:                        ${exheader.name}`,
      `Program ID:                  ${formatId(header.programId)}`,
      `Entry point:                 ${formatId(exheader.text.address, 8)}`,
      `Code size:                   ${formatId(exheader.text.size, 8)}`,
      `Stack size:                  ${formatId(exheader.stackSize, 8)}`,
      `Bss size:                    ${formatId(exheader.bssSize, 8)}`,
      `Core version:                ${exheader.coreVersion}`,
      `Thread priority:             0x${exheader.priority.toString(16).toUpperCase()}`,
      `Resource limit category:     ${exheader.resourceLimitCategory}`,
      `System Mode:                 ${exheader.systemMode}`,
    ].join('\n'));
    return exheader;
  }

  private async parseExeFs(header: NcchHeader, crypto: CryptoContext): Promise<ExeFsRegion> {
    const offset = header.exefsOffset * MEDIA_UNIT;
    const size   = header.exefsSize * MEDIA_UNIT;
    this.log.log(LogLevel.debug, `ExeFS offset:                ${formatId(offset, 8)}`);
    this.log.log(LogLevel.debug, `ExeFS size:                  ${formatId(size, 8)}`);

    const raw = await this.readExact(offset, EXEFS_HEADER_SIZE, 'ExeFS header');
    if (crypto.state === 'encrypted') {
      if (crypto.pendingFailure !== null) {
        this.log.log(LogLevel.error, 'ExeFS header left encrypted: no usable key');
        return { offset, header: null };
      }
      this.cipherFor(crypto, 'exefs').decryptAt(0, raw);
    }
    return { offset, header: decodeExeFsHeader(raw) };
  }

  private cipherFor(crypto: CryptoContext, section: keyof SectionCounters): AesCtrCipher {
    if (crypto.pendingFailure !== null || !crypto.primaryKey || !crypto.counters) {
      throw new EncryptedButNoKeyError(
        `Failed to decrypt: ${crypto.pendingFailure ?? 'no key material'}`,
      );
    }
    return new AesCtrCipher(crypto.primaryKey, crypto.counters[section]);
  }

  private async readExact(offset: number, len: number, what: string): Promise<Uint8Array> {
    let buf: Uint8Array;
    try {
      buf = await this.source.read(offset, len);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ReadFailedError(`Failed to read ${what} at 0x${offset.toString(16)}: ${msg}`);
    }
    if (buf.byteLength !== len) {
      throw new ReadFailedError(
        `Short read of ${what}: wanted 0x${len.toString(16)}, got 0x${buf.byteLength.toString(16)}`,
      );
    }
    return buf;
  }

  private async withLoaded<T>(fn: (state: LoadedState) => Promise<T>): Promise<NcchResult<T>> {
    const loadResult = await this.load();
    if (loadResult.status !== 'Success') return loadResult;
    const state = this.loaded;
    if (!state) throw new Error('NCCH container reported loaded without state');
    return this.attempt(() => fn(state));
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<NcchResult<T>> {
    try {
      return ok(await fn());
    } catch (err) {
      if (err instanceof StatusError) {
        if (err.status !== 'NotFound') this.log.log(LogLevel.error, err.message);
        return { status: err.status, message: err.message };
      }
      throw err;
    }
  }
}
