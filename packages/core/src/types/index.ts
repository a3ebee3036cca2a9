/* ------------------------- Results ----------------------------------- */
export type ResultStatus =
  | 'Success'
  | 'ReadFailed'
  | 'InvalidFormat'
  | 'UnsupportedVersion'
  | 'EncryptedButNoKey'
  | 'NotFound';

export type FailureStatus = Exclude<ResultStatus, 'Success'>;

export type NcchResult<T> =
  | { status: 'Success'; value: T }
  | { status: FailureStatus; message: string };

/* ------------------------- Crypto state ------------------------------ */
export type CryptoState = 'unknown' | 'encrypted' | 'plaintext';

/** Per-load counters; both are 16-byte AES-CTR initial counter blocks. */
export interface SectionCounters {
  exheader: Uint8Array;
  exefs   : Uint8Array;
}

/* ------------------------- Key resolution ---------------------------- */
export type KeyResolution =
  | { available: true; key: Uint8Array }
  | { available: false; reason: string };

export interface KeyProvider {
  /**
   * Resolve the normal key of `slot` for the given KeyY.
   * Must not mutate shared state; repeated calls with the same inputs agree.
   */
  resolveNormalKey(slot: number, keyY: Uint8Array): KeyResolution;
}
