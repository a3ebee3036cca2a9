import type { FailureStatus } from '../types/index.js';

const DISABLE_STACKTRACE : boolean = true;

export class NcchError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** Errors the container decoder reports as a status instead of throwing. */
export abstract class StatusError extends NcchError {
  abstract readonly status: FailureStatus;
}

export class ReadFailedError         extends StatusError { readonly status = 'ReadFailed' as const; }
export class InvalidFormatError      extends StatusError { readonly status = 'InvalidFormat' as const; }
export class UnsupportedVersionError extends StatusError { readonly status = 'UnsupportedVersion' as const; }
export class EncryptedButNoKeyError  extends StatusError { readonly status = 'EncryptedButNoKey' as const; }
export class NotFoundError           extends StatusError { readonly status = 'NotFound' as const; }

export class HeaderTooShortError     extends NcchError {}
export class CipherError             extends NcchError {}
export class ContractViolationError  extends NcchError {}
export class KeyFileError            extends NcchError {}
export class FilesystemError         extends NcchError {}
