const DISABLE_STACKTRACE : boolean = true;

export class NcmError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/* fatal: the file is skipped */
export class InvalidMagicError        extends NcmError {}
export class TruncatedInputError      extends NcmError {
  /** Input length at which the failed read would have succeeded, when known. */
  constructor(message: string, readonly needed?: number) {
    super(message);
  }
}
export class KeyRecoveryError         extends NcmError {}

/* non-fatal: reported as warnings on a partial result */
export class MetadataDecodeError      extends NcmError {}
export class UnknownAudioFormatError  extends NcmError {}

export class FormatRegistryError      extends NcmError {}
export class EncodingError            extends NcmError {}
export class FilesystemError          extends NcmError {}
export class TagWriteError            extends NcmError {}
export class CoverFetchError          extends NcmError {}
