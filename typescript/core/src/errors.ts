/**
 * The file cannot be read by this library: unknown format version, unknown MAVLink major
 * version, or a message definition payload type that is not supported.
 */
export class UnsupportedFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedFileError";
  }
}

/** The input ended before the file header (including its definition payload) was complete. */
export class TruncatedFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TruncatedFileError";
  }
}

/** A header field cannot be packed into its fixed-size slot. */
export class HeaderFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HeaderFieldError";
  }
}

/** The input ended part way through a record. */
export class TruncatedRecordError extends Error {
  readonly bytesRemaining: number;

  constructor(message: string, bytesRemaining: number) {
    super(message);
    this.name = "TruncatedRecordError";
    this.bytesRemaining = bytesRemaining;
  }
}

/** A record was structurally complete but its contents could not be decoded. */
export class CorruptRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CorruptRecordError";
  }
}

/** The caller asked for something the reader or writer cannot do in its current configuration. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
