import { EntryStream } from "./EntryStream";
import { parseFileHeader, validateFileHeader } from "./header";
import { TruncatedFileError } from "./errors";
import type { MavlinkCodec } from "./mavlink/MavlinkCodec";
import { MavlinkFrameCodec } from "./mavlink/MavlinkFrameCodec";
import { createEntryParser, entryLayoutFor } from "./parse";
import type { EntryLayout, EntryParser } from "./parse";
import type { FileHeader, MavlinkVersion, ResyncPolicy, TypedLogEntry } from "./types";

export type MavLogReaderOptions = {
  /**
   * What to do when a record boundary cannot be trusted. `lenient` (the default) skips ahead to
   * the next valid MAVLink frame; `strict` throws a CorruptRecordError without skipping.
   */
  resyncPolicy?: ResyncPolicy;

  /** Decoder for the embedded MAVLink frames. */
  codec?: MavlinkCodec;
};

/**
 * A streaming reader for mavlog files.
 *
 * Usage example:
 * ```
 * const reader = new MavLogStreamReader();
 * stream.on("data", (data) => {
 *   reader.append(data);
 *   for (let entry; (entry = reader.nextEntry()); ) {
 *     // process available entries
 *   }
 * });
 * stream.on("end", () => {
 *   reader.end();
 *   for (let entry; (entry = reader.nextEntry()); ) {
 *     // process the last entries; throws if the input stopped part way through a record
 *   }
 * });
 * ```
 */
export default class MavLogStreamReader {
  #input = new EntryStream();
  #codec: MavlinkCodec;
  #resyncPolicy: ResyncPolicy;
  #header: FileHeader | undefined;
  #version: MavlinkVersion | undefined;
  #layout: EntryLayout | undefined;
  #parseEntry: EntryParser | undefined;
  #headerError: Error | undefined;

  constructor({
    resyncPolicy = "lenient",
    codec = new MavlinkFrameCodec(),
  }: MavLogReaderOptions = {}) {
    this.#resyncPolicy = resyncPolicy;
    this.#codec = codec;
  }

  /** The file header, once enough input has arrived for `readHeader()` to parse it. */
  get header(): FileHeader | undefined {
    return this.#header;
  }

  /** MAVLink wire version of the file's records, once the header has been read. */
  get mavlinkVersion(): MavlinkVersion | undefined {
    return this.#version;
  }

  /** Record layout selected by the header's format flags, once the header has been read. */
  get layout(): EntryLayout | undefined {
    return this.#layout;
  }

  /** @returns The number of bytes that have been received by `append()` but not yet parsed. */
  bytesRemaining(): number {
    return this.#input.buffer.bytesRemaining();
  }

  /**
   * Provide the reader with newly received bytes for it to process. After calling this function,
   * call `nextEntry()` again to parse any entries that are now available.
   */
  append(data: Uint8Array): void {
    this.#input.append(data);
  }

  /** Signal that no more input will arrive. */
  end(): void {
    this.#input.end();
  }

  /** @returns True once the input has ended exactly at a record boundary and all of it was read. */
  done(): boolean {
    return this.#header != undefined && this.#input.done();
  }

  /**
   * Parse the file header if it has not been parsed yet.
   *
   * @returns The header, or undefined if more input is needed.
   * @throws UnsupportedFileError when the header describes a file this reader cannot read, and
   * TruncatedFileError when the input ended before the header was complete. Both are final: the
   * reader throws the same error from every later call.
   */
  readHeader(): FileHeader | undefined {
    if (this.#headerError) {
      throw this.#headerError;
    }
    if (this.#header) {
      return this.#header;
    }
    try {
      const { header, usedBytes } = parseFileHeader(this.#input.buffer.view, 0);
      if (!header) {
        if (this.#input.ended) {
          throw new TruncatedFileError(
            `Input ended after ${this.bytesRemaining()} bytes, before the file header was complete`,
          );
        }
        return undefined;
      }
      const version = validateFileHeader(header);
      const layout = entryLayoutFor(header.formatFlags);
      this.#parseEntry = createEntryParser(layout, {
        codec: this.#codec,
        version,
        resync: this.#resyncPolicy,
      });
      this.#input.consume(usedBytes);
      this.#header = header;
      this.#version = version;
      this.#layout = layout;
      return header;
    } catch (error) {
      this.#headerError = error instanceof Error ? error : new Error(String(error));
      throw this.#headerError;
    }
  }

  /**
   * Read the next entry from the stream if possible. Returns undefined when more input is needed,
   * or, after `end()`, when the input ended cleanly at a record boundary.
   *
   * Throws CorruptRecordError for a record that cannot be decoded. A bad text record is skipped
   * before throwing, so reading may continue; under the strict policy nothing is skipped and the
   * same error is thrown again on the next call. After `end()`, throws TruncatedRecordError if
   * the input stopped part way through a record.
   */
  nextEntry(): TypedLogEntry | undefined {
    if (!this.readHeader() || !this.#parseEntry) {
      return undefined;
    }
    return this.#input.next(this.#parseEntry);
  }
}
