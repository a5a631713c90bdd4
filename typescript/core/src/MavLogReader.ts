import MavLogStreamReader from "./MavLogStreamReader";
import type { MavLogReaderOptions } from "./MavLogStreamReader";
import type { EntryLayout } from "./parse";
import type { FileHeader, IReadable, MavlinkVersion, TypedLogEntry } from "./types";

/** Feeds consecutive chunks of an IReadable into a stream reader. */
class ChunkedInput {
  #readable: IReadable;
  #size: bigint;
  #chunkSize: bigint;
  #offset = 0n;

  constructor(readable: IReadable, size: bigint, chunkSize: bigint) {
    this.#readable = readable;
    this.#size = size;
    this.#chunkSize = chunkSize;
  }

  /** Append the next chunk to `stream`, or end `stream` once the whole readable was appended. */
  async fill(stream: MavLogStreamReader): Promise<void> {
    if (this.#offset >= this.#size) {
      stream.end();
      return;
    }
    const remaining = this.#size - this.#offset;
    const length = remaining < this.#chunkSize ? remaining : this.#chunkSize;
    stream.append(await this.#readable.read(this.#offset, length));
    this.#offset += length;
  }
}

/**
 * Sequential reader for a whole mavlog file behind an IReadable. The header is read and checked
 * by `Initialize`, so a reader only exists for files it can read.
 */
export class MavLogReader {
  readonly header: FileHeader;

  #input: ChunkedInput;
  #stream: MavLogStreamReader;

  private constructor(header: FileHeader, input: ChunkedInput, stream: MavLogStreamReader) {
    this.header = header;
    this.#input = input;
    this.#stream = stream;
  }

  /**
   * Open a file for reading.
   *
   * @throws TruncatedFileError when the file is shorter than its header, and
   * UnsupportedFileError when the header's format version, MAVLink version or message
   * definition payload type is not supported.
   */
  static async Initialize({
    readable,
    chunkSize = 64 * 1024,
    ...options
  }: {
    readable: IReadable;
    /** Number of bytes requested from `readable` at a time. */
    chunkSize?: number;
  } & MavLogReaderOptions): Promise<MavLogReader> {
    const input = new ChunkedInput(readable, await readable.size(), BigInt(chunkSize));
    const stream = new MavLogStreamReader(options);

    let header: FileHeader | undefined;
    while (!(header = stream.readHeader())) {
      await input.fill(stream);
    }
    return new MavLogReader(header, input, stream);
  }

  get mavlinkVersion(): MavlinkVersion | undefined {
    return this.#stream.mavlinkVersion;
  }

  get layout(): EntryLayout | undefined {
    return this.#stream.layout;
  }

  /**
   * Read the next entry. Resolves to undefined when the file ends cleanly at a record boundary.
   *
   * Rejects with CorruptRecordError for a record that cannot be decoded (see
   * MavLogStreamReader.nextEntry) and with TruncatedRecordError when the file ends part way
   * through a record.
   */
  async readEntry(): Promise<TypedLogEntry | undefined> {
    for (;;) {
      const entry = this.#stream.nextEntry();
      if (entry) {
        return entry;
      }
      if (this.#stream.done()) {
        return undefined;
      }
      await this.#input.fill(this.#stream);
    }
  }

  async *entries(): AsyncGenerator<TypedLogEntry, void, void> {
    for (let entry; (entry = await this.readEntry()); ) {
      yield entry;
    }
  }
}
