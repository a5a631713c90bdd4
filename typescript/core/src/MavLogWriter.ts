import { BufferBuilder } from "./BufferBuilder";
import type { IRotatingWritable } from "./IRotatingWritable";
import { systemClock } from "./clock";
import { EntryType, MAX_ENTRY_LENGTH } from "./constants";
import { UsageError } from "./errors";
import { createFileHeader, packFileHeader, validateFileHeader } from "./header";
import type { MavlinkCodec } from "./mavlink/MavlinkCodec";
import { MavlinkFrameCodec } from "./mavlink/MavlinkFrameCodec";
import type {
  FileHeader,
  MavlinkHeader,
  MavlinkMessage,
  MavlinkVersion,
  MicrosecondClock,
} from "./types";

export type MavLogWriterOptions = {
  writable: IRotatingWritable;
  /** Header of the new file. Defaults to `createFileHeader()`. */
  header?: FileHeader;
  /** Source of entry timestamps. */
  clock?: MicrosecondClock;
  codec?: MavlinkCodec;
};

/**
 * MavLogWriter writes entries to a mavlog file in the layout selected by the header's format
 * flags.
 *
 * Entry timestamps are the microseconds elapsed since the writer was created. If the clock goes
 * backwards, the reference point is reset and that entry is stamped 0.
 *
 * NOTE: callers must wait on any method call to complete before calling another
 * method. Calling a method before another has completed will result in a corrupt
 * file.
 */
export class MavLogWriter {
  readonly header: FileHeader;
  readonly mavlinkVersion: MavlinkVersion;

  #writable: IRotatingWritable;
  #clock: MicrosecondClock;
  #referenceUs: bigint;
  #codec: MavlinkCodec;
  #packedHeader: Uint8Array;
  #recordBuilder = new BufferBuilder();
  #state: "created" | "started" | "ended" = "created";

  /**
   * @throws HeaderFieldError or UnsupportedFileError when the header cannot be written or would
   * produce a file that cannot be read back.
   */
  constructor({
    writable,
    header = createFileHeader(),
    clock = systemClock,
    codec = new MavlinkFrameCodec(),
  }: MavLogWriterOptions) {
    this.mavlinkVersion = validateFileHeader(header);
    this.#packedHeader = packFileHeader(header);
    this.header = header;
    this.#writable = writable;
    this.#clock = clock;
    this.#codec = codec;
    this.#referenceUs = clock();
  }

  /** Write the file header. Must be called once before any entry is written. */
  async start(): Promise<void> {
    if (this.#state !== "created") {
      throw new UsageError("start() may only be called once");
    }
    this.#state = "started";
    try {
      await this.#writable.start(this.#packedHeader);
    } catch (error) {
      this.#state = "created";
      throw error;
    }
  }

  async end(): Promise<void> {
    if (this.#state === "ended") {
      return;
    }
    this.#state = "ended";
    await this.#writable.close();
  }

  async writeRaw(data: Uint8Array): Promise<void> {
    await this.write(EntryType.RAW, data);
  }

  async writeText(text: string): Promise<void> {
    await this.write(EntryType.UTF8_TEXT, new TextEncoder().encode(text));
  }

  /** Serialize a frame with the file's MAVLink version, unless another is given, and write it. */
  async writeMavlink(
    header: MavlinkHeader,
    message: MavlinkMessage,
    version: MavlinkVersion = this.mavlinkVersion,
  ): Promise<void> {
    await this.write(EntryType.MAVLINK, this.#codec.serializeFrame(header, message, version));
  }

  /**
   * Write one entry. For MAVLink entries `data` is a complete serialized frame.
   *
   * Rejects with UsageError, without writing anything, when the writer is not started, when a
   * raw or text entry is written to a MAVLink-only file, or when the data does not fit the
   * 16 bit length field.
   */
  async write(entryType: EntryType, data: Uint8Array): Promise<void> {
    if (this.#state !== "started") {
      throw new UsageError(
        this.#state === "created" ? "start() must be called before writing" : "Writer has ended",
      );
    }
    const { mavlinkOnly, notTimestamped } = this.header.formatFlags;
    if (mavlinkOnly && entryType !== EntryType.MAVLINK) {
      throw new UsageError("This file accepts only MAVLink entries");
    }
    if (!mavlinkOnly && data.byteLength > MAX_ENTRY_LENGTH) {
      throw new UsageError(
        `Entry of ${data.byteLength} bytes exceeds the maximum of ${MAX_ENTRY_LENGTH}`,
      );
    }

    const builder = this.#recordBuilder.reset();
    if (!mavlinkOnly) {
      builder.uint8(entryType);
    }
    if (!notTimestamped) {
      builder.uint64(this.#elapsedUs());
    }
    if (!mavlinkOnly) {
      builder.uint16(data.byteLength);
    }
    builder.bytes(data);
    await this.#writable.append(builder.buffer);
  }

  #elapsedUs(): bigint {
    const now = this.#clock();
    if (now < this.#referenceUs) {
      this.#referenceUs = now;
      return 0n;
    }
    return now - this.#referenceUs;
  }
}
