import { EntryStream } from "./EntryStream";
import type { MavlinkCodec } from "./mavlink/MavlinkCodec";
import { MavlinkFrameCodec } from "./mavlink/MavlinkFrameCodec";
import { parseTimestampedFrameEntry } from "./parse";
import type { EntryParser } from "./parse";
import type { MavlinkVersion, ResyncPolicy, TypedLogEntries } from "./types";

export type TlogReaderOptions = {
  /** Wire version of the frames in the file. Defaults to 2. */
  mavlinkVersion?: MavlinkVersion;
  resyncPolicy?: ResyncPolicy;
  codec?: MavlinkCodec;
};

/**
 * A streaming reader for ground station telemetry logs (.tlog). These have no file header; each
 * record is a big-endian microsecond Unix timestamp followed by a MAVLink frame.
 *
 * The protocol of `append()`, `end()` and `nextEntry()` is the same as MavLogStreamReader's.
 */
export default class TlogStreamReader {
  #input = new EntryStream();
  #parseEntry: EntryParser;

  constructor({
    mavlinkVersion = 2,
    resyncPolicy = "lenient",
    codec = new MavlinkFrameCodec(),
  }: TlogReaderOptions = {}) {
    this.#parseEntry = (view, startOffset) =>
      parseTimestampedFrameEntry(view, startOffset, {
        codec,
        version: mavlinkVersion,
        resync: resyncPolicy,
        littleEndian: false,
      });
  }

  bytesRemaining(): number {
    return this.#input.buffer.bytesRemaining();
  }

  append(data: Uint8Array): void {
    this.#input.append(data);
  }

  end(): void {
    this.#input.end();
  }

  done(): boolean {
    return this.#input.done();
  }

  nextEntry(): TypedLogEntries["Mavlink"] | undefined {
    const entry = this.#input.next(this.#parseEntry);
    if (entry && entry.type !== "Mavlink") {
      throw new Error(`Unexpected ${entry.type} entry in a telemetry log`);
    }
    return entry;
  }
}
