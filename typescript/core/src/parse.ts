import Reader from "./Reader";
import {
  ENTRY_LENGTH_SIZE,
  EntryType,
  TIMESTAMP_SIZE,
  entryTypeFromTag,
} from "./constants";
import type { FrameParseResult, MavlinkCodec } from "./mavlink/MavlinkCodec";
import { mavlinkMagic } from "./mavlink/constants";
import type { FormatFlags, MavlinkVersion, ResyncPolicy, TypedLogEntry } from "./types";

export type EntryParseResult =
  /** The record is not complete yet; nothing was consumed. */
  | { status: "incomplete" }
  | { status: "entry"; entry: TypedLogEntry; usedBytes: number }
  /**
   * The record could not be decoded. `usedBytes` is the length of the bad record when its
   * extent is known (a text record with invalid UTF-8), or 0 when it is not.
   */
  | { status: "corrupt"; reason: string; usedBytes: number };

export type EntryParser = (view: DataView, startOffset: number) => EntryParseResult;

/** The four record layouts selected by the two format flags. */
export type EntryLayout =
  | "MavlinkOnly"
  | "MavlinkOnlyTimestamped"
  | "Mixed"
  | "MixedTimestamped";

export function entryLayoutFor(flags: FormatFlags): EntryLayout {
  if (flags.mavlinkOnly) {
    return flags.notTimestamped ? "MavlinkOnly" : "MavlinkOnlyTimestamped";
  }
  return flags.notTimestamped ? "Mixed" : "MixedTimestamped";
}

export type EntryParserArgs = {
  codec: MavlinkCodec;
  version: MavlinkVersion;
  resync: ResyncPolicy;
};

/**
 * Build the record parser for one layout. The choice is made once per file; the returned
 * function handles exactly that layout.
 */
export function createEntryParser(layout: EntryLayout, args: EntryParserArgs): EntryParser {
  switch (layout) {
    case "MavlinkOnly":
      return (view, startOffset) => parseMavlinkOnlyEntry(view, startOffset, args);
    case "MavlinkOnlyTimestamped":
      return (view, startOffset) =>
        parseTimestampedFrameEntry(view, startOffset, { ...args, littleEndian: true });
    case "Mixed":
      return (view, startOffset) =>
        parseMixedEntry(view, startOffset, { ...args, timestamped: false });
    case "MixedTimestamped":
      return (view, startOffset) =>
        parseMixedEntry(view, startOffset, { ...args, timestamped: true });
  }
}

function frameToEntry(
  frame: FrameParseResult,
  timestamp: bigint | undefined,
  prefixBytes: number,
): EntryParseResult {
  switch (frame.status) {
    case "incomplete":
      return frame;
    case "corrupt":
      return { status: "corrupt", reason: frame.reason, usedBytes: 0 };
    case "frame":
      return {
        status: "entry",
        entry: { type: "Mavlink", timestamp, header: frame.header, message: frame.message },
        usedBytes: prefixBytes + frame.usedBytes,
      };
  }
}

/**
 * Records are bare MAVLink frames. Any misalignment is left to the frame codec, which scans for
 * the next start marker under the lenient policy.
 */
export function parseMavlinkOnlyEntry(
  view: DataView,
  startOffset: number,
  { codec, version, resync }: EntryParserArgs,
): EntryParseResult {
  return frameToEntry(codec.parseFrame({ view, startOffset, version, resync }), undefined, 0);
}

/**
 * Records are an 8 byte timestamp followed by a MAVLink frame. The timestamp is only taken when
 * the byte right after it is a frame start marker; otherwise the record is read as a frame
 * without timestamp, scanning forward from the current position.
 *
 * On corrupted data the marker check can pass by coincidence, attaching 8 arbitrary bytes as the
 * timestamp of the next frame found. The strict policy reports a corrupt record instead of
 * falling back.
 */
export function parseTimestampedFrameEntry(
  view: DataView,
  startOffset: number,
  { codec, version, resync, littleEndian }: EntryParserArgs & { littleEndian: boolean },
): EntryParseResult {
  const reader = new Reader(view, startOffset);
  const marker = reader.peekUint8(TIMESTAMP_SIZE);
  if (marker == undefined) {
    return { status: "incomplete" };
  }
  if (marker === mavlinkMagic(version)) {
    const timestamp = littleEndian ? reader.uint64() : reader.uint64BE();
    return frameToEntry(
      codec.parseFrame({ view, startOffset: reader.offset, version, resync }),
      timestamp,
      TIMESTAMP_SIZE,
    );
  }
  if (resync === "strict") {
    return {
      status: "corrupt",
      reason: `Expected a MAVLink frame after the timestamp, found 0x${marker.toString(16)}`,
      usedBytes: 0,
    };
  }
  return frameToEntry(codec.parseFrame({ view, startOffset, version, resync }), undefined, 0);
}

/**
 * Records are a 1 byte entry type, an optional 8 byte timestamp, a 2 byte length and the data.
 *
 * The length bounds raw and text data. MAVLink data is read by the frame codec, which takes as
 * many bytes as the frame's own framing says; the recorded length is not consulted.
 */
export function parseMixedEntry(
  view: DataView,
  startOffset: number,
  { codec, version, resync, timestamped }: EntryParserArgs & { timestamped: boolean },
): EntryParseResult {
  const reader = new Reader(view, startOffset);
  const prefixSize = 1 + (timestamped ? TIMESTAMP_SIZE : 0) + ENTRY_LENGTH_SIZE;
  if (reader.bytesRemaining() < prefixSize) {
    return { status: "incomplete" };
  }
  const entryType = entryTypeFromTag(reader.uint8());
  const timestamp = timestamped ? reader.uint64() : undefined;
  const length = reader.uint16();

  if (entryType === EntryType.MAVLINK) {
    return frameToEntry(
      codec.parseFrame({ view, startOffset: reader.offset, version, resync }),
      timestamp,
      prefixSize,
    );
  }

  if (reader.bytesRemaining() < length) {
    return { status: "incomplete" };
  }
  if (entryType === EntryType.UTF8_TEXT) {
    const text = reader.utf8(length);
    if (text == undefined) {
      return {
        status: "corrupt",
        reason: "Text record is not valid UTF-8",
        usedBytes: reader.offset - startOffset,
      };
    }
    return {
      status: "entry",
      entry: { type: "Text", timestamp, text },
      usedBytes: reader.offset - startOffset,
    };
  }
  return {
    status: "entry",
    entry: { type: "Raw", timestamp, raw: reader.u8ArrayCopy(length) },
    usedBytes: reader.offset - startOffset,
  };
}
