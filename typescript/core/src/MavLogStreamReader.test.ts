import MavLogStreamReader from "./MavLogStreamReader";
import type { MavLogReaderOptions } from "./MavLogStreamReader";
import { EntryType } from "./constants";
import {
  CorruptRecordError,
  TruncatedFileError,
  TruncatedRecordError,
  UnsupportedFileError,
  UsageError,
} from "./errors";
import {
  HEARTBEAT_V2_FRAME,
  concat,
  fileHeaderBytes,
  testFrame,
  testHeader,
  testMessage,
  uint16LE,
  uint64LE,
} from "./testUtils";
import type { TypedLogEntry } from "./types";

const MIXED_TIMESTAMPED = 0;
const MAVLINK_ONLY = 1;
const NOT_TIMESTAMPED = 2;

function mixedRecord(
  tag: number,
  timestamp: bigint | undefined,
  data: Uint8Array | number[],
  length = data.length,
): Uint8Array {
  return concat([tag], timestamp != undefined ? uint64LE(timestamp) : [], uint16LE(length), data);
}

function mavlinkEntry(i: number, timestamp: bigint | undefined): TypedLogEntry {
  return { type: "Mavlink", timestamp, header: testHeader(i % 256), message: testMessage(i) };
}

/** Append all of `data`, end the input and read every entry. */
function readAll(data: Uint8Array, options?: MavLogReaderOptions): TypedLogEntry[] {
  const reader = new MavLogStreamReader(options);
  reader.append(data);
  reader.end();
  const entries: TypedLogEntry[] = [];
  for (let entry; (entry = reader.nextEntry()); ) {
    entries.push(entry);
  }
  expect(reader.done()).toBe(true);
  return entries;
}

/**
 * Twenty cycles of one raw, one text and three MAVLink records, timestamped with the running
 * record count.
 */
function mixedTimestampedFile(): Uint8Array {
  const parts = [fileHeaderBytes({ formatFlags: MIXED_TIMESTAMPED })];
  for (let cycle = 0; cycle < 20; cycle++) {
    const ts = BigInt(cycle * 5);
    parts.push(mixedRecord(EntryType.RAW, ts, [0xde, 0xad, 0xbe, 0xef, 0, 1, 2, 3, 4, 5]));
    parts.push(mixedRecord(EntryType.UTF8_TEXT, ts + 1n, new TextEncoder().encode("abcde")));
    for (let k = 0; k < 3; k++) {
      const frame = testFrame(cycle * 3 + k);
      parts.push(mixedRecord(EntryType.MAVLINK, ts + 2n + BigInt(k), frame));
    }
  }
  return concat(...parts);
}

function mavlinkOnlyTimestampedFile(count: number): Uint8Array {
  const parts = [fileHeaderBytes({ formatFlags: MAVLINK_ONLY })];
  for (let i = 0; i < count; i++) {
    parts.push(uint64LE(BigInt(i)), testFrame(i));
  }
  return concat(...parts);
}

describe("MavLogStreamReader", () => {
  it.each([
    [MIXED_TIMESTAMPED, "MixedTimestamped"],
    [MAVLINK_ONLY, "MavlinkOnlyTimestamped"],
    [NOT_TIMESTAMPED, "Mixed"],
    [MAVLINK_ONLY | NOT_TIMESTAMPED, "MavlinkOnly"],
  ])("selects the record layout for format flags %d", (formatFlags, layout) => {
    const reader = new MavLogStreamReader();
    expect(reader.layout).toBeUndefined();
    reader.append(fileHeaderBytes({ formatFlags }));
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.layout).toBe(layout);
    expect(reader.mavlinkVersion).toBe(2);
    expect(reader.header?.srcApplicationId).toBe("app");
  });

  it("reads mixed timestamped records", () => {
    const entries = readAll(mixedTimestampedFile());
    expect(entries).toHaveLength(100);
    entries.forEach((entry, i) => {
      expect(entry.timestamp).toBe(BigInt(i));
    });
    expect(entries[0]).toEqual({
      type: "Raw",
      timestamp: 0n,
      raw: Uint8Array.from([0xde, 0xad, 0xbe, 0xef, 0, 1, 2, 3, 4, 5]),
    });
    expect(entries[1]).toEqual({ type: "Text", timestamp: 1n, text: "abcde" });
    expect(entries[2]).toEqual(mavlinkEntry(0, 2n));
    expect(entries[99]).toEqual(mavlinkEntry(59, 99n));
    expect(entries.filter((entry) => entry.type === "Mavlink")).toHaveLength(60);
  });

  it("reads the same entries when data arrives one byte at a time", () => {
    const data = mixedTimestampedFile();
    const reader = new MavLogStreamReader();
    const entries: TypedLogEntry[] = [];
    for (let i = 0; i < data.length; i++) {
      reader.append(data.subarray(i, i + 1));
      for (let entry; (entry = reader.nextEntry()); ) {
        entries.push(entry);
      }
    }
    reader.end();
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.done()).toBe(true);
    expect(entries).toEqual(readAll(data));
  });

  it("reads mixed records without timestamps", () => {
    const data = concat(
      fileHeaderBytes({ formatFlags: NOT_TIMESTAMPED }),
      mixedRecord(EntryType.UTF8_TEXT, undefined, new TextEncoder().encode("héllo")),
      mixedRecord(EntryType.MAVLINK, undefined, testFrame(4)),
      mixedRecord(EntryType.RAW, undefined, []),
    );
    expect(readAll(data)).toEqual([
      { type: "Text", timestamp: undefined, text: "héllo" },
      mavlinkEntry(4, undefined),
      { type: "Raw", timestamp: undefined, raw: new Uint8Array() },
    ]);
  });

  it("reads timestamped MAVLink-only records", () => {
    const entries = readAll(mavlinkOnlyTimestampedFile(60));
    expect(entries).toHaveLength(60);
    entries.forEach((entry, i) => {
      expect(entry).toEqual(mavlinkEntry(i, BigInt(i)));
    });
  });

  it("reads MAVLink-only records without timestamps", () => {
    const parts = [fileHeaderBytes({ formatFlags: MAVLINK_ONLY | NOT_TIMESTAMPED })];
    for (let i = 0; i < 10; i++) {
      parts.push(testFrame(i));
    }
    expect(readAll(concat(...parts))).toEqual(
      Array.from({ length: 10 }, (_, i) => mavlinkEntry(i, undefined)),
    );
  });

  it("reads MAVLink 1 files", () => {
    const data = concat(
      fileHeaderBytes({ formatFlags: MAVLINK_ONLY | NOT_TIMESTAMPED, versionMajor: 1 }),
      testFrame(0, 1),
      testFrame(1, 1),
    );
    const reader = new MavLogStreamReader();
    reader.append(data);
    expect(reader.nextEntry()).toEqual(mavlinkEntry(0, undefined));
    expect(reader.mavlinkVersion).toBe(1);
    expect(reader.nextEntry()).toEqual(mavlinkEntry(1, undefined));
  });

  it("recovers a frame whose timestamp is missing", () => {
    const complete = mavlinkOnlyTimestampedFile(5);
    const data = concat(complete.subarray(0, 108), complete.subarray(116));
    expect(readAll(data)).toEqual([
      mavlinkEntry(0, undefined),
      mavlinkEntry(1, 1n),
      mavlinkEntry(2, 2n),
      mavlinkEntry(3, 3n),
      mavlinkEntry(4, 4n),
    ]);
  });

  it("reports a missing timestamp under the strict policy", () => {
    const complete = mavlinkOnlyTimestampedFile(2);
    const reader = new MavLogStreamReader({ resyncPolicy: "strict" });
    reader.append(concat(complete.subarray(0, 108), complete.subarray(116)));
    const error = new CorruptRecordError(
      "Expected a MAVLink frame after the timestamp, found 0x0 (record at byte 108)",
    );
    expect(() => reader.nextEntry()).toThrow(error);
    expect(() => reader.nextEntry()).toThrow(error);
  });

  it("skips bytes between MAVLink-only records", () => {
    const data = concat(
      fileHeaderBytes({ formatFlags: MAVLINK_ONLY | NOT_TIMESTAMPED }),
      testFrame(0),
      [1, 2, 3],
      testFrame(1),
    );
    expect(readAll(data)).toEqual([mavlinkEntry(0, undefined), mavlinkEntry(1, undefined)]);

    const reader = new MavLogStreamReader({ resyncPolicy: "strict" });
    reader.append(data);
    expect(reader.nextEntry()).toEqual(mavlinkEntry(0, undefined));
    expect(() => reader.nextEntry()).toThrow(CorruptRecordError);
  });

  it("ignores the recorded length of MAVLink records", () => {
    const data = concat(
      fileHeaderBytes({ formatFlags: NOT_TIMESTAMPED }),
      mixedRecord(EntryType.MAVLINK, undefined, HEARTBEAT_V2_FRAME, 0),
      mixedRecord(EntryType.RAW, undefined, [7]),
    );
    expect(readAll(data).map((entry) => entry.type)).toEqual(["Mavlink", "Raw"]);
  });

  it("reads unknown entry types as raw", () => {
    const data = concat(
      fileHeaderBytes({ formatFlags: MIXED_TIMESTAMPED }),
      mixedRecord(7, 5n, [1, 2, 3]),
    );
    expect(readAll(data)).toEqual([{ type: "Raw", timestamp: 5n, raw: Uint8Array.from([1, 2, 3]) }]);
  });

  it("skips a text record that is not valid UTF-8", () => {
    const reader = new MavLogStreamReader();
    reader.append(
      concat(
        fileHeaderBytes({ formatFlags: NOT_TIMESTAMPED }),
        mixedRecord(EntryType.UTF8_TEXT, undefined, [0xff, 0xfe]),
        mixedRecord(EntryType.UTF8_TEXT, undefined, new TextEncoder().encode("ok")),
      ),
    );
    reader.end();
    expect(() => reader.nextEntry()).toThrow(
      new CorruptRecordError("Text record is not valid UTF-8 (record at byte 108)"),
    );
    expect(reader.nextEntry()).toEqual({ type: "Text", timestamp: undefined, text: "ok" });
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.done()).toBe(true);
  });

  it("reports input that ends part way through a record", () => {
    const reader = new MavLogStreamReader();
    reader.append(
      concat(
        fileHeaderBytes({ formatFlags: MIXED_TIMESTAMPED }),
        mixedRecord(EntryType.RAW, 1n, [1]),
        [EntryType.UTF8_TEXT],
      ),
    );
    expect(reader.nextEntry()).toEqual({ type: "Raw", timestamp: 1n, raw: Uint8Array.from([1]) });
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.bytesRemaining()).toBe(1);

    reader.end();
    expect(() => reader.nextEntry()).toThrow(TruncatedRecordError);
    expect(reader.done()).toBe(false);
  });

  it("reports a truncated MAVLink frame", () => {
    const data = mavlinkOnlyTimestampedFile(2);
    const reader = new MavLogStreamReader();
    reader.append(data.subarray(0, data.length - 4));
    reader.end();
    expect(reader.nextEntry()).toEqual(mavlinkEntry(0, 0n));
    let error: unknown;
    try {
      reader.nextEntry();
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(TruncatedRecordError);
    expect(error).toMatchObject({ bytesRemaining: 8 + testFrame(1).length - 4 });
  });

  it("reads MAVLink-only records up to a frame cut short", () => {
    const header = fileHeaderBytes({ formatFlags: MAVLINK_ONLY | NOT_TIMESTAMPED });
    const whole = concat(header, testFrame(0), testFrame(1), testFrame(2));
    expect(readAll(whole)).toEqual([0, 1, 2].map((i) => mavlinkEntry(i, undefined)));

    const reader = new MavLogStreamReader();
    reader.append(concat(header, testFrame(0), testFrame(1).subarray(0, 12)));
    expect(reader.nextEntry()).toEqual(mavlinkEntry(0, undefined));
    expect(reader.nextEntry()).toBeUndefined();
    reader.end();
    expect(() => reader.nextEntry()).toThrow(
      new TruncatedRecordError(
        `Input ended with 12 bytes of an incomplete record at byte ${108 + testFrame(0).length}`,
        12,
      ),
    );
    expect(reader.done()).toBe(false);
  });

  it.each([
    ["after the entry type", [EntryType.RAW]],
    ["inside the length", [EntryType.RAW, 5]],
  ])("reports a mixed record that ends %s", (_, tail) => {
    const reader = new MavLogStreamReader();
    reader.append(
      concat(
        fileHeaderBytes({ formatFlags: NOT_TIMESTAMPED }),
        mixedRecord(EntryType.UTF8_TEXT, undefined, new TextEncoder().encode("ok")),
        tail,
      ),
    );
    expect(reader.nextEntry()).toEqual({ type: "Text", timestamp: undefined, text: "ok" });
    expect(reader.nextEntry()).toBeUndefined();
    reader.end();
    expect(() => reader.nextEntry()).toThrow(
      `Input ended with ${tail.length} bytes of an incomplete record at byte 113`,
    );
    expect(() => reader.nextEntry()).toThrow(TruncatedRecordError);
    expect(reader.bytesRemaining()).toBe(tail.length);
  });

  it("stops at a MAVLink record with a bad checksum under the strict policy", () => {
    const bad = HEARTBEAT_V2_FRAME.slice();
    bad[20] = 191;
    const reader = new MavLogStreamReader({ resyncPolicy: "strict" });
    reader.append(
      concat(
        fileHeaderBytes({ formatFlags: NOT_TIMESTAMPED }),
        mixedRecord(EntryType.MAVLINK, undefined, bad),
        mixedRecord(EntryType.RAW, undefined, [7]),
      ),
    );
    reader.end();
    const error = new CorruptRecordError(
      "Incorrect checksum 0xbe62 for message id 0 (expected 0xbf62) (record at byte 108)",
    );
    expect(() => reader.nextEntry()).toThrow(error);
    expect(reader.bytesRemaining()).toBe(3 + 21 + 3 + 1);
    expect(() => reader.nextEntry()).toThrow(error);
    expect(reader.bytesRemaining()).toBe(3 + 21 + 3 + 1);
    expect(reader.done()).toBe(false);
  });

  it("ends cleanly at a record boundary", () => {
    const reader = new MavLogStreamReader();
    reader.append(fileHeaderBytes());
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.done()).toBe(false);
    reader.end();
    expect(reader.nextEntry()).toBeUndefined();
    expect(reader.done()).toBe(true);
    expect(() => reader.append(new Uint8Array([1]))).toThrow(UsageError);
  });

  it("reports input that ends inside the header", () => {
    const reader = new MavLogStreamReader();
    reader.append(fileHeaderBytes().subarray(0, 50));
    expect(reader.nextEntry()).toBeUndefined();
    reader.end();
    expect(() => reader.nextEntry()).toThrow(
      new TruncatedFileError("Input ended after 50 bytes, before the file header was complete"),
    );
    expect(reader.done()).toBe(false);

    const empty = new MavLogStreamReader();
    empty.end();
    expect(() => empty.readHeader()).toThrow(TruncatedFileError);
  });

  it("refuses unsupported files before reading any record", () => {
    const reader = new MavLogStreamReader();
    reader.append(
      concat(fileHeaderBytes({ formatVersion: 2 }), mixedRecord(EntryType.RAW, 0n, [1])),
    );
    expect(() => reader.nextEntry()).toThrow(UnsupportedFileError);
    expect(() => reader.nextEntry()).toThrow(UnsupportedFileError);
    expect(() => reader.readHeader()).toThrow(UnsupportedFileError);
    expect(reader.header).toBeUndefined();
  });

  it("refuses files with inline message definitions", () => {
    const payload = Uint8Array.from([1, 2, 3, 4]);
    expect(() =>
      readAll(fileHeaderBytes({ payloadType: 2, size: payload.length, payload })),
    ).toThrow(UnsupportedFileError);
  });
});
