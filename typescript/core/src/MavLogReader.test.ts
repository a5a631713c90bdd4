import { MavLogReader } from "./MavLogReader";
import { TempBuffer } from "./TempBuffer";
import { EntryType } from "./constants";
import { TruncatedFileError, TruncatedRecordError, UnsupportedFileError } from "./errors";
import { collect, concat, fileHeaderBytes, uint16LE, uint64LE } from "./testUtils";

async function readableOf(data: Uint8Array): Promise<TempBuffer> {
  const buffer = new TempBuffer();
  await buffer.start(data);
  return buffer;
}

function textRecords(count: number): Uint8Array {
  const parts = [fileHeaderBytes()];
  for (let i = 0; i < count; i++) {
    const text = new TextEncoder().encode(`entry ${i}`);
    parts.push(concat([EntryType.UTF8_TEXT], uint64LE(BigInt(i)), uint16LE(text.length), text));
  }
  return concat(...parts);
}

describe("MavLogReader", () => {
  it("reads the header on initialization", async () => {
    const reader = await MavLogReader.Initialize({ readable: await readableOf(textRecords(0)) });
    expect(reader.header.srcApplicationId).toBe("app");
    expect(reader.layout).toBe("MixedTimestamped");
    expect(reader.mavlinkVersion).toBe(2);
    await expect(reader.readEntry()).resolves.toBeUndefined();
  });

  it.each([1, 7, 108, 64 * 1024])("reads entries in chunks of %d bytes", async (chunkSize) => {
    const readable = await readableOf(textRecords(50));
    const reader = await MavLogReader.Initialize({ readable, chunkSize });
    const entries = await collect(reader.entries());
    expect(entries).toHaveLength(50);
    expect(entries[49]).toEqual({ type: "Text", timestamp: 49n, text: "entry 49" });
  });

  it("rejects files shorter than their header", async () => {
    await expect(
      MavLogReader.Initialize({ readable: await readableOf(fileHeaderBytes().subarray(0, 100)) }),
    ).rejects.toThrow(TruncatedFileError);
  });

  it("rejects unsupported files", async () => {
    await expect(
      MavLogReader.Initialize({ readable: await readableOf(fileHeaderBytes({ versionMajor: 3 })) }),
    ).rejects.toThrow(UnsupportedFileError);
  });

  it("rejects a file that ends part way through a record", async () => {
    const data = textRecords(2);
    const reader = await MavLogReader.Initialize({
      readable: await readableOf(data.subarray(0, data.length - 1)),
      chunkSize: 16,
    });
    await expect(reader.readEntry()).resolves.toEqual({
      type: "Text",
      timestamp: 0n,
      text: "entry 0",
    });
    await expect(reader.readEntry()).rejects.toThrow(TruncatedRecordError);
  });
});
