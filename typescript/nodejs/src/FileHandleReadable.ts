import { TruncatedFileError } from "@mavlog/core";
import type { MavLogTypes } from "@mavlog/core";
import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";

/**
 * IReadable over a log file on disk. Every `read()` fills a new buffer, reading from the handle
 * as many times as it takes.
 */
export class FileHandleReadable implements MavLogTypes.IReadable {
  readonly handle: FileHandle;
  readonly path: string | undefined;

  constructor(handle: FileHandle, path?: string) {
    this.handle = handle;
    this.path = path;
  }

  /** Open `path` for reading. The readable owns the handle until `close()`. */
  static async open(path: string): Promise<FileHandleReadable> {
    return new FileHandleReadable(await open(path, "r"), path);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  async size(): Promise<bigint> {
    return (await this.handle.stat({ bigint: true })).size;
  }

  /** @throws TruncatedFileError when the file ends before `offset + length`. */
  async read(offset: bigint, length: bigint): Promise<Uint8Array> {
    if (offset < 0n || length < 0n || offset + length > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RangeError(`Cannot read ${length} bytes at offset ${offset}`);
    }
    const data = new Uint8Array(Number(length));
    let filled = 0;
    while (filled < data.byteLength) {
      const { bytesRead } = await this.handle.read(
        data,
        filled,
        data.byteLength - filled,
        Number(offset) + filled,
      );
      if (bytesRead === 0) {
        const end = offset + BigInt(filled);
        const missing = length - BigInt(filled);
        throw new TruncatedFileError(
          `${this.path ?? "File"} ends at byte ${end}, ${missing} bytes short of the requested range`,
        );
      }
      filled += bytesRead;
    }
    return data;
  }
}
