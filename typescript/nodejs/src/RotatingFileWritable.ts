import type { IRotatingWritable } from "@mavlog/core";
import { open, rename } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";

export type RotatingFileWritableOptions = {
  path: string;
  /**
   * Size limit of each file. An append that would take the file past it first moves the file
   * to a backup and starts a new one, unless the file holds nothing but the preamble.
   */
  maxBytes?: number;
  /** Number of backups kept as `path.1` (newest) to `path.N` (oldest). */
  backupCount?: number;
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function renameIfExists(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Writes to a file on disk, rotating it into numbered backups once it reaches a size limit.
 * Rotation is disabled when `maxBytes` or `backupCount` is 0.
 */
export class RotatingFileWritable implements IRotatingWritable {
  readonly path: string;

  #maxBytes: number;
  #backupCount: number;
  #handle: FileHandle | undefined;
  #preamble = new Uint8Array();
  #bytesWritten = 0;

  private constructor(path: string, maxBytes: number, backupCount: number, handle: FileHandle) {
    this.path = path;
    this.#maxBytes = maxBytes;
    this.#backupCount = backupCount;
    this.#handle = handle;
  }

  /** Create `path`, replacing any file already there. */
  static async open({
    path,
    maxBytes = 0,
    backupCount = 0,
  }: RotatingFileWritableOptions): Promise<RotatingFileWritable> {
    return new RotatingFileWritable(path, maxBytes, backupCount, await open(path, "w"));
  }

  async start(preamble: Uint8Array): Promise<void> {
    this.#preamble = preamble.slice();
    await this.#write(preamble);
  }

  async append(data: Uint8Array): Promise<void> {
    if (
      this.#maxBytes > 0 &&
      this.#backupCount > 0 &&
      this.#bytesWritten > this.#preamble.byteLength &&
      this.#bytesWritten + data.byteLength > this.#maxBytes
    ) {
      await this.#rotate();
    }
    await this.#write(data);
  }

  async close(): Promise<void> {
    const handle = this.#handle;
    this.#handle = undefined;
    await handle?.close();
  }

  async #write(data: Uint8Array): Promise<void> {
    if (!this.#handle) {
      throw new Error(`${this.path} is closed`);
    }
    const { bytesWritten } = await this.#handle.write(data);
    this.#bytesWritten += bytesWritten;
  }

  async #rotate(): Promise<void> {
    await this.close();
    for (let i = this.#backupCount - 1; i >= 1; i--) {
      await renameIfExists(`${this.path}.${i}`, `${this.path}.${i + 1}`);
    }
    await rename(this.path, `${this.path}.1`);
    this.#handle = await open(this.path, "w");
    this.#bytesWritten = 0;
    await this.#write(this.#preamble);
  }
}
