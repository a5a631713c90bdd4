import type { IRotatingWritable } from "./IRotatingWritable";
import type { IReadable } from "./types";

/**
 * In-memory output that never rotates, readable back through IReadable.
 */
export class TempBuffer implements IReadable, IRotatingWritable {
  #buffer = new ArrayBuffer(1024);
  #size = 0;
  #closed = false;

  async start(preamble: Uint8Array): Promise<void> {
    this.#size = 0;
    this.#write(preamble);
  }

  async append(data: Uint8Array): Promise<void> {
    if (this.#closed) {
      throw new Error("append after close");
    }
    this.#write(data);
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  #write(data: Uint8Array): void {
    if (this.#size + data.byteLength > this.#buffer.byteLength) {
      const newBuffer = new ArrayBuffer((this.#size + data.byteLength) * 2);
      new Uint8Array(newBuffer).set(new Uint8Array(this.#buffer, 0, this.#size));
      this.#buffer = newBuffer;
    }
    new Uint8Array(this.#buffer, this.#size).set(data);
    this.#size += data.byteLength;
  }

  async size(): Promise<bigint> {
    return BigInt(this.#size);
  }
  async read(offset: bigint, size: bigint): Promise<Uint8Array> {
    if (offset < 0n || offset + size > BigInt(this.#size)) {
      throw new Error("read out of range");
    }
    return new Uint8Array(this.#buffer, Number(offset), Number(size));
  }

  get(): Uint8Array {
    return new Uint8Array(this.#buffer, 0, this.#size);
  }
}
