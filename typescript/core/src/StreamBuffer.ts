/**
 * A growable buffer for use when processing a stream of data. Parsers read from `view`, which
 * always starts at the first unconsumed byte, and call `consume()` once a record is complete.
 */
export default class StreamBuffer {
  #buffer: ArrayBuffer;
  view: DataView;

  constructor(initialCapacity = 0) {
    this.#buffer = new ArrayBuffer(initialCapacity);
    this.view = new DataView(this.#buffer, 0, 0);
  }

  bytesRemaining(): number {
    return this.view.byteLength;
  }

  /** Mark some data as consumed, so the memory can be reused when new data is appended. */
  consume(count: number): void {
    if (count > this.view.byteLength) {
      throw new Error(`Cannot consume ${count} bytes, only ${this.view.byteLength} available`);
    }
    this.view = new DataView(
      this.#buffer,
      this.view.byteOffset + count,
      this.view.byteLength - count,
    );
  }

  /** Add data to the buffer, shifting existing data or reallocating if necessary. */
  append(data: Uint8Array): void {
    const used = this.view.byteLength;
    if (this.view.byteOffset + used + data.byteLength <= this.#buffer.byteLength) {
      // Data fits by appending only
      new Uint8Array(this.#buffer, this.view.byteOffset + used).set(data);
      this.view = new DataView(this.#buffer, this.view.byteOffset, used + data.byteLength);
      return;
    }

    const pending = new Uint8Array(this.#buffer, this.view.byteOffset, used);
    if (used + data.byteLength > this.#buffer.byteLength) {
      // Capacity never shrinks
      const grown = new ArrayBuffer(Math.max((used + data.byteLength) * 2, this.#buffer.byteLength));
      new Uint8Array(grown).set(pending);
      this.#buffer = grown;
    } else {
      // Fits once the pending bytes move back to the start
      new Uint8Array(this.#buffer).copyWithin(0, this.view.byteOffset, this.view.byteOffset + used);
    }
    new Uint8Array(this.#buffer, used).set(data);
    this.view = new DataView(this.#buffer, 0, used + data.byteLength);
  }
}
