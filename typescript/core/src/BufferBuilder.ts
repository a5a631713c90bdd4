import { HeaderFieldError } from "./errors";

const LITTLE_ENDIAN = true;

/**
 * BufferBuilder provides methods to create a buffer from primitive values. The buffer grows as
 * needed.
 *
 * Each method on buffer builder appends the value to the end of the buffer.
 *
 * A buffer can be reset to re-use the underlying memory and start writing at the start of the buffer.
 */
export class BufferBuilder {
  #fullBuffer = new Uint8Array(256);
  #view: DataView;
  #textEncoder = new TextEncoder();

  // location of the write head - new writes will start here
  #offset = 0;

  constructor() {
    this.#view = new DataView(this.#fullBuffer.buffer);
  }

  /**
   * Length in bytes of the written buffer
   */
  get length(): number {
    return this.#offset;
  }

  /** Returns a copy of the written data. */
  get buffer(): Uint8Array {
    return this.#fullBuffer.slice(0, this.#offset);
  }

  uint8(value: number): this {
    this.#ensureAdditionalCapacity(1);
    this.#view.setUint8(this.#offset, value);
    this.#offset += 1;
    return this;
  }
  uint16(value: number): this {
    this.#ensureAdditionalCapacity(2);
    this.#view.setUint16(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 2;
    return this;
  }
  uint32(value: number): this {
    this.#ensureAdditionalCapacity(4);
    this.#view.setUint32(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 4;
    return this;
  }
  uint64(value: bigint): this {
    this.#ensureAdditionalCapacity(8);
    this.#view.setBigUint64(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 8;
    return this;
  }
  uint64BE(value: bigint): this {
    this.#ensureAdditionalCapacity(8);
    this.#view.setBigUint64(this.#offset, value, !LITTLE_ENDIAN);
    this.#offset += 8;
    return this;
  }
  /**
   * Write `value` as UTF-8 into a field of exactly `size` bytes, padding with NUL bytes.
   * `field` names the value in the error thrown when it does not fit.
   */
  fixedString(value: string, size: number, field: string): this {
    const stringBytes = this.#textEncoder.encode(value);
    if (stringBytes.byteLength > size) {
      throw new HeaderFieldError(
        `${field} is ${stringBytes.byteLength} bytes when encoded as UTF-8, the limit is ${size}`,
      );
    }
    this.#ensureAdditionalCapacity(size);
    this.#fullBuffer.fill(0, this.#offset, this.#offset + size);
    this.#fullBuffer.set(stringBytes, this.#offset);
    this.#offset += size;
    return this;
  }
  bytes(buffer: Uint8Array): this {
    this.#ensureAdditionalCapacity(buffer.byteLength);
    this.#fullBuffer.set(buffer, this.#offset);
    this.#offset += buffer.length;
    return this;
  }

  /**
   * reset the write head to the start of the buffer
   */
  reset(): this {
    this.#offset = 0;
    return this;
  }

  #ensureAdditionalCapacity(capacity: number): void {
    this.#ensureCapacity(this.#offset + capacity);
  }

  #ensureCapacity(capacity: number): void {
    if (capacity > this.#fullBuffer.byteLength) {
      const newSize = Math.max(Math.ceil(this.#fullBuffer.byteLength * 1.5), capacity);
      const newBuffer = new Uint8Array(newSize);
      newBuffer.set(this.#fullBuffer);

      this.#fullBuffer = newBuffer;
      this.#view = new DataView(this.#fullBuffer.buffer);
    }
  }
}
