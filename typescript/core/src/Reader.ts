// Fatal decoding so that invalid UTF-8 can be told apart from valid text. The decoder holds no
// state between decode() calls, so a single instance is shared.
const strictTextDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Little-endian cursor over a DataView. Callers check `bytesRemaining()` before reading; reads
 * past the end of the view throw a RangeError from the DataView.
 */
export default class Reader {
  #view: DataView;
  #viewU8: Uint8Array;
  offset: number;

  constructor(view: DataView, offset = 0) {
    this.#view = view;
    this.#viewU8 = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
    this.offset = offset;
  }

  bytesRemaining(): number {
    return this.#viewU8.length - this.offset;
  }

  /** Returns the byte `ahead` bytes past the cursor without moving it, if it is available. */
  peekUint8(ahead = 0): number | undefined {
    const index = this.offset + ahead;
    return index < this.#viewU8.length ? this.#viewU8[index] : undefined;
  }

  uint8(): number {
    const value = this.#view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  uint16(): number {
    const value = this.#view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  uint32(): number {
    const value = this.#view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  uint64(): bigint {
    const value = this.#view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  uint64BE(): bigint {
    const value = this.#view.getBigUint64(this.offset, false);
    this.offset += 8;
    return value;
  }

  /**
   * Read a NUL-padded string stored in a fixed-width field. The string ends at the first NUL
   * byte, or at the end of the field. Bytes that are not valid UTF-8 yield an empty string.
   */
  fixedString(size: number): string {
    const field = this.u8ArrayBorrow(size);
    const end = field.indexOf(0);
    try {
      return strictTextDecoder.decode(end === -1 ? field : field.subarray(0, end));
    } catch {
      return "";
    }
  }

  /** Decode `length` bytes as UTF-8, returning undefined when they are not valid UTF-8. */
  utf8(length: number): string | undefined {
    const bytes = this.u8ArrayBorrow(length);
    try {
      return strictTextDecoder.decode(bytes);
    } catch {
      return undefined;
    }
  }

  // Read a borrowed Uint8Array, useful temp references or borrow semantics
  u8ArrayBorrow(length: number): Uint8Array {
    const result = this.#viewU8.subarray(this.offset, this.offset + length);
    this.offset += length;
    return result;
  }

  // Read a copied Uint8Array from the underlying buffer, use when you need to keep the data around
  u8ArrayCopy(length: number): Uint8Array {
    const result = this.#viewU8.slice(this.offset, this.offset + length);
    this.offset += length;
    return result;
  }
}
