import StreamBuffer from "./StreamBuffer";
import { CorruptRecordError, TruncatedRecordError, UsageError } from "./errors";
import type { EntryParser } from "./parse";
import type { TypedLogEntry } from "./types";

/**
 * Buffered input shared by the stream readers: bytes go in through `append()`, records come out
 * through `next()` once a parser has been chosen.
 */
export class EntryStream {
  readonly buffer = new StreamBuffer(4096);
  #bytesConsumed = 0;
  #ended = false;

  /** Offset in the whole input of the first unconsumed byte. */
  get position(): number {
    return this.#bytesConsumed;
  }

  get ended(): boolean {
    return this.#ended;
  }

  append(data: Uint8Array): void {
    if (this.#ended) {
      throw new UsageError("Cannot append data after end()");
    }
    this.buffer.append(data);
  }

  end(): void {
    this.#ended = true;
  }

  consume(count: number): void {
    this.buffer.consume(count);
    this.#bytesConsumed += count;
  }

  /** True once the input has ended and every byte has been read as part of a record. */
  done(): boolean {
    return this.#ended && this.buffer.bytesRemaining() === 0;
  }

  next(parse: EntryParser): TypedLogEntry | undefined {
    const result = parse(this.buffer.view, 0);
    switch (result.status) {
      case "entry":
        this.consume(result.usedBytes);
        return result.entry;
      case "corrupt": {
        const position = this.#bytesConsumed;
        this.consume(result.usedBytes);
        throw new CorruptRecordError(`${result.reason} (record at byte ${position})`);
      }
      case "incomplete": {
        const remaining = this.buffer.bytesRemaining();
        if (this.#ended && remaining > 0) {
          throw new TruncatedRecordError(
            `Input ended with ${remaining} bytes of an incomplete record at byte ${this.#bytesConsumed}`,
            remaining,
          );
        }
        return undefined;
      }
    }
  }
}
