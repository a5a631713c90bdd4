import { BufferBuilder } from "./BufferBuilder";
import type { IRotatingWritable } from "./IRotatingWritable";
import { systemClock } from "./clock";
import { UsageError } from "./errors";
import type { MavlinkCodec } from "./mavlink/MavlinkCodec";
import { MavlinkFrameCodec } from "./mavlink/MavlinkFrameCodec";
import type { MavlinkHeader, MavlinkMessage, MavlinkVersion, MicrosecondClock } from "./types";

export type TlogWriterOptions = {
  writable: IRotatingWritable;
  /** Wire version used when `writeMavlink` is not given one. Defaults to 2. */
  mavlinkVersion?: MavlinkVersion;
  clock?: MicrosecondClock;
  codec?: MavlinkCodec;
};

/**
 * Writes ground station telemetry logs: each record is the wall-clock time in microseconds
 * since the Unix epoch, big-endian, followed by one MAVLink frame. There is no file header.
 */
export class TlogWriter {
  #writable: IRotatingWritable;
  #mavlinkVersion: MavlinkVersion;
  #clock: MicrosecondClock;
  #codec: MavlinkCodec;
  #recordBuilder = new BufferBuilder();
  #state: "created" | "started" | "ended" = "created";

  constructor({
    writable,
    mavlinkVersion = 2,
    clock = systemClock,
    codec = new MavlinkFrameCodec(),
  }: TlogWriterOptions) {
    this.#writable = writable;
    this.#mavlinkVersion = mavlinkVersion;
    this.#clock = clock;
    this.#codec = codec;
  }

  /** Must be called once before any frame is written. */
  async start(): Promise<void> {
    if (this.#state !== "created") {
      throw new UsageError("start() may only be called once");
    }
    this.#state = "started";
    try {
      await this.#writable.start(new Uint8Array());
    } catch (error) {
      this.#state = "created";
      throw error;
    }
  }

  async end(): Promise<void> {
    if (this.#state === "ended") {
      return;
    }
    this.#state = "ended";
    await this.#writable.close();
  }

  async writeMavlink(
    header: MavlinkHeader,
    message: MavlinkMessage,
    version: MavlinkVersion = this.#mavlinkVersion,
  ): Promise<void> {
    await this.writeFrame(this.#codec.serializeFrame(header, message, version));
  }

  /** Write an already serialized MAVLink frame. */
  async writeFrame(frame: Uint8Array): Promise<void> {
    if (this.#state !== "started") {
      throw new UsageError(
        this.#state === "created" ? "start() must be called before writing" : "Writer has ended",
      );
    }
    const record = this.#recordBuilder.reset().uint64BE(this.#clock()).bytes(frame).buffer;
    await this.#writable.append(record);
  }
}
