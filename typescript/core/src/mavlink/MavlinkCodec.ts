import type { MavlinkHeader, MavlinkMessage, MavlinkVersion, ResyncPolicy } from "../types";

export type FrameParseResult =
  /** More bytes are needed before anything can be decided; nothing was consumed. */
  | { status: "incomplete" }
  /** `usedBytes` counts the frame and any bytes skipped before it. */
  | { status: "frame"; header: MavlinkHeader; message: MavlinkMessage; usedBytes: number }
  /** Only returned under the strict policy: no valid frame starts at the cursor. */
  | { status: "corrupt"; reason: string };

export type ParseFrameArgs = {
  view: DataView;
  startOffset: number;
  version: MavlinkVersion;
  resync: ResyncPolicy;
};

/**
 * The embedded wire protocol as seen by the log codec: locating, checking and producing single
 * MAVLink frames. Message contents are opaque.
 */
export interface MavlinkCodec {
  parseFrame(args: ParseFrameArgs): FrameParseResult;
  serializeFrame(header: MavlinkHeader, message: MavlinkMessage, version: MavlinkVersion): Uint8Array;
}
