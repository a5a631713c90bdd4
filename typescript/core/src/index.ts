export { default as MavLogStreamReader } from "./MavLogStreamReader";
export type { MavLogReaderOptions } from "./MavLogStreamReader";
export { MavLogReader } from "./MavLogReader";
export { MavLogWriter } from "./MavLogWriter";
export type { MavLogWriterOptions } from "./MavLogWriter";
export { default as TlogStreamReader } from "./TlogStreamReader";
export type { TlogReaderOptions } from "./TlogStreamReader";
export { TlogWriter } from "./TlogWriter";
export type { TlogWriterOptions } from "./TlogWriter";
export {
  MavlinkFrameCodec,
  defaultCrcExtras,
  defaultPayloadLengths,
} from "./mavlink/MavlinkFrameCodec";
export type { MavlinkFrameCodecOptions } from "./mavlink/MavlinkFrameCodec";
export type { MavlinkCodec, FrameParseResult, ParseFrameArgs } from "./mavlink/MavlinkCodec";
export * as MavlinkConstants from "./mavlink/constants";
export * as MavLogTypes from "./types";
export * as MavLogConstants from "./constants";
export type { IRotatingWritable } from "./IRotatingWritable";
export type { EntryLayout } from "./parse";

export * from "./errors";
export * from "./header";
export * from "./TempBuffer";
export { systemClock } from "./clock";
