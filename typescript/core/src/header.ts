import { v4 as uuidv4 } from "uuid";

import { BufferBuilder } from "./BufferBuilder";
import Reader from "./Reader";
import { systemClock } from "./clock";
import {
  DEFAULT_DIALECT,
  DEFAULT_SRC_APPLICATION_ID,
  DefinitionPayloadType,
  FILE_FORMAT_VERSION,
  FILE_HEADER_SIZE,
  FIXED_STRING_SIZE,
  FormatFlag,
  isKnownDefinitionPayloadType,
} from "./constants";
import { HeaderFieldError, UnsupportedFileError } from "./errors";
import type {
  FileHeader,
  FormatFlags,
  MavlinkMessageDefinition,
  MavlinkVersion,
  MicrosecondClock,
} from "./types";

export function packFormatFlags(flags: FormatFlags): number {
  return (
    (flags.mavlinkOnly ? FormatFlag.MAVLINK_ONLY : 0) |
    (flags.notTimestamped ? FormatFlag.NOT_TIMESTAMPED : 0)
  );
}

/** Bits other than the two defined flags are ignored. */
export function unpackFormatFlags(bits: number): FormatFlags {
  return {
    mavlinkOnly: (bits & FormatFlag.MAVLINK_ONLY) !== 0,
    notTimestamped: (bits & FormatFlag.NOT_TIMESTAMPED) !== 0,
  };
}

export function defaultMessageDefinition(): MavlinkMessageDefinition {
  return {
    versionMajor: 2,
    versionMinor: 0,
    dialect: DEFAULT_DIALECT,
    payloadType: DefinitionPayloadType.NONE,
    size: 0,
    payload: undefined,
  };
}

export type CreateFileHeaderOptions = {
  formatFlags?: Partial<FormatFlags>;
  messageDefinition?: MavlinkMessageDefinition;
  srcApplicationId?: string;
  /** 16 bytes identifying the file. A random v4 UUID is generated when omitted. */
  uuid?: Uint8Array;
  /** Creation time. Read from `clock` when omitted. */
  timestampUs?: bigint;
  clock?: MicrosecondClock;
};

/** Build the header for a new file. */
export function createFileHeader({
  formatFlags = {},
  messageDefinition = defaultMessageDefinition(),
  srcApplicationId = DEFAULT_SRC_APPLICATION_ID,
  uuid = uuidv4(undefined, new Uint8Array(16)),
  clock = systemClock,
  timestampUs = clock(),
}: CreateFileHeaderOptions = {}): FileHeader {
  if (uuid.byteLength !== 16) {
    throw new HeaderFieldError(`uuid must be 16 bytes, got ${uuid.byteLength}`);
  }
  return {
    uuid,
    timestampUs,
    srcApplicationId,
    formatVersion: FILE_FORMAT_VERSION,
    formatFlags: {
      mavlinkOnly: formatFlags.mavlinkOnly ?? false,
      notTimestamped: formatFlags.notTimestamped ?? false,
    },
    messageDefinition,
  };
}

/**
 * Serialize a file header: the 108 fixed bytes followed by the definition payload, if the
 * payload type carries one. Throws a HeaderFieldError when the application id or dialect does
 * not fit in its 32 byte field.
 */
export function packFileHeader(header: FileHeader): Uint8Array {
  const definition = header.messageDefinition;
  const payload = definition.payload ?? new Uint8Array();
  if (
    definition.payloadType !== DefinitionPayloadType.NONE &&
    payload.byteLength !== definition.size
  ) {
    throw new HeaderFieldError(
      `Definition size ${definition.size} does not match payload length ${payload.byteLength}`,
    );
  }
  const builder = new BufferBuilder();
  builder
    .bytes(header.uuid)
    .uint64(header.timestampUs)
    .fixedString(header.srcApplicationId, FIXED_STRING_SIZE, "srcApplicationId")
    .uint32(header.formatVersion)
    .uint16(packFormatFlags(header.formatFlags))
    .uint32(definition.versionMajor)
    .uint32(definition.versionMinor)
    .fixedString(definition.dialect, FIXED_STRING_SIZE, "dialect")
    .uint16(definition.payloadType)
    .uint32(definition.size);
  if (definition.payloadType !== DefinitionPayloadType.NONE) {
    builder.bytes(payload);
  }
  return builder.buffer;
}

/**
 * Parse a file header at `startOffset` in `view`. If the fixed header or the definition payload
 * is not complete yet, returns `usedBytes: 0` and no header.
 *
 * Only the layout is checked here; see `validateFileHeader` for version support.
 */
export function parseFileHeader(
  view: DataView,
  startOffset = 0,
): { header: FileHeader; usedBytes: number } | { header: undefined; usedBytes: 0 } {
  const reader = new Reader(view, startOffset);
  if (reader.bytesRemaining() < FILE_HEADER_SIZE) {
    return { header: undefined, usedBytes: 0 };
  }
  const uuid = reader.u8ArrayCopy(16);
  const timestampUs = reader.uint64();
  const srcApplicationId = reader.fixedString(FIXED_STRING_SIZE);
  const formatVersion = reader.uint32();
  const formatFlags = unpackFormatFlags(reader.uint16());
  const versionMajor = reader.uint32();
  const versionMinor = reader.uint32();
  const dialect = reader.fixedString(FIXED_STRING_SIZE);
  const payloadType = reader.uint16();
  const size = reader.uint32();

  if (!isKnownDefinitionPayloadType(payloadType)) {
    throw new UnsupportedFileError(`Unknown message definition payload type ${payloadType}`);
  }

  let payload: Uint8Array | undefined;
  if (payloadType !== DefinitionPayloadType.NONE) {
    if (reader.bytesRemaining() < size) {
      return { header: undefined, usedBytes: 0 };
    }
    payload = reader.u8ArrayCopy(size);
  }

  return {
    header: {
      uuid,
      timestampUs,
      srcApplicationId,
      formatVersion,
      formatFlags,
      messageDefinition: { versionMajor, versionMinor, dialect, payloadType, size, payload },
    },
    usedBytes: reader.offset - startOffset,
  };
}

/**
 * Check that a parsed header describes a file this library can read, and return the MAVLink
 * wire version used by its records.
 */
export function validateFileHeader(header: FileHeader): MavlinkVersion {
  if (header.formatVersion !== FILE_FORMAT_VERSION) {
    throw new UnsupportedFileError(
      `Unsupported file format version ${header.formatVersion} (expected ${FILE_FORMAT_VERSION})`,
    );
  }
  const { versionMajor, payloadType } = header.messageDefinition;
  if (versionMajor !== 1 && versionMajor !== 2) {
    throw new UnsupportedFileError(`Unsupported MAVLink major version ${versionMajor}`);
  }
  switch (payloadType) {
    case DefinitionPayloadType.NONE:
      break;
    case DefinitionPayloadType.URL_LIST:
      throw new UnsupportedFileError(
        "Message definitions given as a list of XML file URLs are not supported",
      );
    case DefinitionPayloadType.XML:
      throw new UnsupportedFileError("Message definitions given as inline XML are not supported");
  }
  return versionMajor === 1 ? 1 : 2;
}
