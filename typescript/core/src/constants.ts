/** Size of the fixed file header, up to and including the definition payload size field. */
export const FILE_HEADER_SIZE = 108;

/** Size of the fixed part of the message definition block that ends the file header. */
export const MESSAGE_DEFINITION_SIZE = 46;

/** Width of the NUL-padded application id and dialect fields. */
export const FIXED_STRING_SIZE = 32;

export const FILE_FORMAT_VERSION = 1;

export const DEFAULT_SRC_APPLICATION_ID = "mavlog";
export const DEFAULT_DIALECT = "common";

export const TIMESTAMP_SIZE = 8;
export const ENTRY_LENGTH_SIZE = 2;
export const MAX_ENTRY_LENGTH = 0xffff;

export enum FormatFlag {
  MAVLINK_ONLY = 0x01,
  NOT_TIMESTAMPED = 0x02,
}

export enum EntryType {
  RAW = 0,
  MAVLINK = 1,
  UTF8_TEXT = 2,
}

export enum DefinitionPayloadType {
  NONE = 0,
  URL_LIST = 1,
  XML = 2,
}

export function isKnownDefinitionPayloadType(value: number): value is DefinitionPayloadType {
  return (
    value === DefinitionPayloadType.NONE ||
    value === DefinitionPayloadType.URL_LIST ||
    value === DefinitionPayloadType.XML
  );
}

/** Unknown tag bytes are read as raw records. */
export function entryTypeFromTag(tag: number): EntryType {
  switch (tag) {
    case EntryType.MAVLINK:
      return EntryType.MAVLINK;
    case EntryType.UTF8_TEXT:
      return EntryType.UTF8_TEXT;
    default:
      return EntryType.RAW;
  }
}
