/**
 * CRC-16/MCRF4XX, the "X.25" checksum used by MAVLink frames: reflected polynomial 0x1021,
 * initial value 0xffff, no final xor.
 */
function crcX25GenerateTable(polynomial: number): Uint16Array {
  const table = new Uint16Array(256);
  for (let i = 0; i < 256; i++) {
    let r = i;
    for (let bit = 0; bit < 8; bit++) {
      r = ((r & 1) * polynomial) ^ (r >>> 1);
    }
    table[i] = r;
  }
  return table;
}

const CRC_X25_TABLE = crcX25GenerateTable(0x8408);

export function crcX25Init(): number {
  return 0xffff;
}

export function crcX25Update(prev: number, data: Uint8Array): number {
  let r = prev;
  for (let i = 0; i < data.length; i++) {
    r = CRC_X25_TABLE[(r ^ data[i]!) & 0xff]! ^ (r >>> 8);
  }
  return r;
}

export function crcX25UpdateByte(prev: number, byte: number): number {
  return CRC_X25_TABLE[(prev ^ byte) & 0xff]! ^ (prev >>> 8);
}

/**
 * Checksum of a MAVLink frame: every byte after the start marker up to the end of the payload,
 * followed by the message's CRC_EXTRA byte.
 */
export function mavlinkChecksum(frameBody: Uint8Array, crcExtra: number): number {
  return crcX25UpdateByte(crcX25Update(crcX25Init(), frameBody), crcExtra);
}
