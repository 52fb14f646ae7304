/**
 * CRC32 lookup table (reflected polynomial 0xEDB88320)
 */
const CRC_TABLE = new Uint32Array(256);

for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = (c & 1) ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  CRC_TABLE[n] = c;
}

/**
 * CRC-32/ISO-HDLC checksum, as used for PNG chunk validation
 */
export function pngCrc32(data: Uint8Array, start = 0, length = data.length - start): number {
  let crc = 0xffffffff;
  for (let i = start; i < start + length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Write a 32-bit big-endian unsigned integer
 */
export function writeUInt32BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

export function isAsciiUppercase(byte: number): boolean {
  return byte >= 0x41 && byte <= 0x5a;
}

export function isAsciiLowercase(byte: number): boolean {
  return byte >= 0x61 && byte <= 0x7a;
}

export function isAsciiAlphabetic(byte: number): boolean {
  return isAsciiUppercase(byte) || isAsciiLowercase(byte);
}

/**
 * Concatenate byte arrays into a single buffer
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let totalSize = 0;
  for (const part of parts) {
    totalSize += part.length;
  }

  const buffer = new Uint8Array(totalSize);
  let offset = 0;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }
  return buffer;
}

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/**
 * Verify PNG signature
 */
export function isPngSignature(data: Uint8Array): boolean {
  if (data.length < 8) return false;
  for (let i = 0; i < 8; i++) {
    if (data[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}
