import { PngError } from './errors.js';
import type { ChunkTypeProperties } from './types.js';
import {
  isAsciiAlphabetic,
  isAsciiLowercase,
  isAsciiUppercase
} from './utils.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode the case-bit flags of a 4-byte chunk type code
 */
export function chunkTypeProperties(bytes: Uint8Array): ChunkTypeProperties {
  const reservedBitValid = isAsciiUppercase(bytes[2]);
  return {
    critical: isAsciiUppercase(bytes[0]),
    public: isAsciiUppercase(bytes[1]),
    reservedBitValid,
    safeToCopy: isAsciiLowercase(bytes[3]),
    valid: reservedBitValid
  };
}

/**
 * Four-letter chunk type code, e.g. IHDR, tEXt or ruSt.
 *
 * Construction only checks that every byte is an ASCII letter. A code whose
 * third letter is lowercase can be built but reports `isValid() === false`.
 */
export class ChunkType {
  private readonly code: Uint8Array;

  private constructor(code: Uint8Array) {
    this.code = code;
  }

  static fromBytes(bytes: ArrayLike<number>): ChunkType {
    if (bytes.length !== 4) {
      throw new PngError('InvalidFormat', `Chunk type must be exactly 4 bytes, got ${bytes.length}`);
    }

    // Checked before copying: Uint8Array.from would wrap 0x141 or 65.9 into a letter
    for (let i = 0; i < 4; i++) {
      const byte = bytes[i];
      if (!Number.isInteger(byte) || !isAsciiAlphabetic(byte)) {
        throw new PngError('InvalidFormat', `Invalid chunk type byte ${byte} at position ${i}`);
      }
    }

    return new ChunkType(Uint8Array.from(bytes));
  }

  static fromString(text: string): ChunkType {
    if (text.length !== 4) {
      throw new PngError('InvalidFormat', `Chunk type must be exactly 4 characters, got "${text}"`);
    }

    // Anything outside the ASCII range is rejected before it can be truncated to a byte
    const codes = Array.from(text, (ch) => ch.charCodeAt(0));
    if (!codes.every(isAsciiAlphabetic)) {
      throw new PngError('InvalidFormat', `Invalid chunk type "${text}"`);
    }

    return new ChunkType(Uint8Array.from(codes));
  }

  /**
   * The 4 raw bytes (a copy)
   */
  bytes(): Uint8Array {
    return this.code.slice();
  }

  isCritical(): boolean {
    return chunkTypeProperties(this.code).critical;
  }

  isPublic(): boolean {
    return chunkTypeProperties(this.code).public;
  }

  isReservedBitValid(): boolean {
    return chunkTypeProperties(this.code).reservedBitValid;
  }

  isSafeToCopy(): boolean {
    return chunkTypeProperties(this.code).safeToCopy;
  }

  isValid(): boolean {
    return this.isReservedBitValid();
  }

  properties(): ChunkTypeProperties {
    return chunkTypeProperties(this.code);
  }

  equals(other: ChunkType): boolean {
    for (let i = 0; i < 4; i++) {
      if (this.code[i] !== other.code[i]) return false;
    }
    return true;
  }

  toString(): string {
    try {
      return utf8Decoder.decode(this.code);
    } catch (err) {
      throw new PngError('EncodingError', 'Chunk type is not valid UTF-8', err);
    }
  }
}
