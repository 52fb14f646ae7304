import { ChunkType } from './chunk-type.js';
import { PngError } from './errors.js';
import type { DecodedChunk } from './types.js';
import { pngCrc32, readUInt32BE, writeUInt32BE } from './utils.js';

/** length(4) + type(4) + crc(4) */
export const CHUNK_OVERHEAD = 12;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function chunkCrc(typeBytes: Uint8Array, data: Uint8Array): number {
  // CRC covers type + data
  const crcData = new Uint8Array(4 + data.length);
  crcData.set(typeBytes, 0);
  crcData.set(data, 4);
  return pngCrc32(crcData);
}

/**
 * A PNG chunk: length-prefixed, CRC-checked record of a type code and payload.
 *
 * Chunks are immutable. `length` and `crc` are derived from the type and
 * payload when the chunk is built, so they can never disagree with them.
 */
export class Chunk {
  readonly length: number;
  readonly chunkType: ChunkType;
  readonly data: Uint8Array;
  readonly crc: number;

  constructor(chunkType: ChunkType, data: Uint8Array) {
    this.chunkType = chunkType;
    // Copy even when handed a Buffer, whose slice() is a view
    this.data = new Uint8Array(data);
    this.length = this.data.length;
    this.crc = chunkCrc(chunkType.bytes(), this.data);
  }

  /**
   * Decode the chunk record at the start of `buffer`.
   * Bytes following the record are ignored.
   */
  static decode(buffer: Uint8Array): Chunk {
    return Chunk.decodeAt(buffer, 0).chunk;
  }

  /**
   * Decode the chunk record starting at `offset` and report how many bytes it took
   */
  static decodeAt(buffer: Uint8Array, offset: number): DecodedChunk {
    // Need at least 12 bytes for chunk structure (length + type + crc)
    if (offset + CHUNK_OVERHEAD > buffer.length) {
      throw new PngError(
        'MalformedInput',
        `Incomplete PNG chunk: need ${CHUNK_OVERHEAD} bytes, ${buffer.length - offset} available`
      );
    }

    const length = readUInt32BE(buffer, offset);
    const typeBytes = buffer.subarray(offset + 4, offset + 8);
    const chunkType = ChunkType.fromBytes(typeBytes);

    const dataStart = offset + 8;
    if (length > buffer.length - dataStart - 4) {
      throw new PngError(
        'MalformedInput',
        `Incomplete PNG chunk data for ${chunkType}: declared ${length} bytes, ` +
          `${Math.max(0, buffer.length - dataStart - 4)} available`
      );
    }

    // The constructor copies the payload out of the buffer
    const data = buffer.subarray(dataStart, dataStart + length);
    const crc = readUInt32BE(buffer, dataStart + length);

    const chunk = new Chunk(chunkType, data);
    if (chunk.crc !== crc) {
      throw new PngError(
        'IntegrityError',
        `invalid crc for chunk ${chunkType}: stored ${crc}, computed ${chunk.crc}`
      );
    }

    return { chunk, bytesRead: CHUNK_OVERHEAD + length };
  }

  /**
   * Payload decoded as UTF-8 text
   */
  dataAsString(): string {
    try {
      return utf8Decoder.decode(this.data);
    } catch (err) {
      throw new PngError('EncodingError', `Chunk ${this.chunkType} data is not valid UTF-8`, err);
    }
  }

  /**
   * Serialize to the wire layout: length, type, data, crc
   */
  asBytes(): Uint8Array {
    const buffer = new Uint8Array(CHUNK_OVERHEAD + this.length);
    let offset = 0;

    writeUInt32BE(buffer, this.length, offset);
    offset += 4;

    buffer.set(this.chunkType.bytes(), offset);
    offset += 4;

    buffer.set(this.data, offset);
    offset += this.length;

    writeUInt32BE(buffer, this.crc, offset);

    return buffer;
  }

  equals(other: Chunk): boolean {
    if (
      this.length !== other.length ||
      this.crc !== other.crc ||
      !this.chunkType.equals(other.chunkType)
    ) {
      return false;
    }
    for (let i = 0; i < this.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  toString(): string {
    return [
      'Chunk {',
      `  Length: ${this.length}`,
      `  Type: ${this.chunkType}`,
      `  Data: ${this.data.length} bytes`,
      `  Crc: ${this.crc}`,
      '}'
    ].join('\n');
  }
}
