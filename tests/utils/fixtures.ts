/**
 * Test fixtures
 *
 * Builds small PNG buffers from hand-made chunks. The pixel data is not a
 * valid zlib stream; the chunk layer never looks at it.
 */

import { Chunk } from '../../src/chunk.js';
import { ChunkType } from '../../src/chunk-type.js';
import { Png } from '../../src/png.js';
import { writeUInt32BE } from '../../src/utils.js';

export const SECRET_MESSAGE = 'This is where your secret message will be!';

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function chunkFromStrings(chunkType: string, data: string): Chunk {
  return new Chunk(ChunkType.fromString(chunkType), utf8(data));
}

export function createIhdrChunk(width: number, height: number): Chunk {
  const data = new Uint8Array(13);
  writeUInt32BE(data, width, 0);
  writeUInt32BE(data, height, 4);
  data[8] = 8; // bit depth
  data[9] = 6; // RGBA
  return new Chunk(ChunkType.fromString('IHDR'), data);
}

/**
 * IHDR, IDAT, a private ruSt chunk and IEND
 */
export function testingChunks(): Chunk[] {
  return [
    createIhdrChunk(2, 2),
    new Chunk(ChunkType.fromString('IDAT'), utf8('not really pixels')),
    chunkFromStrings('ruSt', SECRET_MESSAGE),
    new Chunk(ChunkType.fromString('IEND'), new Uint8Array(0))
  ];
}

export function testingPng(): Png {
  return Png.fromChunks(testingChunks());
}

/**
 * Raw chunk record with a caller-chosen CRC
 */
export function rawChunk(length: number, chunkType: string, data: Uint8Array, crc: number): Uint8Array {
  const buffer = new Uint8Array(12 + data.length);
  writeUInt32BE(buffer, length, 0);
  buffer.set(utf8(chunkType), 4);
  buffer.set(data, 8);
  writeUInt32BE(buffer, crc, 8 + data.length);
  return buffer;
}
