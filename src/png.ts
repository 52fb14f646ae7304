import { Chunk } from './chunk.js';
import { ChunkType } from './chunk-type.js';
import { PngError } from './errors.js';
import { PNG_SIGNATURE, concatBytes, isPngSignature } from './utils.js';

/**
 * A PNG file as its signature followed by an ordered list of chunks.
 *
 * No structural rules are enforced: IHDR need not come first, IEND need not
 * come last, and any chunk type may repeat.
 */
export class Png {
  private readonly chunkList: Chunk[];

  constructor(chunks: Iterable<Chunk> = []) {
    this.chunkList = Array.from(chunks);
  }

  static fromChunks(chunks: Iterable<Chunk>): Png {
    return new Png(chunks);
  }

  /**
   * Parse a complete PNG buffer. Fails on the first bad chunk.
   */
  static decode(data: Uint8Array): Png {
    if (!isPngSignature(data)) {
      throw new PngError('InvalidFormat', 'invalid header: not a PNG signature');
    }

    const chunks: Chunk[] = [];
    let offset = PNG_SIGNATURE.length;
    while (offset < data.length) {
      const { chunk, bytesRead } = Chunk.decodeAt(data, offset);
      chunks.push(chunk);
      offset += bytesRead;
    }

    return new Png(chunks);
  }

  /**
   * The fixed 8-byte signature (a copy)
   */
  header(): Uint8Array {
    return PNG_SIGNATURE.slice();
  }

  /**
   * Chunks in file order. The view is only current until the next mutation.
   */
  chunks(): readonly Chunk[] {
    return this.chunkList;
  }

  appendChunk(chunk: Chunk): void {
    this.chunkList.push(chunk);
  }

  /**
   * Remove the first chunk of the given type and return it
   */
  removeChunk(chunkType: string): Chunk {
    const type = ChunkType.fromString(chunkType);
    const index = this.chunkList.findIndex((chunk) => chunk.chunkType.equals(type));
    if (index === -1) {
      throw new PngError('NotFound', `no such chunk: ${chunkType}`);
    }
    const [removed] = this.chunkList.splice(index, 1);
    return removed;
  }

  chunkByType(chunkType: string): Chunk | undefined {
    const type = ChunkType.fromString(chunkType);
    return this.chunkList.find((chunk) => chunk.chunkType.equals(type));
  }

  asBytes(): Uint8Array {
    return concatBytes([PNG_SIGNATURE, ...this.chunkList.map((chunk) => chunk.asBytes())]);
  }

  toString(): string {
    const lines = [`Png {`, `  Chunks: ${this.chunkList.length}`];
    for (const chunk of this.chunkList) {
      lines.push(...chunk.toString().split('\n').map((line) => `  ${line}`));
    }
    lines.push('}');
    return lines.join('\n');
  }
}
