import type { Chunk } from './chunk.js';

/**
 * Flags carried by the letter case of a chunk type code
 */
export interface ChunkTypeProperties {
  /** Byte 0 uppercase: required to display the image */
  critical: boolean;
  /** Byte 1 uppercase: defined by the PNG specification rather than privately */
  public: boolean;
  /** Byte 2 uppercase: reserved bit set as the current format requires */
  reservedBitValid: boolean;
  /** Byte 3 lowercase: editors may copy the chunk after modifying critical chunks */
  safeToCopy: boolean;
  /** Same as reservedBitValid */
  valid: boolean;
}

/**
 * Result of decoding one chunk record from inside a larger buffer
 */
export interface DecodedChunk {
  chunk: Chunk;
  /** Bytes consumed: 12 + chunk.length */
  bytesRead: number;
}

/**
 * Sink for diagnostic output. Library code defaults to a no-op.
 */
export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}
