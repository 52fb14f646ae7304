/**
 * PNG chunk codec and container
 *
 * Embed, extract and remove auxiliary chunks in a PNG file without touching
 * its image data. Everything here works on in-memory buffers; the file
 * helpers in `commands` are the only code that does I/O.
 *
 * @example
 * import { Png, Chunk, ChunkType } from 'pngmsg';
 *
 * const png = Png.decode(bytes);
 * png.appendChunk(new Chunk(ChunkType.fromString('ruSt'), new TextEncoder().encode('hello')));
 * const output = png.asBytes();
 */

export { ChunkType, chunkTypeProperties } from './chunk-type.js';
export { Chunk, CHUNK_OVERHEAD } from './chunk.js';
export { Png } from './png.js';
export { PngError, isPngError } from './errors.js';
export type { PngErrorKind } from './errors.js';
export type { ChunkTypeProperties, DecodedChunk, Logger } from './types.js';

export {
  embedMessage,
  extractMessage,
  stripMessage,
  privateChunks,
  encodeMessage,
  decodeMessage,
  removeMessage,
  printChunks,
  writeFileAtomic
} from './commands.js';
export { createProgram } from './cli.js';
export type { CliOptions } from './cli.js';
export { ConsoleLogger, NoopLogFacility, createLogger, noopLogger } from './logger.js';
export type { LogFacility } from './logger.js';
export { config } from './config.js';

export {
  pngCrc32,
  readUInt32BE,
  writeUInt32BE,
  concatBytes,
  isPngSignature,
  PNG_SIGNATURE
} from './utils.js';
