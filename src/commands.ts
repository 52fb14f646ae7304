import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { Chunk } from './chunk.js';
import { ChunkType } from './chunk-type.js';
import { config } from './config.js';
import { PngError } from './errors.js';
import { noopLogger } from './logger.js';
import { Png } from './png.js';
import type { Logger } from './types.js';

const utf8Encoder = new TextEncoder();

/**
 * Append `message` to a PNG buffer as a chunk of the given type
 */
export function embedMessage(png: Uint8Array, chunkType: string, message: string): Uint8Array {
  const image = Png.decode(png);
  image.appendChunk(new Chunk(ChunkType.fromString(chunkType), utf8Encoder.encode(message)));
  return image.asBytes();
}

/**
 * Text of the first chunk of the given type
 */
export function extractMessage(png: Uint8Array, chunkType: string): string {
  const chunk = Png.decode(png).chunkByType(chunkType);
  if (!chunk) {
    throw new PngError('NotFound', `no message found in chunk ${chunkType}`);
  }
  return chunk.dataAsString();
}

/**
 * Remove the first chunk of the given type from a PNG buffer
 */
export function stripMessage(png: Uint8Array, chunkType: string): { png: Uint8Array; removed: Chunk } {
  const image = Png.decode(png);
  const removed = image.removeChunk(chunkType);
  return { png: image.asBytes(), removed };
}

/**
 * Chunks whose type code is private (second letter lowercase)
 */
export function privateChunks(png: Uint8Array): Chunk[] {
  return Png.decode(png).chunks().filter((chunk) => !chunk.chunkType.isPublic());
}

/**
 * Replace `path` with `data` without leaving a half-written file behind
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  const tempPath = `${path}.${process.pid}${config.files.tempSuffix}`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

async function readPng(path: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(path));
}

export async function encodeMessage(
  path: string,
  chunkType: string,
  message: string,
  logger: Logger = noopLogger
): Promise<void> {
  const input = await readPng(path);
  logger.debug(`Read ${input.length} bytes from ${path}`);

  const output = embedMessage(input, chunkType, message);
  await writeFileAtomic(path, output);
  logger.success(`Encoded ${utf8Encoder.encode(message).length} bytes into ${chunkType} chunk of ${path}`);
}

export async function decodeMessage(
  path: string,
  chunkType: string,
  logger: Logger = noopLogger
): Promise<string> {
  const input = await readPng(path);
  logger.debug(`Read ${input.length} bytes from ${path}`);
  return extractMessage(input, chunkType);
}

export async function removeMessage(
  path: string,
  chunkType: string,
  logger: Logger = noopLogger
): Promise<Chunk> {
  const input = await readPng(path);
  logger.debug(`Read ${input.length} bytes from ${path}`);

  const { png, removed } = stripMessage(input, chunkType);
  await writeFileAtomic(path, png);
  logger.success(`Removed ${chunkType} chunk (${removed.length} bytes) from ${path}`);
  return removed;
}

export async function printChunks(path: string, logger: Logger = noopLogger): Promise<Chunk[]> {
  const chunks = privateChunks(await readPng(path));
  logger.info(`${chunks.length} private chunk(s) in ${path}`);
  for (const chunk of chunks) {
    logger.debug(`${chunk.chunkType} at ${chunk.length} bytes, crc ${chunk.crc}`);
  }
  return chunks;
}
