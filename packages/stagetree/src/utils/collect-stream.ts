/**
 * Stream collection utilities
 */

import type { BinaryStream } from "../types.js";

/**
 * Collects all values from an async iterable into an array.
 */
export async function collectGenerator<T>(generator: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of generator) {
    results.push(item);
  }
  return results;
}

/**
 * Converts a synchronous iterable to an async iterable.
 */
export async function* toAsyncIterable<T>(iterable: Iterable<T>): AsyncGenerator<T> {
  for (const item of iterable) {
    yield item;
  }
}

export function isAsyncIterable<T>(value: AsyncIterable<T> | Iterable<T>): value is AsyncIterable<T> {
  return Symbol.asyncIterator in value;
}

/**
 * Normalizes a sync or async iterable to an async one.
 */
export function toAsync<T>(data: AsyncIterable<T> | Iterable<T>): AsyncIterable<T> {
  return isAsyncIterable(data) ? data : toAsyncIterable(data);
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0];

  let totalLength = 0;
  for (const chunk of chunks) totalLength += chunk.length;

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Reads a binary stream to its end into a single buffer.
 */
export async function collectBytes(stream: BinaryStream): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of toAsync(stream)) {
    chunks.push(chunk);
  }
  return concatBytes(chunks);
}
