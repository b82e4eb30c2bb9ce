/**
 * Content of a staged file, resolved once when the file is written
 */

import type { BinaryStream } from "./types.js";
import { isAsyncIterable } from "./utils/collect-stream.js";

export interface BytesSource {
  readonly kind: "bytes";
  readonly data: Uint8Array;
}

export interface DeferredSource {
  readonly kind: "deferred";

  /**
   * Opens the content stream. Called at most once, at write time.
   */
  open(): BinaryStream | Promise<BinaryStream>;

  /**
   * Frees whatever backs the stream when it is never opened.
   */
  release?(): void | Promise<void>;
}

export type ByteSource = BytesSource | DeferredSource;

/**
 * Accepted wherever file content is staged; strings are encoded as UTF-8.
 */
export type FileContent = string | Uint8Array | ByteSource;

const encoder = new TextEncoder();

export const ByteSource = {
  fromBytes(data: Uint8Array): ByteSource {
    return { kind: "bytes", data };
  },

  fromText(text: string): ByteSource {
    return { kind: "bytes", data: encoder.encode(text) };
  },

  deferred(
    open: () => BinaryStream | Promise<BinaryStream>,
    release?: () => void | Promise<void>,
  ): ByteSource {
    return { kind: "deferred", open, release };
  },

  /**
   * Wraps a stream that is already open. Releasing it ends the iteration,
   * which closes handles such as Node.js readable streams.
   */
  fromStream(stream: BinaryStream): ByteSource {
    return {
      kind: "deferred",
      open: () => stream,
      release: async () => {
        if (isAsyncIterable(stream)) {
          await stream[Symbol.asyncIterator]().return?.();
        } else {
          stream[Symbol.iterator]().return?.();
        }
      },
    };
  },

  from(content: FileContent): ByteSource {
    if (typeof content === "string") return { kind: "bytes", data: encoder.encode(content) };
    if (content instanceof Uint8Array) return { kind: "bytes", data: content };
    return content;
  },
};

export async function openByteSource(source: ByteSource): Promise<BinaryStream> {
  return source.kind === "bytes" ? [source.data] : source.open();
}

export async function releaseByteSource(source: ByteSource): Promise<void> {
  if (source.kind === "deferred") {
    await source.release?.();
  }
}
