/**
 * Byte sources: files, standard input, and in-memory buffers.
 *
 * Opening a source resolves to an async iterable of byte chunks. Failures to
 * open or read are normalized to SourceOpenError so the searcher can report
 * them per source and move on.
 */

import { type FileHandle, open } from "node:fs/promises";
import { SourceOpenError } from "../errors.js";
import type { ByteSource } from "../types.js";

/** Name used for standard input in output records and messages */
export const STDIN_NAME = "(standard input)";

const READ_CHUNK_SIZE = 64 * 1024;

const textEncoder = new TextEncoder();

// Map prevents prototype lookups on arbitrary error codes
const ERRNO_REASONS = new Map<string, string>([
  ["ENOENT", "No such file or directory"],
  ["EACCES", "Permission denied"],
  ["EPERM", "Operation not permitted"],
  ["EISDIR", "Is a directory"],
  ["ENOTDIR", "Not a directory"],
  ["EMFILE", "Too many open files"],
  ["EIO", "Input/output error"],
]);

function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Normalize any failure while opening or reading a source.
 */
export function toSourceOpenError(name: string, error: unknown): SourceOpenError {
  if (error instanceof SourceOpenError) {
    return error;
  }
  const code = errorCode(error);
  const reason =
    (code !== undefined ? ERRNO_REASONS.get(code) : undefined) ??
    (error instanceof Error ? error.message : String(error));
  return new SourceOpenError(name, reason, code);
}

/**
 * A file on disk. The file is opened lazily by open(); directories are
 * rejected up front.
 */
export function fileSource(path: string): ByteSource {
  return {
    name: path,
    async open() {
      let handle: FileHandle;
      try {
        handle = await open(path, "r");
      } catch (error) {
        throw toSourceOpenError(path, error);
      }
      try {
        const stat = await handle.stat();
        if (stat.isDirectory()) {
          throw new SourceOpenError(path, "Is a directory", "EISDIR");
        }
      } catch (error) {
        await handle.close();
        throw toSourceOpenError(path, error);
      }
      return new FileChunks(handle, path);
    },
  };
}

/**
 * Chunked reads from an open file handle. The handle is closed at end of
 * file, on a read error, or when the consumer stops early via return().
 */
class FileChunks implements AsyncIterableIterator<Uint8Array> {
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly name: string,
  ) {}

  async next(): Promise<IteratorResult<Uint8Array>> {
    if (this.closed) {
      return { done: true, value: undefined };
    }
    const buffer = Buffer.allocUnsafe(READ_CHUNK_SIZE);
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.handle.read(buffer, 0, buffer.length, null));
    } catch (error) {
      await this.close();
      throw toSourceOpenError(this.name, error);
    }
    if (bytesRead === 0) {
      await this.close();
      return { done: true, value: undefined };
    }
    return { done: false, value: buffer.subarray(0, bytesRead) };
  }

  async return(): Promise<IteratorResult<Uint8Array>> {
    await this.close();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Uint8Array> {
    return this;
  }

  private async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      await this.handle.close();
    }
  }
}

/**
 * Standard input, or any other readable stream.
 */
export function stdinSource(
  stream: NodeJS.ReadableStream = process.stdin,
  name: string = STDIN_NAME,
): ByteSource {
  return {
    name,
    async open() {
      return readStream(stream, name);
    },
  };
}

async function* readStream(
  stream: NodeJS.ReadableStream,
  name: string,
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of stream) {
      yield typeof chunk === "string" ? textEncoder.encode(chunk) : chunk;
    }
  } catch (error) {
    throw toSourceOpenError(name, error);
  }
}

export interface BytesSourceOptions {
  /** Split the content into chunks of this size (default: one chunk) */
  chunkSize?: number;
}

/**
 * An in-memory source. Strings are UTF-8 encoded.
 */
export function bytesSource(
  name: string,
  content: string | Uint8Array,
  options: BytesSourceOptions = {},
): ByteSource {
  const bytes =
    typeof content === "string" ? textEncoder.encode(content) : content;
  const chunkSize = options.chunkSize ?? Math.max(bytes.length, 1);
  return {
    name,
    async open() {
      return chunked(bytes, chunkSize);
    },
  };
}

async function* chunked(
  bytes: Uint8Array,
  chunkSize: number,
): AsyncGenerator<Uint8Array> {
  for (let i = 0; i < bytes.length; i += chunkSize) {
    yield bytes.subarray(i, i + chunkSize);
  }
}
