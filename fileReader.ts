import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { TruncatedReadError } from './errors';

export const MIN_CHUNK_SIZE = 64 * 1024;
export const MAX_CHUNK_SIZE = 1024 * 1024;
export const DEFAULT_CHUNK_SIZE = MAX_CHUNK_SIZE;

export const clampChunkSize = (size: number): number =>
  Math.min(MAX_CHUNK_SIZE, Math.max(MIN_CHUNK_SIZE, Math.floor(size)));

/** Read-only handle on one media file. `close()` may be called any number of times. */
export class MediaFileHandle {
  readonly path: string;
  private readonly handle: FileHandle;
  private closed = false;

  private constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.handle = handle;
  }

  static async open(path: string): Promise<MediaFileHandle> {
    return new MediaFileHandle(path, await fs.open(path, 'r'));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async read(buffer: Buffer, offset: number, length: number, position: number): Promise<number> {
    const { bytesRead } = await this.handle.read(buffer, offset, length, position);
    return bytesRead;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

export const openMediaFile = (path: string): Promise<MediaFileHandle> => MediaFileHandle.open(path);

/**
 * Yields `[start, end]` (inclusive) in ascending chunks of at most
 * `chunkSize` bytes. Throws TruncatedReadError if the file ends first.
 */
export async function* readInterval(
  file: MediaFileHandle,
  start: number,
  end: number,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): AsyncGenerator<Buffer, void, undefined> {
  const expected = end - start + 1;
  let position = start;

  while (position <= end) {
    const size = Math.min(chunkSize, end - position + 1);
    const buffer = Buffer.allocUnsafe(size);
    let filled = 0;
    while (filled < size) {
      const bytesRead = await file.read(buffer, filled, size - filled, position + filled);
      if (bytesRead === 0) {
        throw new TruncatedReadError(file.path, expected, position - start + filled);
      }
      filled += bytesRead;
    }
    position += size;
    yield buffer;
  }
}

/**
 * Opens `path`, reads one interval and closes the file however the
 * iteration ends: completion, a read error, or the consumer stopping early.
 * Nothing is opened until the first chunk is requested.
 */
export async function* readFileInterval(
  path: string,
  start: number,
  end: number,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): AsyncGenerator<Buffer, void, undefined> {
  const file = await openMediaFile(path);
  try {
    yield* readInterval(file, start, end, chunkSize);
  } finally {
    await file.close();
  }
}
