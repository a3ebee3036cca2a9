// packages/node-runtime/src/FileByteSource.ts
import { open, type FileHandle } from 'node:fs/promises';
import { FilesystemError } from '../../core/src/errors/index.js';
import type { RandomAccessSource } from '../../core/src/util/ByteSource.js';
import { assertSliceBounds } from '../../core/src/util/range.js';

/**
 * Read-only random access over a file on disk. Each `read()` is one
 * positioned read; there is no shared cursor.
 */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fd: FileHandle,
    readonly length: number,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    let fd: FileHandle;
    try {
      fd = await open(path, 'r');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new FilesystemError(`Failed to open ${path}: ${msg}`);
    }
    try {
      const { size } = await fd.stat();
      return new FileByteSource(fd, size);
    } catch (err) {
      await fd.close();
      throw err;
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);
    const out = new Uint8Array(len);
    let done = 0;
    while (done < len) {
      const { bytesRead } = await this.fd.read(out, done, len - done, offset + done);
      if (bytesRead === 0) break;
      done += bytesRead;
    }
    return done === len ? out : out.slice(0, done);
  }

  /** always call after finishing */
  async close(): Promise<void> {
    await this.fd.close();
  }
}
