import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { StegoError } from './errors.js';

/**
 * Sequential byte source. `read` returns fewer bytes than asked only at
 * end of input.
 */
export interface ByteSource {
  read(length: number): Promise<Buffer>;
}

export interface ByteSink {
  write(data: Uint8Array): Promise<void>;
}

/**
 * Reads a file handle front to back starting at `position`
 */
export class FileByteSource implements ByteSource {
  private position: number;

  constructor(private readonly handle: FileHandle, position: number = 0) {
    this.position = position;
  }

  get offset(): number {
    return this.position;
  }

  async read(length: number): Promise<Buffer> {
    const buffer = Buffer.alloc(length);
    let filled = 0;

    while (filled < length) {
      const { bytesRead } = await this.handle.read(buffer, filled, length - filled, this.position);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
      this.position += bytesRead;
    }

    return filled === length ? buffer : buffer.subarray(0, filled);
  }
}

/**
 * Appends to a file handle starting at `position`
 */
export class FileByteSink implements ByteSink {
  private position: number;

  constructor(private readonly handle: FileHandle, position: number = 0) {
    this.position = position;
  }

  async write(data: Uint8Array): Promise<void> {
    let written = 0;
    while (written < data.length) {
      const { bytesWritten } = await this.handle.write(data, written, data.length - written, this.position);
      if (bytesWritten === 0) {
        throw new StegoError('IOError', `Write stalled at offset ${this.position}`);
      }
      written += bytesWritten;
      this.position += bytesWritten;
    }
  }
}

export class BufferByteSource implements ByteSource {
  private position = 0;

  constructor(private readonly buffer: Uint8Array) {}

  async read(length: number): Promise<Buffer> {
    const end = Math.min(this.buffer.length, this.position + length);
    const chunk = Buffer.from(this.buffer.subarray(this.position, end));
    this.position = end;
    return chunk;
  }
}

export class BufferByteSink implements ByteSink {
  private chunks: Buffer[] = [];

  async write(data: Uint8Array): Promise<void> {
    this.chunks.push(Buffer.from(data));
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Owns every handle one pipeline run opens, so a single `closeAll` in a
 * `finally` block releases them whichever step failed.
 */
export class FileScope {
  private handles: FileHandle[] = [];

  async open(filePath: string, flags: 'r' | 'w'): Promise<FileHandle> {
    try {
      const handle = await fs.open(filePath, flags);
      this.handles.push(handle);
      return handle;
    } catch (error) {
      const action = flags === 'r' ? 'read' : 'write';
      const reason = error instanceof Error ? error.message : String(error);
      throw new StegoError('FileOpenError', `Unable to open ${filePath} for ${action}: ${reason}`, {
        stage: 'open',
        cause: error,
      });
    }
  }

  get openCount(): number {
    return this.handles.length;
  }

  /**
   * Close every handle, newest first. Every close is attempted; failures are
   * returned rather than thrown so the caller decides whether they matter.
   */
  async closeAll(): Promise<StegoError[]> {
    const handles = this.handles.reverse();
    this.handles = [];

    const failures: StegoError[] = [];
    for (const handle of handles) {
      try {
        await handle.close();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        failures.push(new StegoError('IOError', `Failed to close file: ${reason}`, { cause: error }));
      }
    }
    return failures;
  }
}
