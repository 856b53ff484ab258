import { open, type FileHandle } from 'node:fs/promises';

/** Positional byte source. A short read means the end of the source was reached. */
export interface RandomAccess {
  size(): Promise<bigint>;
  read(offset: bigint, length: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export class BufferRandomAccess implements RandomAccess {
  constructor(private readonly data: Uint8Array) {}

  async size(): Promise<bigint> {
    return BigInt(this.data.length);
  }

  async read(offset: bigint, length: number): Promise<Uint8Array> {
    if (length <= 0 || offset >= BigInt(this.data.length)) return new Uint8Array(0);
    const start = Number(offset);
    return this.data.subarray(start, start + length);
  }

  async close(): Promise<void> {}
}

export class FileRandomAccess implements RandomAccess {
  private knownSize: bigint | undefined;

  private constructor(private readonly handle: FileHandle) {}

  static async open(filePath: string): Promise<FileRandomAccess> {
    return new FileRandomAccess(await open(filePath, 'r'));
  }

  async size(): Promise<bigint> {
    this.knownSize ??= BigInt((await this.handle.stat()).size);
    return this.knownSize;
  }

  async read(offset: bigint, length: number): Promise<Uint8Array> {
    if (length <= 0) return new Uint8Array(0);
    if (offset > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RangeError('File offset exceeds safe integer range');
    }
    const target = new Uint8Array(length);
    const { bytesRead } = await this.handle.read(target, 0, length, Number(offset));
    return bytesRead < length ? target.subarray(0, bytesRead) : target;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Window of `length` bytes starting at `start` inside another source.
 * Closing the slice leaves the parent open; the parent's owner closes it.
 */
export class SliceRandomAccess implements RandomAccess {
  private closed = false;

  constructor(
    private readonly parent: RandomAccess,
    private readonly start: bigint,
    private readonly length: bigint
  ) {}

  async size(): Promise<bigint> {
    this.assertOpen();
    return this.length;
  }

  async read(offset: bigint, length: number): Promise<Uint8Array> {
    this.assertOpen();
    if (length <= 0 || offset >= this.length) return new Uint8Array(0);
    const available = this.length - offset;
    return this.parent.read(this.start + offset, available < BigInt(length) ? Number(available) : length);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Slice source has been closed');
    }
  }
}
