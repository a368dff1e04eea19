import { closeSync, fstatSync, openSync, readSync } from "node:fs";

/**
 * Random-access view over the bytes of an image.
 * `read` returns at most `length` bytes, fewer when the source ends first.
 */
export interface ByteSource {
  readonly length: number;
  read(position: number, length: number): Buffer;
}

export class BufferSource implements ByteSource {
  private _data: Buffer;

  constructor(data: Buffer) {
    this._data = data;
  }

  get length() {
    return this._data.byteLength;
  }

  read(position: number, length: number): Buffer {
    return this._data.subarray(position, position + length);
  }
}

/**
 * Reads straight from an open file with positioned reads, so any number of
 * cursors can share one source without moving each other.
 */
export class FileSource implements ByteSource {
  private _fd: number;
  private _length: number;

  constructor(filePath: string) {
    this._fd = openSync(filePath, "r");
    this._length = fstatSync(this._fd).size;
  }

  get length() {
    return this._length;
  }

  read(position: number, length: number): Buffer {
    const available = Math.max(0, Math.min(length, this._length - position));
    const buffer = Buffer.alloc(available);
    let done = 0;
    while (done < available) {
      const n = readSync(this._fd, buffer, done, available - done, position + done);
      if (n === 0) break;
      done += n;
    }
    return done === available ? buffer : buffer.subarray(0, done);
  }

  close() {
    closeSync(this._fd);
  }
}
