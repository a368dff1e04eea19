import type { ByteSource } from "./ByteSource.ts";
import { NotEnoughBytesError } from "./NotEnoughBytesError.ts";

export type IntWidth = 8 | 16 | 32 | 64;

/**
 * Positioned little-endian reader over a {@link ByteSource}.
 *
 * Every read either returns the full value and advances the position, or
 * throws {@link NotEnoughBytesError} and leaves the position where it was.
 */
export class ByteCursor {
  private _source: ByteSource;
  private _position: number;

  constructor(source: ByteSource, position = 0) {
    this._source = source;
    this._position = position;
  }

  get position() {
    return this._position;
  }

  set position(value: number) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Invalid cursor position ${value}`);
    }
    this._position = value;
  }

  get length() {
    return this._source.length;
  }

  /** A second cursor over the same source, starting at `position`. */
  fork(position = this._position) {
    return new ByteCursor(this._source, position);
  }

  readUInt(bits: 8 | 16 | 32): number;
  readUInt(bits: 64): bigint;
  readUInt(bits: IntWidth): number | bigint;
  readUInt(bits: IntWidth): number | bigint {
    switch (bits) {
      case 8: return this.take(1).readUInt8(0);
      case 16: return this.take(2).readUInt16LE(0);
      case 32: return this.take(4).readUInt32LE(0);
      case 64: return this.take(8).readBigUInt64LE(0);
      default: throw new RangeError(`Unsupported integer width ${String(bits)}`);
    }
  }

  /** Pointer-sized field: 64 bits in PE32+ images, 32 bits otherwise. */
  readPointer(isPE32Plus: boolean): bigint {
    return isPE32Plus ? this.readUInt(64) : BigInt(this.readUInt(32));
  }

  readBytes(count: number): Buffer {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`Invalid byte count ${count}`);
    }
    return this.take(count);
  }

  private take(count: number): Buffer {
    const data = this._source.read(this._position, count);
    if (data.byteLength < count) {
      throw new NotEnoughBytesError(this._position, data.byteLength, count);
    }
    this._position += count;
    return data;
  }
}
