import type { ByteCursor } from "./ByteCursor.ts";
import { CERTIFICATE_DIRECTORY_INDEX, DataDirectoryNames } from "./constants.ts";
import type { Output } from "./Output.ts";

export class DataDirectory {
  private _index: number;
  private _virtualAddress: number;
  private _size: number;

  public static get sizeOf() {
    return 8;
  }

  constructor(cursor: ByteCursor, index: number) {
    this._index = index;
    this._virtualAddress = cursor.readUInt(32);
    this._size = cursor.readUInt(32);
  }

  get index() { return this._index; }
  get name(): string { return DataDirectoryNames[this._index] ?? "Unknown"; }
  /** An RVA, except for the certificate table where it is a file offset. */
  get virtualAddress() { return this._virtualAddress; }
  get size() { return this._size; }
  get isFileOffset() { return this._index === CERTIFICATE_DIRECTORY_INDEX; }
  get isEmpty() { return this._virtualAddress === 0 && this._size === 0; }

  printInfo(output: Output) {
    output.begin(`Data Directory ${this._index}`);
    output.write("Name", this.name, "raw");
    output.write("Base", this._virtualAddress, "address");
    output.write("Size", this._size, "size");
    output.end();
  }
}

/** Reads `count` (address, size) pairs in table order. */
export function readDataDirectories(cursor: ByteCursor, count: number): DataDirectory[] {
  const directories: DataDirectory[] = [];
  for (let i = 0; i < count; i++) {
    directories.push(new DataDirectory(cursor, i));
  }
  return directories;
}
