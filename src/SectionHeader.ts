import type { ByteCursor } from "./ByteCursor.ts";
import { SectionCharacteristics } from "./constants.ts";
import type { Output } from "./Output.ts";

export class SectionHeader {
  private _name: string;
  private _virtualSize: number;
  private _virtualAddress: number;
  private _sizeOfRawData: number;
  private _pointerToRawData: number;
  private _pointerToRelocations: number;
  private _pointerToLinenumbers: number;
  private _numberOfRelocations: number;
  private _numberOfLinenumbers: number;
  private _characteristics: number;

  public static get sizeOf() {
    return 40;
  }

  constructor(cursor: ByteCursor) {
    const rawName = cursor.readBytes(8);
    const nul = rawName.indexOf(0);
    // Invalid UTF-8 decodes to U+FFFD rather than failing
    this._name = rawName.subarray(0, nul === -1 ? rawName.length : nul).toString('utf8');
    this._virtualSize = cursor.readUInt(32);
    this._virtualAddress = cursor.readUInt(32);
    this._sizeOfRawData = cursor.readUInt(32);
    this._pointerToRawData = cursor.readUInt(32);
    this._pointerToRelocations = cursor.readUInt(32);
    this._pointerToLinenumbers = cursor.readUInt(32);
    this._numberOfRelocations = cursor.readUInt(16);
    this._numberOfLinenumbers = cursor.readUInt(16);
    this._characteristics = cursor.readUInt(32);
  }

  get name() { return this._name; }
  get virtualSize() { return this._virtualSize; }
  get virtualAddress() { return this._virtualAddress; }
  get sizeOfRawData() { return this._sizeOfRawData; }
  get pointerToRawData() { return this._pointerToRawData; }
  get pointerToRelocations() { return this._pointerToRelocations; }
  get pointerToLinenumbers() { return this._pointerToLinenumbers; }
  get numberOfRelocations() { return this._numberOfRelocations; }
  get numberOfLinenumbers() { return this._numberOfLinenumbers; }
  get characteristics() { return this._characteristics; }

  /** Whether `rva` falls inside the section once mapped. */
  containsRva(rva: number) {
    const effectiveSize = Math.max(this._virtualSize, this._sizeOfRawData);
    return rva >= this._virtualAddress && rva < this._virtualAddress + effectiveSize;
  }

  printInfo(output: Output) {
    output.begin(this._name);
    output.write("Virtual address", this._virtualAddress, "address");
    output.write("Virtual size", this._virtualSize, "size");
    output.write("Data address", this._pointerToRawData, "address");
    output.write("Data size", this._sizeOfRawData, "size");
    output.write("Relocations address", this._pointerToRelocations, "address");
    output.write("Relocations count", this._numberOfRelocations, "count");
    output.write("Line numbers address", this._pointerToLinenumbers, "address");
    output.write("Line numbers count", this._numberOfLinenumbers, "count");
    output.write("Characteristics", this._characteristics, "flags", SectionCharacteristics);
    output.end();
  }
}
