import type { ByteCursor } from "./ByteCursor.ts";
import { FileCharacteristics, MachineType, PE_SIGNATURE, enumName } from "./constants.ts";
import type { Output } from "./Output.ts";
import { PEFormatError } from "./PEFormatError.ts";

/** `PE\0\0` signature followed by the COFF file header. */
export class PEHeader {
  private _machine: number;
  private _numberOfSections: number;
  private _timeDateStamp: number;
  private _pointerToSymbolTable: number;
  private _numberOfSymbols: number;
  private _sizeOfOptionalHeader: number;
  private _characteristics: number;

  public static get sizeOf() {
    return 24;
  }

  constructor(cursor: ByteCursor) {
    const start = cursor.position;
    if (cursor.readUInt(32) !== PE_SIGNATURE) {
      throw new PEFormatError(start, "Invalid PE magic number");
    }

    this._machine = cursor.readUInt(16);
    this._numberOfSections = cursor.readUInt(16);
    this._timeDateStamp = cursor.readUInt(32);
    this._pointerToSymbolTable = cursor.readUInt(32);
    this._numberOfSymbols = cursor.readUInt(32);
    this._sizeOfOptionalHeader = cursor.readUInt(16);
    this._characteristics = cursor.readUInt(16);
  }

  get machine() { return this._machine; }
  get machineName() { return enumName(this._machine, MachineType); }
  get numberOfSections() { return this._numberOfSections; }
  get timeDateStamp() { return this._timeDateStamp; }
  get pointerToSymbolTable() { return this._pointerToSymbolTable; }
  get numberOfSymbols() { return this._numberOfSymbols; }
  get sizeOfOptionalHeader() { return this._sizeOfOptionalHeader; }
  get characteristics() { return this._characteristics; }

  printInfo(output: Output) {
    output.begin("PE Header");
    output.write("Machine", this._machine, "enum", MachineType);
    output.write("Compilation time", this._timeDateStamp, "datetime");
    output.write("Characteristics", this._characteristics, "flags", FileCharacteristics);
    output.write("Number of sections", this._numberOfSections, "count");
    output.write("Optional header size", this._sizeOfOptionalHeader, "size");
    if (this._pointerToSymbolTable === 0) {
      output.write("Symbol table", null, "raw");
    } else {
      output.write("Symbol table", `with ${this._numberOfSymbols} entries`, "raw");
    }
    output.end();
  }
}
