import type { ByteCursor } from "./ByteCursor.ts";
import { DOS_MAGIC } from "./constants.ts";
import type { Output } from "./Output.ts";
import { PEFormatError } from "./PEFormatError.ts";

/** Smallest accepted `e_lfanew`; anything lower puts the PE signature inside the DOS header. */
export const MIN_LFANEW = 62;

export class DOSHeader {
  private _cblp: number;
  private _cp: number;
  private _crlc: number;
  private _cparhdr: number;
  private _minalloc: number;
  private _maxalloc: number;
  private _ss: number;
  private _sp: number;
  private _csum: number;
  private _ip: number;
  private _cs: number;
  private _lfarlc: number;
  private _ovno: number;
  private _res: readonly number[];
  private _oemid: number;
  private _oeminfo: number;
  private _res2: readonly number[];
  private _lfanew: number;

  public static get sizeOf() {
    return 64;
  }

  constructor(cursor: ByteCursor) {
    const start = cursor.position;
    if (cursor.readUInt(16) !== DOS_MAGIC) {
      throw new PEFormatError(start, "Invalid DOS magic number");
    }

    this._cblp = cursor.readUInt(16);
    this._cp = cursor.readUInt(16);
    this._crlc = cursor.readUInt(16);
    this._cparhdr = cursor.readUInt(16);
    this._minalloc = cursor.readUInt(16);
    this._maxalloc = cursor.readUInt(16);
    this._ss = cursor.readUInt(16);
    this._sp = cursor.readUInt(16);
    this._csum = cursor.readUInt(16);
    this._ip = cursor.readUInt(16);
    this._cs = cursor.readUInt(16);
    this._lfarlc = cursor.readUInt(16);
    this._ovno = cursor.readUInt(16);
    this._res = Array.from({ length: 4 }, () => cursor.readUInt(16));
    this._oemid = cursor.readUInt(16);
    this._oeminfo = cursor.readUInt(16);
    this._res2 = Array.from({ length: 10 }, () => cursor.readUInt(16));

    const lfanewOffset = cursor.position;
    this._lfanew = cursor.readUInt(32);
    if (this._lfanew < MIN_LFANEW) {
      throw new PEFormatError(lfanewOffset, "Overlapping DOS and PE headers");
    }
  }

  get cblp() { return this._cblp; }
  get cp() { return this._cp; }
  get crlc() { return this._crlc; }
  get cparhdr() { return this._cparhdr; }
  get minalloc() { return this._minalloc; }
  get maxalloc() { return this._maxalloc; }
  get ss() { return this._ss; }
  get sp() { return this._sp; }
  get csum() { return this._csum; }
  get ip() { return this._ip; }
  get cs() { return this._cs; }
  get lfarlc() { return this._lfarlc; }
  get ovno() { return this._ovno; }
  get res() { return this._res; }
  get oemid() { return this._oemid; }
  get oeminfo() { return this._oeminfo; }
  get res2() { return this._res2; }
  get lfanew() { return this._lfanew; }

  printInfo(output: Output) {
    output.begin("DOS Header");
    output.write("cblp", this._cblp, "address");
    output.write("cp", this._cp, "address");
    output.write("crlc", this._crlc, "address");
    output.write("cparhdr", this._cparhdr, "address");
    output.write("minalloc", this._minalloc, "address");
    output.write("maxalloc", this._maxalloc, "address");
    output.write("ss", this._ss, "address");
    output.write("sp", this._sp, "address");
    output.write("csum", this._csum, "address");
    output.write("ip", this._ip, "address");
    output.write("cs", this._cs, "address");
    output.write("lfarlc", this._lfarlc, "address");
    output.write("ovno", this._ovno, "address");
    output.write("res", this._res, "count");
    output.write("oemid", this._oemid, "address");
    output.write("oeminfo", this._oeminfo, "address");
    output.write("res2", this._res2, "count");
    output.write("lfanew", this._lfanew, "address");
    output.end();
  }
}
