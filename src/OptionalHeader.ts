import type { ByteCursor } from "./ByteCursor.ts";
import { DllCharacteristics, PE32_MAGIC, PE32_PLUS_MAGIC, Subsystem } from "./constants.ts";
import type { Output } from "./Output.ts";
import { PEFormatError } from "./PEFormatError.ts";

/** Fields shared by PE32 and PE32+ (offsets 0-23, plus BaseOfData at 24 in PE32). */
export interface StandardFields {
  magic: number;
  majorLinkerVersion: number;
  minorLinkerVersion: number;
  sizeOfCode: number;
  sizeOfInitializedData: number;
  sizeOfUninitializedData: number;
  addressOfEntryPoint: number;
  baseOfCode: number;
  /** Always 0 in PE32+, which has no such field. */
  baseOfData: number;
}

/** Windows-specific fields. The pointer-width ones are `bigint` in both layouts. */
export interface WindowsFields {
  imageBase: bigint;
  sectionAlignment: number;
  fileAlignment: number;
  majorOperatingSystemVersion: number;
  minorOperatingSystemVersion: number;
  majorImageVersion: number;
  minorImageVersion: number;
  majorSubsystemVersion: number;
  minorSubsystemVersion: number;
  sizeOfImage: number;
  sizeOfHeaders: number;
  checkSum: number;
  subsystem: number;
  dllCharacteristics: number;
  sizeOfStackReserve: bigint;
  sizeOfStackCommit: bigint;
  sizeOfHeapReserve: bigint;
  sizeOfHeapCommit: bigint;
  numberOfRvaAndSizes: number;
}

/** Size of the standard fields block: the whole header when no Windows fields follow. */
export const COFF_ONLY_SIZE = { pe32: 28, pe32Plus: 24 } as const;
/** Standard plus Windows-specific fields, up to the first data directory. */
export const WINDOWS_FIELDS_END = { pe32: 96, pe32Plus: 112 } as const;
export const MIN_OPTIONAL_HEADER_SIZE = 24;

abstract class OptionalHeaderBase implements StandardFields {
  abstract readonly kind: "coff" | "windows";
  readonly magic: number;
  readonly majorLinkerVersion: number;
  readonly minorLinkerVersion: number;
  readonly sizeOfCode: number;
  readonly sizeOfInitializedData: number;
  readonly sizeOfUninitializedData: number;
  readonly addressOfEntryPoint: number;
  readonly baseOfCode: number;
  readonly baseOfData: number;

  constructor(fields: StandardFields) {
    this.magic = fields.magic;
    this.majorLinkerVersion = fields.majorLinkerVersion;
    this.minorLinkerVersion = fields.minorLinkerVersion;
    this.sizeOfCode = fields.sizeOfCode;
    this.sizeOfInitializedData = fields.sizeOfInitializedData;
    this.sizeOfUninitializedData = fields.sizeOfUninitializedData;
    this.addressOfEntryPoint = fields.addressOfEntryPoint;
    this.baseOfCode = fields.baseOfCode;
    this.baseOfData = fields.baseOfData;
  }

  get isPE32Plus() {
    return this.magic === PE32_PLUS_MAGIC;
  }

  protected get title() {
    return `NT Optional ${this.isPE32Plus ? "Plus " : ""}Header`;
  }

  protected printStandardFields(output: Output) {
    output.write("Entry point", this.addressOfEntryPoint, "address");
    output.write("Base of code", this.baseOfCode, "address");
    if (this.baseOfData) {
      output.write("Base of data", this.baseOfData, "address");
    }
  }

  protected printCodeSizes(output: Output) {
    output.write("Code", this.sizeOfCode, "size");
    output.write("Initialized data", this.sizeOfInitializedData, "size");
    output.write("Uninitialized data", this.sizeOfUninitializedData, "size");
  }

  abstract printInfo(output: Output): void;
}

/** Header cut off right after the standard fields, as object files may carry it. */
export class CoffOptionalHeader extends OptionalHeaderBase {
  readonly kind = "coff";

  printInfo(output: Output) {
    output.begin(this.title);
    this.printStandardFields(output);
    output.write("Linker version", [this.majorLinkerVersion, this.minorLinkerVersion], "version");
    output.begin("Size");
    this.printCodeSizes(output);
    output.end();
    output.end();
  }
}

export class WindowsOptionalHeader extends OptionalHeaderBase implements WindowsFields {
  readonly kind = "windows";
  readonly imageBase: bigint;
  readonly sectionAlignment: number;
  readonly fileAlignment: number;
  readonly majorOperatingSystemVersion: number;
  readonly minorOperatingSystemVersion: number;
  readonly majorImageVersion: number;
  readonly minorImageVersion: number;
  readonly majorSubsystemVersion: number;
  readonly minorSubsystemVersion: number;
  readonly sizeOfImage: number;
  readonly sizeOfHeaders: number;
  readonly checkSum: number;
  readonly subsystem: number;
  readonly dllCharacteristics: number;
  readonly sizeOfStackReserve: bigint;
  readonly sizeOfStackCommit: bigint;
  readonly sizeOfHeapReserve: bigint;
  readonly sizeOfHeapCommit: bigint;
  readonly numberOfRvaAndSizes: number;

  constructor(standard: StandardFields, windows: WindowsFields) {
    super(standard);
    this.imageBase = windows.imageBase;
    this.sectionAlignment = windows.sectionAlignment;
    this.fileAlignment = windows.fileAlignment;
    this.majorOperatingSystemVersion = windows.majorOperatingSystemVersion;
    this.minorOperatingSystemVersion = windows.minorOperatingSystemVersion;
    this.majorImageVersion = windows.majorImageVersion;
    this.minorImageVersion = windows.minorImageVersion;
    this.majorSubsystemVersion = windows.majorSubsystemVersion;
    this.minorSubsystemVersion = windows.minorSubsystemVersion;
    this.sizeOfImage = windows.sizeOfImage;
    this.sizeOfHeaders = windows.sizeOfHeaders;
    this.checkSum = windows.checkSum;
    this.subsystem = windows.subsystem;
    this.dllCharacteristics = windows.dllCharacteristics;
    this.sizeOfStackReserve = windows.sizeOfStackReserve;
    this.sizeOfStackCommit = windows.sizeOfStackCommit;
    this.sizeOfHeapReserve = windows.sizeOfHeapReserve;
    this.sizeOfHeapCommit = windows.sizeOfHeapCommit;
    this.numberOfRvaAndSizes = windows.numberOfRvaAndSizes;
  }

  printInfo(output: Output) {
    output.begin(this.title);
    output.write("Subsystem", this.subsystem, "enum", Subsystem);
    output.write("DLL Characteristics", this.dllCharacteristics, "flags", DllCharacteristics);
    output.write("Checksum", this.checkSum, "address");
    this.printStandardFields(output);
    output.write("Image base", this.imageBase, "address");

    output.begin("Alignment");
    output.write("Section", this.sectionAlignment, "alignment");
    output.write("File", this.fileAlignment, "alignment");
    output.end();

    output.begin("Versions");
    output.write("Linker", [this.majorLinkerVersion, this.minorLinkerVersion], "version");
    output.write("OS", [this.majorOperatingSystemVersion, this.minorOperatingSystemVersion], "version");
    output.write("Image", [this.majorImageVersion, this.minorImageVersion], "version");
    output.write("Subsystem", [this.majorSubsystemVersion, this.minorSubsystemVersion], "version");
    output.end();

    output.begin("Size");
    this.printCodeSizes(output);
    output.write("Image", this.sizeOfImage, "size");
    output.write("Headers", this.sizeOfHeaders, "size");
    output.write("Stack reserve", this.sizeOfStackReserve, "size");
    output.write("Stack commit", this.sizeOfStackCommit, "size");
    output.write("Heap reserve", this.sizeOfHeapReserve, "size");
    output.write("Heap commit", this.sizeOfHeapCommit, "size");
    output.end();
    output.end();
  }
}

/** The two present variants; an absent header is `null`. */
export type OptionalHeader = CoffOptionalHeader | WindowsOptionalHeader;

/**
 * Decodes an optional header of the declared `size` at the cursor.
 *
 * The declared size picks the variant: 0 means absent, the end of the standard
 * fields means COFF-only, and anything longer must hold the Windows fields plus
 * exactly `numberOfRvaAndSizes` data directories. The directories themselves are
 * left for {@link readDataDirectories}.
 */
export function readOptionalHeader(cursor: ByteCursor, size: number): OptionalHeader | null {
  if (size === 0) return null;

  const start = cursor.position;
  if (size < MIN_OPTIONAL_HEADER_SIZE) {
    throw new PEFormatError(start, "Optional header too short");
  }

  const magic = cursor.readUInt(16);
  if (magic !== PE32_MAGIC && magic !== PE32_PLUS_MAGIC) {
    throw new PEFormatError(start, "Invalid optional header magic number");
  }
  const isPE32Plus = magic === PE32_PLUS_MAGIC;

  const majorLinkerVersion = cursor.readUInt(8);
  const minorLinkerVersion = cursor.readUInt(8);
  const sizeOfCode = cursor.readUInt(32);
  const sizeOfInitializedData = cursor.readUInt(32);
  const sizeOfUninitializedData = cursor.readUInt(32);
  const addressOfEntryPoint = cursor.readUInt(32);
  const baseOfCode = cursor.readUInt(32);

  let baseOfData = 0;
  if (!isPE32Plus) {
    if (size < COFF_ONLY_SIZE.pe32) {
      throw new PEFormatError(cursor.position, "Optional header too short for BaseOfData");
    }
    baseOfData = cursor.readUInt(32);
  }

  const standard: StandardFields = {
    magic,
    majorLinkerVersion,
    minorLinkerVersion,
    sizeOfCode,
    sizeOfInitializedData,
    sizeOfUninitializedData,
    addressOfEntryPoint,
    baseOfCode,
    baseOfData,
  };

  if (size === (isPE32Plus ? COFF_ONLY_SIZE.pe32Plus : COFF_ONLY_SIZE.pe32)) {
    return new CoffOptionalHeader(standard);
  }

  const directoriesSize = size - (isPE32Plus ? WINDOWS_FIELDS_END.pe32Plus : WINDOWS_FIELDS_END.pe32);
  if (directoriesSize < 0) {
    throw new PEFormatError(cursor.position, "Optional header too short for Windows fields");
  }

  const imageBase = cursor.readPointer(isPE32Plus);
  const sectionAlignment = cursor.readUInt(32);
  const fileAlignment = cursor.readUInt(32);
  const majorOperatingSystemVersion = cursor.readUInt(16);
  const minorOperatingSystemVersion = cursor.readUInt(16);
  const majorImageVersion = cursor.readUInt(16);
  const minorImageVersion = cursor.readUInt(16);
  const majorSubsystemVersion = cursor.readUInt(16);
  const minorSubsystemVersion = cursor.readUInt(16);

  const win32VersionValueOffset = cursor.position;
  if (cursor.readUInt(32) !== 0) {
    throw new PEFormatError(win32VersionValueOffset, "Win32VersionValue must be zero");
  }

  const sizeOfImage = cursor.readUInt(32);
  const sizeOfHeaders = cursor.readUInt(32);
  const checkSum = cursor.readUInt(32);
  const subsystem = cursor.readUInt(16);
  const dllCharacteristics = cursor.readUInt(16);
  const sizeOfStackReserve = cursor.readPointer(isPE32Plus);
  const sizeOfStackCommit = cursor.readPointer(isPE32Plus);
  const sizeOfHeapReserve = cursor.readPointer(isPE32Plus);
  const sizeOfHeapCommit = cursor.readPointer(isPE32Plus);

  const loaderFlagsOffset = cursor.position;
  if (cursor.readUInt(32) !== 0) {
    throw new PEFormatError(loaderFlagsOffset, "LoaderFlags must be zero");
  }

  const countOffset = cursor.position;
  const numberOfRvaAndSizes = cursor.readUInt(32);
  if (directoriesSize !== numberOfRvaAndSizes * 8) {
    throw new PEFormatError(countOffset, "Optional header size does not match count of data directories");
  }

  return new WindowsOptionalHeader(standard, {
    imageBase,
    sectionAlignment,
    fileAlignment,
    majorOperatingSystemVersion,
    minorOperatingSystemVersion,
    majorImageVersion,
    minorImageVersion,
    majorSubsystemVersion,
    minorSubsystemVersion,
    sizeOfImage,
    sizeOfHeaders,
    checkSum,
    subsystem,
    dllCharacteristics,
    sizeOfStackReserve,
    sizeOfStackCommit,
    sizeOfHeapReserve,
    sizeOfHeapCommit,
    numberOfRvaAndSizes,
  });
}
