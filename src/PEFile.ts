import { ByteCursor } from "./ByteCursor.ts";
import { FileSource } from "./ByteSource.ts";
import { RESOURCE_DIRECTORY_INDEX } from "./constants.ts";
import { DataDirectory, readDataDirectories } from "./DataDirectory.ts";
import { DOSHeader } from "./DOSHeader.ts";
import { rvaToOffset, sectionForRva } from "./helpers.ts";
import { readOptionalHeader, type OptionalHeader } from "./OptionalHeader.ts";
import type { Output } from "./Output.ts";
import { PEHeader } from "./PEHeader.ts";
import { ResourceManager } from "./ResourceManager.ts";
import { SectionHeader } from "./SectionHeader.ts";

/** Printable ASCII as is, everything else as `\xNN`. */
function escapeBytes(data: Buffer): string {
  let text = "";
  for (const byte of data) {
    text += byte >= 0x20 && byte <= 0x7e ? String.fromCharCode(byte) : `\\x${byte.toString(16).padStart(2, "0")}`;
  }
  return text;
}

/** Headers and tables of one PE image, decoded in file order. */
export class PEFile {
  private _dosHeader: DOSHeader;
  private _dosCode: Buffer;
  private _peHeader: PEHeader;
  private _optionalHeader: OptionalHeader | null;
  private _dataDirectories: readonly DataDirectory[];
  private _sectionList: readonly SectionHeader[];
  private _sections: ReadonlyMap<string, SectionHeader>;

  private constructor(
    dosHeader: DOSHeader,
    dosCode: Buffer,
    peHeader: PEHeader,
    optionalHeader: OptionalHeader | null,
    dataDirectories: DataDirectory[],
    sectionList: SectionHeader[],
  ) {
    this._dosHeader = dosHeader;
    this._dosCode = dosCode;
    this._peHeader = peHeader;
    this._optionalHeader = optionalHeader;
    this._dataDirectories = dataDirectories;
    this._sectionList = sectionList;
    this._sections = new Map(sectionList.map(s => [s.name, s]));
  }

  /** Decodes an image starting at the cursor's position. */
  static read(cursor: ByteCursor): PEFile {
    const dosHeader = new DOSHeader(cursor);
    const dosCode = cursor.readBytes(Math.max(0, dosHeader.lfanew - cursor.position));
    cursor.position = dosHeader.lfanew;

    const peHeader = new PEHeader(cursor);
    const optionalHeader = readOptionalHeader(cursor, peHeader.sizeOfOptionalHeader);
    const dataDirectories = optionalHeader?.kind === "windows"
      ? readDataDirectories(cursor, optionalHeader.numberOfRvaAndSizes)
      : [];

    const sectionList: SectionHeader[] = [];
    for (let i = 0; i < peHeader.numberOfSections; i++) {
      sectionList.push(new SectionHeader(cursor));
    }

    return new PEFile(dosHeader, dosCode, peHeader, optionalHeader, dataDirectories, sectionList);
  }

  static open(filePath: string): PEFile {
    const source = new FileSource(filePath);
    try {
      return PEFile.read(new ByteCursor(source));
    } finally {
      source.close();
    }
  }

  get dosHeader() { return this._dosHeader; }
  get dosCode() { return this._dosCode; }
  get peHeader() { return this._peHeader; }
  get optionalHeader() { return this._optionalHeader; }
  get dataDirectories() { return this._dataDirectories; }
  /** Section headers by name; with duplicate names the later header wins. */
  get sections() { return this._sections; }
  /** Every section header in table order. */
  get sectionList() { return this._sectionList; }
  get isPE32Plus() { return this._optionalHeader?.isPE32Plus ?? false; }

  /** File offset of a data directory's contents, or -1 when it maps to no section. */
  dataDirectoryOffset(index: number): number {
    const directory = this._dataDirectories[index];
    if (!directory || directory.isEmpty) return -1;
    if (directory.isFileOffset) return directory.virtualAddress;
    return rvaToOffset(directory.virtualAddress, this._sectionList);
  }

  /** The section holding the resource directory, falling back to one named `.rsrc`. */
  resourceSection(): SectionHeader | null {
    const directory = this._dataDirectories[RESOURCE_DIRECTORY_INDEX];
    if (directory && !directory.isEmpty) {
      const section = sectionForRva(directory.virtualAddress, this._sectionList);
      if (section) return section;
    }
    return this._sections.get(".rsrc") ?? null;
  }

  /** Decodes the resource tree, or returns null when the image has none. */
  resources(cursor: ByteCursor): ResourceManager | null {
    const section = this.resourceSection();
    if (!section) return null;
    const directory = this._dataDirectories[RESOURCE_DIRECTORY_INDEX];
    const base = directory && !directory.isEmpty && section.containsRva(directory.virtualAddress)
      ? section.pointerToRawData + (directory.virtualAddress - section.virtualAddress)
      : section.pointerToRawData;
    return new ResourceManager(cursor, section, base);
  }

  printInfo(output: Output) {
    this._dosHeader.printInfo(output);
    output.write("DOS Code", escapeBytes(this._dosCode), "raw");
    this._peHeader.printInfo(output);
    this._optionalHeader?.printInfo(output);

    output.begin("Data Directories");
    for (const directory of this._dataDirectories) {
      directory.printInfo(output);
    }
    output.end();

    output.begin("Sections");
    for (const section of this._sectionList) {
      section.printInfo(output);
    }
    output.end();
  }
}
