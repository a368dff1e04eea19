import type { ByteCursor } from "./ByteCursor.ts";
import { ResourceType } from "./constants.ts";
import type { Output } from "./Output.ts";
import { PEFormatError } from "./PEFormatError.ts";
import { ResourceDirectory, type ResourceKey } from "./ResourceDirectory.ts";
import type { SectionHeader } from "./SectionHeader.ts";

/** One leaf of the resource tree, addressed by type, name and language. */
export interface Resource {
  type: ResourceKey;
  name: ResourceKey;
  language: ResourceKey;
  rva: number;
  size: number;
  codepage: number;
  /** Absolute position of the resource bytes in the byte source. */
  offset: number;
}

/** `ICON`, `MANIFEST`, … for predefined types, `TYPE_<id>` for other ids, the name itself for named types. */
export function resourceTypeName(key: ResourceKey): string {
  if (key.kind === "name") return key.name;
  return ResourceType.get(key.id) ?? `TYPE_${key.id}`;
}

export function resourceNameLabel(key: ResourceKey): string {
  return key.kind === "name" ? key.name : key.id.toString();
}

/** Language ids are printed in hex, the way LCIDs are usually written (409 for en-US). */
export function resourceLanguageLabel(key: ResourceKey): string {
  return key.kind === "name" ? key.name : key.id.toString(16);
}

/**
 * Decodes the resource tree of a section and flattens it into {@link Resource}
 * records. The root directory sits at `base`, the start of the section's raw
 * data unless the resource data directory points elsewhere inside the section.
 */
export class ResourceManager {
  private _section: SectionHeader;
  private _root: ResourceDirectory;
  private _resources: Resource[] = [];

  constructor(cursor: ByteCursor, section: SectionHeader, base = section.pointerToRawData) {
    this._section = section;
    cursor.position = base;
    this._root = ResourceDirectory.read(cursor);
    this.collect(this._root, []);
  }

  get section() { return this._section; }
  get root() { return this._root; }
  get resources(): readonly Resource[] { return this._resources; }

  private collect(directory: ResourceDirectory, path: ResourceKey[]) {
    for (const entry of directory.entries()) {
      if (entry.payload.kind === "directory") {
        this.collect(entry.payload.directory, [...path, entry.key]);
        continue;
      }

      const data = entry.payload.data;
      const [type, name] = path;
      if (type === undefined || name === undefined) {
        throw new PEFormatError(data.offset, "Resource data entry outside type/name/language levels");
      }
      const offset = data.rva + this._section.pointerToRawData - this._section.virtualAddress;
      if (offset < 0) {
        throw new PEFormatError(data.offset, "Resource data RVA lies before its section");
      }
      this._resources.push({
        type,
        name,
        language: entry.key,
        rva: data.rva,
        size: data.size,
        codepage: data.codepage,
        offset,
      });
    }
  }

  printInfo(output: Output) {
    output.begin("Resources");
    for (const resource of this._resources) {
      output.begin(`${resourceTypeName(resource.type)}/${resourceNameLabel(resource.name)}.${resourceLanguageLabel(resource.language)}`);
      output.write("Offset", resource.offset, "address");
      output.write("Size", resource.size, "size");
      output.write("Codepage", resource.codepage, "count");
      output.end();
    }
    output.end();
  }
}
