import type { ByteCursor } from "./ByteCursor.ts";
import type { Output } from "./Output.ts";
import { PEFormatError } from "./PEFormatError.ts";

/** Deepest nesting accepted below the root; real images use three levels. */
export const MAX_RESOURCE_DEPTH = 32;
/** Upper bound on entries decoded in one walk; a subtree shared by several entries counts each time it is reached. */
export const MAX_RESOURCE_ENTRIES = 0x10000;

const HIGH_BIT = 0x80000000;
const LOW_31_BITS = 0x7fffffff;

export type ResourceKey =
  | { kind: "name"; name: string }
  | { kind: "id"; id: number };

export type ResourcePayload =
  | { kind: "directory"; directory: ResourceDirectory }
  | { kind: "data"; data: ResourceDataEntry };

/** State carried down one recursive walk of the tree. */
export interface TreeWalk {
  /** Offset of the root directory; every entry offset is relative to it. */
  base: number;
  /** Directory offsets on the path from the root to the current node. */
  branch: Set<number>;
  depth: number;
  /** Entries decoded so far, across every branch. */
  visited: { entries: number };
}

export class ResourceDataEntry {
  private _offset: number;
  private _rva: number;
  private _size: number;
  private _codepage: number;

  constructor(cursor: ByteCursor) {
    this._offset = cursor.position;
    this._rva = cursor.readUInt(32);
    this._size = cursor.readUInt(32);
    this._codepage = cursor.readUInt(32);

    const reservedOffset = cursor.position;
    if (cursor.readUInt(32) !== 0) {
      throw new PEFormatError(reservedOffset, "Resource data entry reserved field must be zero");
    }
  }

  /** Position of this record in the byte source. */
  get offset() { return this._offset; }
  get rva() { return this._rva; }
  get size() { return this._size; }
  get codepage() { return this._codepage; }
}

export class ResourceDirectoryEntry {
  private _offset: number;
  private _key: ResourceKey;
  private _payload: ResourcePayload;

  private constructor(offset: number, key: ResourceKey, payload: ResourcePayload) {
    this._offset = offset;
    this._key = key;
    this._payload = payload;
  }

  /**
   * Decodes the 8-byte entry at the cursor. Name strings and payloads are
   * reached by seeking away from the entry table; the cursor always comes back
   * to the byte after the entry.
   */
  static read(cursor: ByteCursor, walk: TreeWalk, isNamed: boolean): ResourceDirectoryEntry {
    const start = cursor.position;
    if (++walk.visited.entries > MAX_RESOURCE_ENTRIES) {
      throw new PEFormatError(start, "Too many resource entries");
    }
    const nameField = cursor.readUInt(32);
    if (((nameField & HIGH_BIT) !== 0) !== isNamed) {
      throw new PEFormatError(start, "Named/id resource entry mismatch");
    }

    const key: ResourceKey = isNamed
      ? { kind: "name", name: readResourceName(cursor, walk.base + (nameField & LOW_31_BITS)) }
      : { kind: "id", id: nameField };

    const offsetField = cursor.readUInt(32);
    const target = walk.base + (offsetField & LOW_31_BITS);
    const resume = cursor.position;

    cursor.position = target;
    let payload: ResourcePayload;
    if ((offsetField & HIGH_BIT) !== 0) {
      payload = {
        kind: "directory",
        directory: ResourceDirectory.decode(cursor, { ...walk, depth: walk.depth + 1 }),
      };
    } else {
      payload = { kind: "data", data: new ResourceDataEntry(cursor) };
    }
    cursor.position = resume;

    return new ResourceDirectoryEntry(start, key, payload);
  }

  get offset() { return this._offset; }
  get key() { return this._key; }
  get payload() { return this._payload; }
}

/** Length-prefixed UTF-16LE string at `offset`; the cursor position is left as it was. */
function readResourceName(cursor: ByteCursor, offset: number): string {
  const saved = cursor.position;
  cursor.position = offset;
  const units = cursor.readUInt(16);
  // Lone surrogates pass through unchanged
  const name = cursor.readBytes(units * 2).toString("utf16le");
  cursor.position = saved;
  return name;
}

export class ResourceDirectory {
  private _offset: number;
  private _timeDateStamp: number;
  private _majorVersion: number;
  private _minorVersion: number;
  private _nameEntries = new Map<string, ResourceDirectoryEntry>();
  private _idEntries = new Map<number, ResourceDirectoryEntry>();

  private constructor(offset: number, timeDateStamp: number, majorVersion: number, minorVersion: number) {
    this._offset = offset;
    this._timeDateStamp = timeDateStamp;
    this._majorVersion = majorVersion;
    this._minorVersion = minorVersion;
  }

  /**
   * Decodes the directory at the cursor and everything below it. `base` is the
   * root directory's offset, which entry offsets at every level are relative to;
   * it defaults to the cursor position, i.e. reading the root itself.
   */
  static read(cursor: ByteCursor, base = cursor.position): ResourceDirectory {
    return ResourceDirectory.decode(cursor, { base, branch: new Set(), depth: 0, visited: { entries: 0 } });
  }

  static decode(cursor: ByteCursor, walk: TreeWalk): ResourceDirectory {
    const start = cursor.position;
    if (walk.branch.has(start)) {
      throw new PEFormatError(start, "Resource directory cycle");
    }
    if (walk.depth > MAX_RESOURCE_DEPTH) {
      throw new PEFormatError(start, "Resource directory nesting too deep");
    }

    if (cursor.readUInt(32) !== 0) {
      throw new PEFormatError(start, "Resource directory characteristics must be zero");
    }
    const directory = new ResourceDirectory(start, cursor.readUInt(32), cursor.readUInt(16), cursor.readUInt(16));
    const numberOfNamedEntries = cursor.readUInt(16);
    const numberOfIdEntries = cursor.readUInt(16);

    walk.branch.add(start);
    for (let i = 0; i < numberOfNamedEntries; i++) {
      directory.add(ResourceDirectoryEntry.read(cursor, walk, true));
    }
    for (let i = 0; i < numberOfIdEntries; i++) {
      directory.add(ResourceDirectoryEntry.read(cursor, walk, false));
    }
    walk.branch.delete(start);

    return directory;
  }

  private add(entry: ResourceDirectoryEntry) {
    const key = entry.key;
    const taken = key.kind === "name" ? this._nameEntries.has(key.name) : this._idEntries.has(key.id);
    if (taken) {
      throw new PEFormatError(entry.offset, "Duplicate resource directory entry");
    }
    if (key.kind === "name") {
      this._nameEntries.set(key.name, entry);
    } else {
      this._idEntries.set(key.id, entry);
    }
  }

  get offset() { return this._offset; }
  get timeDateStamp() { return this._timeDateStamp; }
  get majorVersion() { return this._majorVersion; }
  get minorVersion() { return this._minorVersion; }
  get nameEntries(): ReadonlyMap<string, ResourceDirectoryEntry> { return this._nameEntries; }
  get idEntries(): ReadonlyMap<number, ResourceDirectoryEntry> { return this._idEntries; }

  /** Named entries first, then id entries, each in the order they were stored. */
  *entries(): IterableIterator<ResourceDirectoryEntry> {
    yield* this._nameEntries.values();
    yield* this._idEntries.values();
  }

  printInfo(output: Output, name = "Resource Directory") {
    output.begin(name);
    output.write("Time stamp", this._timeDateStamp, "datetime");
    output.write("Version", [this._majorVersion, this._minorVersion], "version");
    output.write("Named entries", this._nameEntries.size, "count");
    output.write("Id entries", this._idEntries.size, "count");
    for (const entry of this.entries()) {
      const label = entry.key.kind === "name" ? entry.key.name : `#${entry.key.id}`;
      if (entry.payload.kind === "directory") {
        entry.payload.directory.printInfo(output, label);
      } else {
        output.begin(label);
        output.write("RVA", entry.payload.data.rva, "address");
        output.write("Size", entry.payload.data.size, "size");
        output.write("Codepage", entry.payload.data.codepage, "count");
        output.end();
      }
    }
    output.end();
  }
}
