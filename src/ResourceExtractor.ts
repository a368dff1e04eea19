import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ByteCursor } from "./ByteCursor.ts";
import { resourceLanguageLabel, resourceNameLabel, resourceTypeName, type Resource } from "./ResourceManager.ts";

/** Receives the bytes of each extracted resource. */
export interface ResourceSink {
  write(resource: Resource, data: Buffer): void;
}

const UNSAFE_FILE_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/** Makes one path component out of a name taken from the image. */
export function safeFileName(text: string): string {
  const cleaned = text.replace(UNSAFE_FILE_CHARS, "_");
  return cleaned === "" || cleaned === "." || cleaned === ".." ? `_${cleaned}` : cleaned;
}

/** Directory (one per type) and file name a resource is written to. */
export function resourceOutputName(resource: Resource): { group: string; file: string } {
  return {
    group: safeFileName(resourceTypeName(resource.type)),
    file: `${safeFileName(resourceNameLabel(resource.name))}.${safeFileName(resourceLanguageLabel(resource.language))}`,
  };
}

/** Writes `<root>/<TYPE>/<name>.<language>`, replacing files that already exist. */
export class DirectorySink implements ResourceSink {
  private _root: string;
  private _groups = new Set<string>();

  constructor(root: string) {
    this._root = root;
  }

  /** Type directories created so far. */
  get groups(): ReadonlySet<string> {
    return this._groups;
  }

  write(resource: Resource, data: Buffer) {
    const { group, file } = resourceOutputName(resource);
    const dir = join(this._root, group);
    if (!this._groups.has(group)) {
      mkdirSync(dir, { recursive: true });
      this._groups.add(group);
    }
    writeFileSync(join(dir, file), data);
  }
}

/** Keeps extracted resources in memory, keyed by `TYPE/name.language`. */
export class MemorySink implements ResourceSink {
  readonly files = new Map<string, Buffer>();

  write(resource: Resource, data: Buffer) {
    const { group, file } = resourceOutputName(resource);
    this.files.set(`${group}/${file}`, Buffer.from(data));
  }
}

/**
 * Copies every resource's bytes from the source into `sink`, in order.
 * Resources already written stay written if a later one fails.
 */
export function extractResources(cursor: ByteCursor, resources: Iterable<Resource>, sink: ResourceSink): number {
  let count = 0;
  for (const resource of resources) {
    cursor.position = resource.offset;
    sink.write(resource, cursor.readBytes(resource.size));
    count++;
  }
  return count;
}
