import { alignmentExponent, badAlignment, formatTimestamp, type FieldArgs, type Output } from "./Output.ts";

export type JsonValue = number | string | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

function jsonInteger(value: number | bigint): number | string {
  if (typeof value === "number") return value;
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}

export function formatJson(...[value, kind]: FieldArgs): JsonValue {
  switch (kind) {
    case "count":
      return typeof value === "number" ? value : [...value];
    case "raw":
      return value;
    case "address":
    case "size":
      return jsonInteger(value);
    case "datetime":
      return formatTimestamp(value);
    case "enum":
    case "flags":
      return value;
    case "alignment":
      return alignmentExponent(value) ?? badAlignment(value);
    case "version":
      return [value[0], value[1]];
  }
}

/** Collects the reported fields into nested plain objects, ready for `JSON.stringify`. */
export class JsonOutput implements Output {
  readonly result: JsonObject = {};
  private _stack: JsonObject[] = [this.result];

  /** A group named like an earlier sibling (two sections called `.data`) is stored as `name (2)`, `name (3)`, … */
  begin(name: string) {
    const group: JsonObject = {};
    const parent = this.current;
    let key = name;
    for (let n = 2; Object.hasOwn(parent, key); n++) {
      key = `${name} (${n})`;
    }
    parent[key] = group;
    this._stack.push(group);
  }

  end() {
    if (this._stack.length === 1) throw new Error("end() without matching begin()");
    this._stack.pop();
  }

  write(name: string, ...field: FieldArgs) {
    this.current[name] = formatJson(...field);
  }

  private get current(): JsonObject {
    const top = this._stack[this._stack.length - 1];
    if (!top) throw new Error("Output stack is empty");
    return top;
  }
}
