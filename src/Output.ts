import { enumName, flagNames, type EnumNames, type FlagNames } from "./constants.ts";

/**
 * One field handed to an {@link Output}. The kind decides how each formatter
 * renders the value; enumerations and flag sets carry their name table.
 */
export type FieldArgs =
  | [value: number | readonly number[], kind: "count", names?: undefined]
  | [value: string | null, kind: "raw", names?: undefined]
  | [value: number | bigint, kind: "address", names?: undefined]
  | [value: number, kind: "datetime", names?: undefined]
  | [value: number, kind: "enum", names: EnumNames]
  | [value: number, kind: "flags", names: FlagNames]
  | [value: number, kind: "alignment", names?: undefined]
  | [value: readonly [number, number], kind: "version", names?: undefined]
  | [value: number | bigint, kind: "size", names?: undefined];

export type FieldKind = FieldArgs[1];

/** Hierarchical visitor the decoded structures report themselves to. */
export interface Output {
  begin(name: string): void;
  end(): void;
  write(name: string, ...field: FieldArgs): void;
}

const SIZE_UNITS = ["", "K", "M", "G", "T"];

/** `dd.mm.yyyy hh:mm:ss` in UTC. */
export function formatTimestamp(seconds: number): string {
  const date = new Date(seconds * 1000);
  const two = (n: number) => n.toString().padStart(2, "0");
  return `${two(date.getUTCDate())}.${two(date.getUTCMonth() + 1)}.${date.getUTCFullYear()} ` +
    `${two(date.getUTCHours())}:${two(date.getUTCMinutes())}:${two(date.getUTCSeconds())}`;
}

/** Exponent of a power-of-two alignment, or null when the value is not one. */
export function alignmentExponent(value: number): number | null {
  if (!Number.isSafeInteger(value) || value <= 0) return null;
  let exponent = 0;
  let rest = value;
  while (rest % 2 === 0) {
    rest /= 2;
    exponent++;
  }
  return rest === 1 ? exponent : null;
}

export function badAlignment(value: number) {
  return `<bad alignment 0x${value.toString(16)}>`;
}

export function formatSize(value: number | bigint): string {
  let size = Number(value);
  let unit = 0;
  while (size >= 512 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  const text = Number.isInteger(size) ? size.toString() : size.toFixed(2);
  return `${text}${SIZE_UNITS[unit] ?? ""}B`;
}

/** Human-readable rendering shared by the text and HTML formatters. */
export function formatText(...[value, kind, names]: FieldArgs): string {
  switch (kind) {
    case "count":
      return typeof value === "number" ? value.toString() : `[${value.join(", ")}]`;
    case "raw":
      return value ?? "<none>";
    case "address":
      return `0x${value.toString(16)}`;
    case "datetime":
      return formatTimestamp(value);
    case "enum":
      return enumName(value, names);
    case "flags": {
      const list = flagNames(value, names);
      return list.length > 0 ? list.join(" | ") : "0";
    }
    case "alignment": {
      const exponent = alignmentExponent(value);
      return exponent === null ? badAlignment(value) : `2^${exponent}`;
    }
    case "version":
      return `${value[0]}.${value[1]}`;
    case "size":
      return formatSize(value);
  }
}
