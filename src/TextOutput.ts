import { formatText, type FieldArgs, type Output } from "./Output.ts";

const INDENT = "    ";

/** Indented `name: value` listing, one group level per four spaces. */
export class TextOutput implements Output {
  private _lines: string[] = [];
  private _depth = 0;
  private _sink: (line: string) => void;

  /** Lines go to `sink` as they are produced, and are kept for {@link toString}. */
  constructor(sink: (line: string) => void = () => undefined) {
    this._sink = sink;
  }

  begin(name: string) {
    this.print(`${name}:`);
    this._depth++;
  }

  end() {
    if (this._depth === 0) throw new Error("end() without matching begin()");
    this._depth--;
    this.emit("");
  }

  write(name: string, ...field: FieldArgs) {
    this.print(`${name}: ${formatText(...field)}`);
  }

  get lines(): readonly string[] {
    return this._lines;
  }

  toString() {
    return this._lines.join("\n");
  }

  private print(text: string) {
    this.emit(INDENT.repeat(this._depth) + text);
  }

  private emit(line: string) {
    this._lines.push(line);
    this._sink(line);
  }
}
