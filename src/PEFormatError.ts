/**
 * A structure in the image breaks a rule of the PE format.
 * `offset` is the absolute position in the byte source of the field that failed the check.
 */
export class PEFormatError extends Error {
  offset: number;
  reason: string;

  constructor(offset: number, reason: string) {
    super(`${reason} at 0x${offset.toString(16)}`);
    this.name = "PEFormatError";
    this.offset = offset;
    this.reason = reason;
  }
}
