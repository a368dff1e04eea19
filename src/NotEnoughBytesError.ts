/**
 * Raised when a read runs past the end of the byte source.
 *
 * Kept apart from {@link PEFormatError}: a truncated file is not the same
 * failure as a structure that breaks a format rule.
 */
export class NotEnoughBytesError extends Error {
  offset: number;
  has: number;
  need: number;

  constructor(offset: number, has: number, need: number) {
    super(`Unexpected end of data at 0x${offset.toString(16)}: need ${need} bytes, ${has} available`);
    this.name = "NotEnoughBytesError";
    this.offset = offset;
    this.has = has;
    this.need = need;
  }
}
