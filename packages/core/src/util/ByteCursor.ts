// packages/core/src/util/ByteCursor.ts
import { TruncatedInputError } from '../errors/index.js';
import { decodeFrameLen, FRAME_HEADER_BYTES } from './frame.js';

/**
 * Forward-only, bounds-checked reader over an in-memory container.
 * Returned slices are views; callers copy before mutating.
 */
export class ByteCursor {
  #pos = 0;

  constructor(private readonly buf: Uint8Array) {}

  get position(): number  { return this.#pos; }
  get remaining(): number { return this.buf.byteLength - this.#pos; }

  /** Next `n` bytes, or TruncatedInputError when fewer remain. */
  readExact(n: number, what = 'field'): Uint8Array {
    this.ensure(n, what);
    const out = this.buf.subarray(this.#pos, this.#pos + n);
    this.#pos += n;
    return out;
  }

  readUint8(what = 'byte'): number {
    this.ensure(1, what);
    return this.buf[this.#pos++];
  }

  readUint32LE(what = 'length prefix'): number {
    this.ensure(FRAME_HEADER_BYTES, what);
    const n = decodeFrameLen(this.buf, this.#pos);
    this.#pos += FRAME_HEADER_BYTES;
    return n;
  }

  /** Length-prefixed section: u32 LE length, then that many bytes. */
  readSection(what: string): { offset: number; bytes: Uint8Array } {
    const len    = this.readUint32LE(`${what} length`);
    const offset = this.#pos;
    return { offset, bytes: this.readExact(len, `${what} section`) };
  }

  skip(n: number, what = 'gap'): void {
    this.ensure(n, what);
    this.#pos += n;
  }

  rest(): Uint8Array {
    const out = this.buf.subarray(this.#pos);
    this.#pos = this.buf.byteLength;
    return out;
  }

  private ensure(n: number, what: string): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Invalid read length ${n}`);
    }
    if (n > this.remaining) {
      throw new TruncatedInputError(
        `Truncated input: ${what} needs ${n} bytes at offset ${this.#pos}, ${this.remaining} remain`,
        this.#pos + n,
      );
    }
  }
}
