// packages/core/src/stream/AudioDecryptor.ts
import type { Keybox } from '../algorithms/keystream/Keybox.js';
import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from '../config/defaults.js';
import { ensureUint8Array, type ByteInput } from '../util/bytes.js';
import { assertSliceBounds } from '../util/range.js';

/**
 * Position-addressed XOR of the audio section against a {@link Keybox}.
 * There is no chaining, so any byte range decrypts on its own and the
 * transform is its own inverse.
 */
export class AudioDecryptor {
  readonly #table: Uint8Array;

  constructor(
    keybox: Keybox,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > MAX_CHUNK_SIZE) {
      throw new RangeError(`Invalid chunkSize: ${chunkSize}. Must be an integer in [1, ${MAX_CHUNK_SIZE}].`);
    }
    this.#table = keybox.toUint8Array();
  }

  /** Decrypt `bytes`, whose first byte sits at section offset `offset`. */
  decrypt(bytes: Uint8Array, offset = 0): Uint8Array {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Invalid audio offset ${offset}`);
    }
    const out = new Uint8Array(bytes.length);
    const t   = this.#table;
    for (let i = 0; i < bytes.length; i++) {
      out[i] = bytes[i] ^ t[(offset + i) & 0xff];
    }
    return out;
  }

  /** Decrypt `section[start, end)` independently of the rest. */
  decryptRange(section: Uint8Array, start: number, end: number): Uint8Array {
    assertSliceBounds(section.length, start, end - start);
    return this.decrypt(section.subarray(start, end), start);
  }

  /** Lazily decrypted blocks of at most `chunkSize` bytes, in offset order. */
  *chunks(section: Uint8Array, chunkSize = this.chunkSize): Generator<Uint8Array, void, undefined> {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`Invalid chunkSize: ${chunkSize}`);
    }
    for (let off = 0; off < section.length; off += chunkSize) {
      yield this.decryptRange(section, off, Math.min(off + chunkSize, section.length));
    }
  }

  /** Whole section into one buffer of identical length. */
  decryptAll(section: Uint8Array): Uint8Array {
    const out = new Uint8Array(section.length);
    let off = 0;
    for (const block of this.chunks(section)) {
      out.set(block, off);
      off += block.length;
    }
    return out;
  }

  /**
   * Streaming form. `startOffset` is the section offset of the first byte
   * written, for resuming mid-section.
   */
  toTransformStream(startOffset = 0): TransformStream<ByteInput, Uint8Array> {
    let offset = startOffset;
    return new TransformStream({
      transform: async (chunk, ctl) => {
        const bytes = await ensureUint8Array(chunk);
        for (let i = 0; i < bytes.length; i += this.chunkSize) {
          const slice = bytes.subarray(i, Math.min(i + this.chunkSize, bytes.length));
          ctl.enqueue(this.decrypt(slice, offset));
          offset += slice.length;
        }
      },
    });
  }
}
