// packages/core/src/algorithms/keystream/Keybox.ts
import { NCM_CONSTANTS } from '../../config/constants.js';
import { KeyRecoveryError } from '../../errors/index.js';

const SIZE = NCM_CONSTANTS.KEYBOX_SIZE;

/**
 * 256-byte keystream table derived from a per-file audio key.
 *
 * ## Derivation
 * 1. RC4 key scheduling over `S = [0..255]` with the audio key
 *    (`j = (j + S[i] + key[i % L]) & 0xff`, swap `S[i]`/`S[j]`).
 * 2. No RC4 output loop. Instead, with `a = (i + 1) & 0xff`:
 *    `K[i] = S[(S[a] + S[(a + S[a]) & 0xff]) & 0xff]`.
 *
 * Step 2 is where this format departs from RC4. Replacing it with the RC4
 * PRGA produces output that looks plausible and is wrong from byte zero.
 *
 * ## Use
 * Byte `p` of the audio section is XOR-ed with `K[p & 0xff]`; the table does
 * not advance, so any offset can be decrypted on its own.
 */
export class Keybox {
  readonly #table: Uint8Array;

  private constructor(table: Uint8Array) {
    this.#table = table;
  }

  /**
   * Derive the keybox for `audioKey`.
   * @throws {KeyRecoveryError} if the key is empty.
   */
  static derive(audioKey: Uint8Array): Keybox {
    const len = audioKey.length;
    if (len === 0) throw new KeyRecoveryError('Audio key must not be empty');

    const s = new Uint8Array(SIZE);
    for (let i = 0; i < SIZE; i++) s[i] = i;

    let j = 0;
    for (let i = 0; i < SIZE; i++) {
      j = (j + s[i] + audioKey[i % len]) & 0xff;
      const t = s[i];
      s[i] = s[j];
      s[j] = t;
    }

    const k = new Uint8Array(SIZE);
    for (let i = 0; i < SIZE; i++) {
      const a = (i + 1) & 0xff;
      const b = (a + s[a]) & 0xff;
      k[i] = s[(s[a] + s[b]) & 0xff];
    }
    return new Keybox(k);
  }

  /** Keystream byte for absolute audio offset `offset`. */
  at(offset: number): number {
    return this.#table[offset & 0xff];
  }

  /** Copy of the table. */
  toUint8Array(): Uint8Array {
    return this.#table.slice();
  }
}
