// packages/core/src/container/prelude.ts
import { NCM_CONSTANTS } from '../config/constants.js';
import { recoverAudioKey } from '../algorithms/KeyCipher.js';
import { openMetadata } from '../algorithms/MetaCipher.js';
import { InvalidMagicError } from '../errors/index.js';
import type { DecoderState, Prelude } from '../types/index.js';
import { ByteCursor } from '../util/ByteCursor.js';
import { asciiBytes, startsWith } from '../util/bytes.js';

const MAGIC_BYTES = asciiBytes(NCM_CONSTANTS.MAGIC);

export function hasMagic(buf: Uint8Array): boolean {
  return startsWith(buf, MAGIC_BYTES);
}

/**
 * Walk header, key, metadata and cover sections in order. `onState` sees
 * every state reached, so a caller can tell where a fatal error struck.
 * The cursor is left at the first audio byte.
 *
 * @throws {InvalidMagicError | TruncatedInputError | KeyRecoveryError}
 */
export function readPrelude(
  cur: ByteCursor,
  onState: (s: DecoderState) => void = () => {},
): Prelude {
  const magicLen = MAGIC_BYTES.length;
  if (cur.remaining < magicLen || !hasMagic(cur.readExact(magicLen, 'magic'))) {
    throw new InvalidMagicError('Invalid input format. Not an NCM container.');
  }
  cur.skip(NCM_CONSTANTS.MAGIC_GAP_BYTES, 'header gap');
  onState('header-validated');

  const key      = cur.readSection('key');
  const audioKey = recoverAudioKey(key.bytes);
  onState('key-recovered');

  const meta     = cur.readSection('meta');
  const metadata = openMetadata(meta.bytes);
  onState('meta-recovered');

  const crc32 = cur.readUint32LE('crc32');
  cur.readUint8('reserved byte');
  const coverSpace = cur.readUint32LE('cover frame');
  const cover      = cur.readSection('cover');
  if (coverSpace > cover.bytes.length) {
    cur.skip(coverSpace - cover.bytes.length, 'cover frame padding');
  }
  onState('cover-read');

  return {
    audioKey,
    metadata,
    cover: cover.bytes.length > 0 ? cover.bytes.slice() : undefined,
    sections: {
      key   : { offset: key.offset,   length: key.bytes.length },
      meta  : { offset: meta.offset,  length: meta.bytes.length },
      crc32,
      coverSpace,
      cover : { offset: cover.offset, length: cover.bytes.length },
      audio : { offset: cur.position, length: cur.remaining },
    },
  };
}

export function parsePrelude(buf: Uint8Array): Prelude {
  return readPrelude(new ByteCursor(buf));
}
