// packages/core/src/container/encoder.ts
import { Keybox } from '../algorithms/keystream/Keybox.js';
import { sealAudioKey } from '../algorithms/KeyCipher.js';
import { sealMetadata } from '../algorithms/MetaCipher.js';
import { NCM_CONSTANTS } from '../config/constants.js';
import { EncodingError } from '../errors/index.js';
import { AudioDecryptor } from '../stream/AudioDecryptor.js';
import { asciiBytes, concat } from '../util/bytes.js';
import type { JsonObject } from '../util/json.js';
import { encodeFrameLen } from '../util/frame.js';

export interface EncodeInput {
  audioKey    : Uint8Array;
  /** Plaintext payload; stored encrypted, never transcoded. */
  audio       : Uint8Array;
  metadata?   : JsonObject;
  cover?      : Uint8Array;
  /** Bytes reserved for the cover; defaults to the cover length. */
  coverSpace? : number;
  crc32?      : number;
}

/** Build a container the decoder accepts. */
export function encodeContainer(input: EncodeInput): Uint8Array {
  const cover      = input.cover ?? new Uint8Array(0);
  const coverSpace = input.coverSpace ?? cover.length;
  if (coverSpace < cover.length) {
    throw new EncodingError(`coverSpace ${coverSpace} is smaller than the cover (${cover.length} B)`);
  }

  const key  = sealAudioKey(input.audioKey);
  const meta = input.metadata ? sealMetadata(input.metadata) : new Uint8Array(0);
  const enc  = new AudioDecryptor(Keybox.derive(input.audioKey)).decrypt(input.audio, 0);

  return concat(
    asciiBytes(NCM_CONSTANTS.MAGIC),
    new Uint8Array(NCM_CONSTANTS.MAGIC_GAP_BYTES),
    encodeFrameLen(key.length), key,
    encodeFrameLen(meta.length), meta,
    encodeFrameLen(input.crc32 ?? 0),
    new Uint8Array(NCM_CONSTANTS.CRC_GAP_BYTES),
    encodeFrameLen(coverSpace),
    encodeFrameLen(cover.length), cover,
    new Uint8Array(coverSpace - cover.length),
    enc,
  );
}
