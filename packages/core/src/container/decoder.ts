// packages/core/src/container/decoder.ts
import { Keybox } from '../algorithms/keystream/Keybox.js';
import { AudioFormatRegistry } from '../config/FormatRegistry.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { NcmError, UnknownAudioFormatError } from '../errors/index.js';
import { AudioDecryptor } from '../stream/AudioDecryptor.js';
import type {
  ContainerInfo,
  DecodeResult,
  DecodeWarning,
  DecoderState,
} from '../types/index.js';
import { ByteCursor } from '../util/ByteCursor.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { readPrelude } from './prelude.js';

/** Bytes needed to tell the supported formats apart. */
export const SNIFF_BYTES = 16;

export interface DecodeOptions {
  chunkSize? : number;
  log?       : Logger;
}

/**
 * Decode one container held in memory.
 *
 * Never throws for format problems: structural and key failures come back
 * as `fatal`, metadata failures and an unrecognised payload as `partial`.
 */
export function decodeContainer(bytes: Uint8Array, opt: DecodeOptions = {}): DecodeResult {
  const log = opt.log ?? silentLogger;
  let state: DecoderState = 'start';
  const enter = (s: DecoderState) => {
    state = s;
    log.log(4, `decoder → ${s}`);
  };

  try {
    const cur     = new ByteCursor(bytes);
    const prelude = readPrelude(cur, enter);
    const { sections } = prelude;
    log.log(3, `key=${sections.key.length}B meta=${sections.meta.length}B ` +
               `cover=${sections.cover.length}/${sections.coverSpace}B audio=${sections.audio.length}B`);

    const warnings: DecodeWarning[] = [];
    if (prelude.metadata.kind === 'error') {
      log.log(1, `Metadata skipped: ${prelude.metadata.error.message}`);
      warnings.push(prelude.metadata.error);
    } else if (prelude.metadata.kind === 'absent') {
      log.log(2, 'No metadata in container');
    }

    const decryptor = new AudioDecryptor(Keybox.derive(prelude.audioKey), opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    const audio     = decryptor.decryptAll(cur.rest());
    enter('audio-decrypted');

    const format = AudioFormatRegistry.sniff(audio.subarray(0, SNIFF_BYTES));
    if (format.id === 'unknown') {
      log.log(1, 'Decrypted payload matches no known audio format');
      warnings.push(new UnknownAudioFormatError('Decrypted audio matches no known format'));
    }
    enter('done');

    const container = {
      audio,
      format,
      metadata: prelude.metadata.kind === 'ok' ? prelude.metadata.metadata : undefined,
      cover   : prelude.cover,
      sections,
    };
    return warnings.length
      ? { kind: 'partial', container, warnings }
      : { kind: 'complete', container };
  } catch (err) {
    const failedAt = state;
    enter('failed');
    if (err instanceof NcmError) {
      log.log(0, `Decode failed after ${failedAt}: ${err.message}`);
      return { kind: 'fatal', error: err, state: failedAt };
    }
    throw err;
  }
}

/**
 * Parse the prelude and sniff the payload format without decrypting the
 * whole audio section.
 *
 * @throws {InvalidMagicError | TruncatedInputError | KeyRecoveryError}
 */
export function inspectContainer(bytes: Uint8Array): ContainerInfo {
  const cur     = new ByteCursor(bytes);
  const prelude = readPrelude(cur);
  const head    = cur.readExact(Math.min(SNIFF_BYTES, cur.remaining), 'audio head');
  const decryptor = new AudioDecryptor(Keybox.derive(prelude.audioKey));
  return {
    sections  : prelude.sections,
    metadata  : prelude.metadata,
    format    : AudioFormatRegistry.sniff(decryptor.decrypt(head, 0)),
    coverBytes: prelude.cover?.length ?? 0,
  };
}
