// packages/core/src/index.ts

import './config/defaults.js';

import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from './config/defaults.js';
import { NCM_CONSTANTS } from './config/constants.js';
import { decodeContainer, inspectContainer } from './container/decoder.js';
import { hasMagic } from './container/prelude.js';
import {
  ContainerDecryptTransform,
  type StreamPrelude,
} from './stream/ContainerDecryptTransform.js';
import type { ContainerInfo, DecodeResult } from './types/index.js';
import { ensureUint8Array, type ByteInput } from './util/bytes.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring NcmDecoder instance behavior.
 */
export interface NcmDecoderOptions {
  /** Size of the decrypted audio blocks; defaults to 32 KiB */
  chunkSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?   : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?    : (msg: string) => void;
}

/**
 * Result of creating a decryption stream: paired streams plus the parsed
 * prelude once enough input has arrived.
 */
export interface DecryptStreamResult {
  writable : WritableStream<ByteInput>;
  readable : ReadableStream<Uint8Array>;
  prelude  : Promise<StreamPrelude>;
}

/**
 * NcmDecoder turns NCM containers back into their original audio bitstream.
 */
export class NcmDecoder {
  private chunkSize : number;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: NcmDecoderOptions = {}) {
    this.chunkSize = NcmDecoder.checkChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.log       = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /** True when the input starts with the container magic. */
  static async isContainer(input: ByteInput): Promise<boolean> {
    const head = input instanceof Blob
      ? new Uint8Array(await input.slice(0, NCM_CONSTANTS.MAGIC.length).arrayBuffer())
      : await ensureUint8Array(input);
    return hasMagic(head);
  }

  /**
   * Section layout, metadata and detected format, without decrypting the
   * audio section.
   * @throws {InvalidMagicError | TruncatedInputError | KeyRecoveryError}
   */
  static async inspect(input: ByteInput): Promise<ContainerInfo> {
    return inspectContainer(await ensureUint8Array(input));
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters
  // ════════════════════════════════════════════════════════════════════════

  setChunkSize(bytes: number): void { this.chunkSize = NcmDecoder.checkChunkSize(bytes); }
  getChunkSize(): number            { return this.chunkSize; }

  setVerbose(level: Verbosity): void { this.log.level = level; }
  getVerbose(): Verbosity            { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Decoding
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Decode a whole container held in memory. Fatal problems are returned,
   * not thrown; see {@link DecodeResult}.
   */
  async decode(input: ByteInput): Promise<DecodeResult> {
    const bytes = await ensureUint8Array(input);
    this.log.log(1, `Start decode, ${bytes.byteLength} bytes`);
    const res = decodeContainer(bytes, { chunkSize: this.chunkSize, log: this.log });
    this.log.log(1, `Decode finished: ${res.kind}`);
    return res;
  }

  /** Streaming decode: container bytes in, decrypted audio out. */
  createDecryptionStream(): DecryptStreamResult {
    const t  = new ContainerDecryptTransform(this.chunkSize, this.log);
    const { writable, readable } = t.toStreamPair();
    return { writable, readable, prelude: t.prelude };
  }

  private static checkChunkSize(bytes: number): number {
    if (!Number.isInteger(bytes) || bytes < 1) {
      throw new RangeError(`Invalid chunkSize: ${bytes}. Must be a positive integer.`);
    }
    if (bytes > MAX_CHUNK_SIZE) {
      throw new RangeError(`chunkSize cannot exceed ${MAX_CHUNK_SIZE} bytes.`);
    }
    return bytes;
  }
}

export { decodeContainer, inspectContainer } from './container/decoder.js';
export { encodeContainer, type EncodeInput } from './container/encoder.js';
export { parsePrelude, hasMagic } from './container/prelude.js';
export { recoverAudioKey, sealAudioKey } from './algorithms/KeyCipher.js';
export { openMetadata, sealMetadata, parseMusicMetadata } from './algorithms/MetaCipher.js';
export { Keybox } from './algorithms/keystream/Keybox.js';
export { AudioDecryptor } from './stream/AudioDecryptor.js';
export type { StreamPrelude } from './stream/ContainerDecryptTransform.js';
export { AudioFormatRegistry, UNKNOWN_FORMAT } from './config/FormatRegistry.js';
export { NCM_CONSTANTS } from './config/constants.js';
export { DEFAULT_CHUNK_SIZE, DEFAULT_COVER_TIMEOUT_MS, defaultWorkerCount } from './config/defaults.js';
export { ByteCursor } from './util/ByteCursor.js';
export { concat, base64Encode, base64Decode, type ByteInput } from './util/bytes.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export * from './errors/index.js';
export type * from './types/index.js';
