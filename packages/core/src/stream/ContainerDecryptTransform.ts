// packages/core/src/stream/ContainerDecryptTransform.ts
import { Keybox } from '../algorithms/keystream/Keybox.js';
import { readPrelude } from '../container/prelude.js';
import { NCM_CONSTANTS } from '../config/constants.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { TruncatedInputError } from '../errors/index.js';
import type { ContainerSections, MetadataOutcome } from '../types/index.js';
import { ByteCursor } from '../util/ByteCursor.js';
import { concat, ensureUint8Array, type ByteInput } from '../util/bytes.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { AudioDecryptor } from './AudioDecryptor.js';

/** Prelude as seen by a stream: the audio length is not known up front. */
export interface StreamPrelude {
  metadata : MetadataOutcome;
  cover?   : Uint8Array;
  sections : Omit<ContainerSections, 'audio'>;
  audioOffset : number;
}

export const PRELUDE_HARD_LIMIT = 64 * 1024 * 1024; // 64 MiB

/**
 * Whole container in, decrypted audio out.
 * Input is held back until the prelude parses, then every further byte is
 * decrypted and passed on at once. A parse is only retried once the input
 * has reached the length the last attempt ran short of.
 */
export class ContainerDecryptTransform {
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private awaiting: number = NCM_CONSTANTS.MAGIC.length;
  private decryptor: AudioDecryptor | null = null;
  private offset = 0;

  private settle: {
    resolve: (p: StreamPrelude) => void;
    reject : (e: unknown) => void;
  } = { resolve: () => {}, reject: () => {} };

  /** Resolves once the prelude is parsed; rejects with the stream's fatal error or on abort. */
  readonly prelude: Promise<StreamPrelude>;

  constructor(
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
    private readonly log: Logger = silentLogger,
    private readonly preludeLimit = PRELUDE_HARD_LIMIT,
  ) {
    this.prelude = new Promise<StreamPrelude>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
    // the same error is delivered through the stream
    this.prelude.catch(err => this.log.log(2, `prelude rejected: ${String(err)}`));
  }

  /**
   * Writable and readable sides of the transform. Aborting the writable or
   * cancelling the readable before the prelude parses rejects `prelude`.
   */
  toStreamPair(): ReadableWritablePair<Uint8Array, ByteInput> {
    const inner = new TransformStream<ByteInput, Uint8Array>({
      transform: async (chunk, ctl) => {
        this.transform(await ensureUint8Array(chunk), ctl);
      },
      flush: ctl => this.flush(ctl),
    });

    const writer = inner.writable.getWriter();
    const reader = inner.readable.getReader();
    let cancelled = false;

    const writable = new WritableStream<ByteInput>({
      write: chunk => writer.write(chunk),
      close: () => writer.close(),
      abort: reason => {
        this.abandon(reason);
        return writer.abort(reason);
      },
    });
    const readable = new ReadableStream<Uint8Array>({
      pull: async ctl => {
        const { done, value } = await reader.read();
        if (cancelled) return;
        if (done) ctl.close();
        else ctl.enqueue(value);
      },
      cancel: reason => {
        cancelled = true;
        this.abandon(reason);
        return reader.cancel(reason);
      },
    });
    return { writable, readable };
  }

  private transform(bytes: Uint8Array, ctl: TransformStreamDefaultController<Uint8Array>) {
    if (this.decryptor) {
      this.emit(bytes, ctl);
      return;
    }
    this.pending.push(bytes);
    this.pendingBytes += bytes.length;
    if (this.pendingBytes < this.awaiting) return;
    this.tryParse(ctl, false);
  }

  private flush(ctl: TransformStreamDefaultController<Uint8Array>) {
    if (!this.decryptor) this.tryParse(ctl, true);
  }

  private tryParse(ctl: TransformStreamDefaultController<Uint8Array>, final: boolean) {
    const buffer = concat(...this.pending);
    this.pending = [buffer];

    const cur = new ByteCursor(buffer);
    try {
      const p = readPrelude(cur);
      this.decryptor = new AudioDecryptor(Keybox.derive(p.audioKey), this.chunkSize);
      const { audio, ...sections } = p.sections;
      this.log.log(2, `prelude parsed, audio starts at ${audio.offset}`);
      this.settle.resolve({ metadata: p.metadata, cover: p.cover, sections, audioOffset: audio.offset });
    } catch (err) {
      if (err instanceof TruncatedInputError && !final) {
        const needed = err.needed ?? buffer.length + 1;
        if (needed <= this.preludeLimit) {
          this.awaiting = needed;
          this.log.log(3, `prelude incomplete, waiting for ${needed} bytes`);
          return;
        }
        this.fail(new TruncatedInputError(`Prelude exceeds ${this.preludeLimit} bytes`), ctl);
        return;
      }
      this.fail(err, ctl);
      return;
    }

    this.pending = [];
    this.pendingBytes = 0;
    this.emit(cur.rest(), ctl);
  }

  private fail(err: unknown, ctl: TransformStreamDefaultController<Uint8Array>) {
    this.pending = [];
    this.pendingBytes = 0;
    this.settle.reject(err);
    ctl.error(err);
  }

  /** Consumer gave up; a prelude that already resolved stays resolved. */
  private abandon(reason: unknown) {
    this.pending = [];
    this.pendingBytes = 0;
    this.settle.reject(reason instanceof Error
      ? reason
      : new TruncatedInputError('Stream aborted before the prelude was parsed'));
  }

  private emit(bytes: Uint8Array, ctl: TransformStreamDefaultController<Uint8Array>) {
    if (!this.decryptor || bytes.length === 0) return;
    for (let i = 0; i < bytes.length; i += this.chunkSize) {
      const slice = bytes.subarray(i, Math.min(i + this.chunkSize, bytes.length));
      ctl.enqueue(this.decryptor.decrypt(slice, this.offset));
      this.offset += slice.length;
    }
  }
}
