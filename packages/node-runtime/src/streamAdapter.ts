import { Readable, Writable } from 'node:stream';

/** Node's `stream/web` types and the DOM lib's describe the same objects; cast in one place */
export function toWebReadable(r: Readable): ReadableStream<Uint8Array> {
  return Readable.toWeb(r) as unknown as ReadableStream<Uint8Array>;
}
export function toWebWritable(w: Writable): WritableStream<Uint8Array> {
  return Writable.toWeb(w) as unknown as WritableStream<Uint8Array>;
}
