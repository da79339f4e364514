import { EncodingError, MetadataDecodeError } from "../errors/index.js";

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/** Fresh copy of `src` with every byte XOR-ed against `mask`. */
export function xorMask(src: Uint8Array, mask: number): Uint8Array {
  const out = new Uint8Array(src.length);
  for (let i = 0; i < src.length; i++) out[i] = src[i] ^ mask;
  return out;
}

export function startsWith(buf: Uint8Array, prefix: Uint8Array): boolean {
  if (buf.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (buf[i] !== prefix[i]) return false;
  }
  return true;
}

export function asciiBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

export function hexToBytes(hex: string): Uint8Array {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    throw new EncodingError(`Invalid hex string of length ${hex.length}`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  return Buffer.from(concat(...chunks)).toString('base64');
}

/* ----------  Base64 decode  --------------------------------------- */
export function base64Decode(b64: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(b64) || b64.length % 4 !== 0) {
    throw new MetadataDecodeError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }
  return new Uint8Array(Buffer.from(b64, 'base64'));
}

/** Input accepted wherever a whole container or a stream chunk is taken. */
export type ByteInput = Uint8Array | ArrayBuffer | Blob;

export async function ensureUint8Array(src: ByteInput): Promise<Uint8Array> {
  if (src instanceof Uint8Array)  return src;
  if (src instanceof ArrayBuffer) return new Uint8Array(src);
  return new Uint8Array(await src.arrayBuffer());
}
