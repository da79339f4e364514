// packages/node-runtime/src/tagging/flac.ts
import { TagWriteError, concat } from '../../../core/src/index.js';
import type { AudioTags } from './types.js';

/**
 * FLAC metadata block rewriting.
 *
 * Stream layout: `fLaC` then metadata blocks, each with a 4-byte header
 * (last-block flag | 7-bit type, 24-bit big-endian length), then frames.
 * VORBIS_COMMENT lengths are little-endian; PICTURE fields are big-endian.
 */
export const BlockType = {
  STREAMINFO     : 0,
  PADDING        : 1,
  APPLICATION    : 2,
  SEEKTABLE      : 3,
  VORBIS_COMMENT : 4,
  CUESHEET       : 5,
  PICTURE        : 6,
} as const;

export interface FlacBlock {
  type : number;
  body : Uint8Array;
}

const FLAC_MAGIC     = [0x66, 0x4c, 0x61, 0x43];
const MAX_BLOCK_LEN  = 0xffffff;
const FRONT_COVER    = 3;
const REPLACED_KEYS  = new Set(['TITLE', 'ARTIST', 'ALBUM']);

export function readFlacBlocks(audio: Uint8Array): { blocks: FlacBlock[]; frames: Uint8Array } {
  if (audio.length < 4 || !FLAC_MAGIC.every((v, i) => audio[i] === v)) {
    throw new TagWriteError('Not a FLAC stream');
  }
  const blocks: FlacBlock[] = [];
  let off = 4;
  for (;;) {
    if (off + 4 > audio.length) throw new TagWriteError('FLAC metadata truncated');
    const hdr  = audio[off];
    const len  = (audio[off + 1] << 16) | (audio[off + 2] << 8) | audio[off + 3];
    const end  = off + 4 + len;
    if (end > audio.length) throw new TagWriteError('FLAC metadata block overruns stream');
    blocks.push({ type: hdr & 0x7f, body: audio.subarray(off + 4, end) });
    off = end;
    if (hdr & 0x80) break;
  }
  if (blocks[0]?.type !== BlockType.STREAMINFO) {
    throw new TagWriteError('FLAC stream does not start with STREAMINFO');
  }
  return { blocks, frames: audio.subarray(off) };
}

/* ------------------------------------------------------------------ */
/*  VORBIS_COMMENT                                                     */
/* ------------------------------------------------------------------ */

export interface VorbisComment {
  vendor   : string;
  comments : Array<[string, string]>;
}

export function parseVorbisComment(body: Uint8Array): VorbisComment {
  const dv  = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const dec = new TextDecoder();
  let off = 0;
  const take = (n: number): Uint8Array => {
    if (off + n > body.length) throw new TagWriteError('VORBIS_COMMENT truncated');
    const out = body.subarray(off, off + n);
    off += n;
    return out;
  };
  const u32 = (): number => {
    take(4);
    return dv.getUint32(off - 4, true);
  };

  const vendor = dec.decode(take(u32()));
  const count  = u32();
  const comments: Array<[string, string]> = [];
  for (let i = 0; i < count; i++) {
    const entry = dec.decode(take(u32()));
    const eq = entry.indexOf('=');
    if (eq > 0) comments.push([entry.slice(0, eq), entry.slice(eq + 1)]);
  }
  return { vendor, comments };
}

export function encodeVorbisComment(vc: VorbisComment): Uint8Array {
  const enc = new TextEncoder();
  const u32 = (n: number) => {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setUint32(0, n, true);
    return b;
  };
  const vendor = enc.encode(vc.vendor);
  const parts: Uint8Array[] = [u32(vendor.length), vendor, u32(vc.comments.length)];
  for (const [k, v] of vc.comments) {
    const entry = enc.encode(`${k}=${v}`);
    parts.push(u32(entry.length), entry);
  }
  return concat(...parts);
}

/* ------------------------------------------------------------------ */
/*  PICTURE                                                            */
/* ------------------------------------------------------------------ */

export function encodePicture(cover: NonNullable<AudioTags['cover']>): Uint8Array {
  const enc  = new TextEncoder();
  const mime = enc.encode(cover.info.mime);
  const desc = enc.encode('');
  const head = new Uint8Array(4 + 4 + mime.length + 4 + desc.length + 16 + 4);
  const dv   = new DataView(head.buffer);
  let o = 0;
  dv.setUint32(o, FRONT_COVER);            o += 4;
  dv.setUint32(o, mime.length);            o += 4;
  head.set(mime, o);                       o += mime.length;
  dv.setUint32(o, desc.length);            o += 4;
  head.set(desc, o);                       o += desc.length;
  dv.setUint32(o, cover.info.width ?? 0);  o += 4;
  dv.setUint32(o, cover.info.height ?? 0); o += 4;
  dv.setUint32(o, 0);                      o += 4;   // colour depth unknown
  dv.setUint32(o, 0);                      o += 4;   // not indexed
  dv.setUint32(o, cover.bytes.length);
  return concat(head, cover.bytes);
}

/** Picture type is the first big-endian u32 of a PICTURE body. */
function isFrontCover(block: FlacBlock): boolean {
  const b = block.body;
  return block.type === BlockType.PICTURE && b.length >= 4 &&
    new DataView(b.buffer, b.byteOffset, 4).getUint32(0) === FRONT_COVER;
}

function blockHeader(type: number, len: number, last: boolean): Uint8Array {
  if (len > MAX_BLOCK_LEN) {
    throw new TagWriteError(`FLAC metadata block too large (${len} bytes)`);
  }
  return Uint8Array.of((last ? 0x80 : 0) | type, (len >> 16) & 0xff, (len >> 8) & 0xff, len & 0xff);
}

/**
 * Replace title/artist/album comments and the front-cover picture.
 * Other comments and blocks are kept in order; PADDING moves to the end.
 */
export function writeFlacTags(audio: Uint8Array, tags: AudioTags): Uint8Array {
  const { blocks, frames } = readFlacBlocks(audio);

  const existing = blocks.find(b => b.type === BlockType.VORBIS_COMMENT);
  const vc: VorbisComment = existing
    ? parseVorbisComment(existing.body)
    : { vendor: 'ncm-unlock', comments: [] };

  const comments = vc.comments.filter(([k]) => !REPLACED_KEYS.has(k.toUpperCase()));
  if (tags.title) comments.push(['TITLE', tags.title]);
  for (const a of tags.artists) comments.push(['ARTIST', a]);
  if (tags.album) comments.push(['ALBUM', tags.album]);

  const kept    = blocks.filter(b =>
    b.type !== BlockType.VORBIS_COMMENT &&
    b.type !== BlockType.PADDING &&
    !(tags.cover && isFrontCover(b)));
  const padding = blocks.filter(b => b.type === BlockType.PADDING);

  const out: FlacBlock[] = [
    ...kept,
    { type: BlockType.VORBIS_COMMENT, body: encodeVorbisComment({ vendor: vc.vendor, comments }) },
  ];
  if (tags.cover) out.push({ type: BlockType.PICTURE, body: encodePicture(tags.cover) });
  out.push(...padding);

  const parts: Uint8Array[] = [Uint8Array.from(FLAC_MAGIC)];
  out.forEach((b, i) => parts.push(blockHeader(b.type, b.body.length, i === out.length - 1), b.body));
  parts.push(frames);
  return concat(...parts);
}
