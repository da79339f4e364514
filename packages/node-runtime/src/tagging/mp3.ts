// packages/node-runtime/src/tagging/mp3.ts
import NodeID3 from 'node-id3';
import { TagWriteError } from '../../../core/src/index.js';
import type { AudioTags } from './types.js';

/** Merge ID3v2 title/artist/album and an APIC front cover into an MP3 stream. */
export function writeMp3Tags(audio: Uint8Array, tags: AudioTags): Uint8Array {
  const frames = {
    title : tags.title,
    artist: tags.artists.length ? tags.artists.join('/') : undefined,
    album : tags.album,
    image : tags.cover
      ? {
          mime       : tags.cover.info.mime,
          type       : { id: 3, name: 'front cover' },
          description: 'Cover',
          imageBuffer: Buffer.from(tags.cover.bytes),
        }
      : undefined,
  };

  let out: unknown;
  try {
    out = NodeID3.update(frames, Buffer.from(audio.buffer, audio.byteOffset, audio.byteLength));
  } catch (err) {
    throw new TagWriteError(`ID3 update failed: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Buffer.isBuffer(out)) {
    throw new TagWriteError(`ID3 update failed: ${out instanceof Error ? out.message : 'no buffer returned'}`);
  }
  return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
}
