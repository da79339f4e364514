import type { AudioFormatId } from '../../../core/src/index.js';
import { writeFlacTags } from './flac.js';
import { writeMp3Tags } from './mp3.js';
import type { AudioTags } from './types.js';

export type { AudioTags, CoverArt } from './types.js';

/** Tagged copy of `audio`; formats without a tagger come back unchanged. */
export function tagAudio(format: AudioFormatId, audio: Uint8Array, tags: AudioTags): Uint8Array {
  switch (format) {
    case 'flac': return writeFlacTags(audio, tags);
    case 'mp3':  return writeMp3Tags(audio, tags);
    default:     return audio;
  }
}
