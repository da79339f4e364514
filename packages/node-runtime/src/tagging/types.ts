import type { ImageInfo } from '../image.js';

export interface CoverArt {
  bytes : Uint8Array;
  info  : ImageInfo;
}

export interface AudioTags {
  title?   : string;
  artists  : string[];
  album?   : string;
  cover?   : CoverArt;
}
