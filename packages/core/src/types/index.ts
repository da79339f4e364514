import type { NcmError, MetadataDecodeError, UnknownAudioFormatError } from '../errors/index.js';

/* ------------------------- Audio formats ----------------------------- */
export type AudioFormatId = 'flac' | 'mp3' | 'unknown';

export interface AudioFormatDescriptor {
  readonly id   : AudioFormatId;
  readonly ext  : string;
  readonly mime : string;
  /** Test the first bytes of a decrypted payload. */
  matches(head: Uint8Array): boolean;
}

/* ------------------------- Metadata ---------------------------------- */
export interface ArtistRef {
  name : string;
  id?  : number | string;
}

/**
 * Parsed `music:` record. Only the fields the tooling reads are typed;
 * everything else stays available through `raw`.
 */
export interface MusicMetadata {
  format?     : string;
  musicId?    : number | string;
  musicName?  : string;
  artists     : ArtistRef[];
  album?      : string;
  albumId?    : number | string;
  albumPic?   : string;
  duration?   : number;   // milliseconds
  bitrate?    : number;
  alias       : string[];
  transNames  : string[];
  raw         : Record<string, unknown>;
}

export type MetadataOutcome =
  | { kind: 'absent' }
  | { kind: 'ok';    metadata: MusicMetadata }
  | { kind: 'error'; error: MetadataDecodeError };

/* ------------------------- Container layout -------------------------- */
export interface SectionRef {
  offset : number;
  length : number;
}

export interface ContainerSections {
  key        : SectionRef;
  meta       : SectionRef;
  crc32      : number;
  coverSpace : number;
  cover      : SectionRef;
  audio      : SectionRef;
}

/** Everything before the audio section, already decrypted. */
export interface Prelude {
  audioKey : Uint8Array;
  metadata : MetadataOutcome;
  cover?   : Uint8Array;
  sections : ContainerSections;
}

export type DecoderState =
  | 'start'
  | 'header-validated'
  | 'key-recovered'
  | 'meta-recovered'
  | 'cover-read'
  | 'audio-decrypted'
  | 'done'
  | 'failed';

export interface DecodedContainer {
  audio     : Uint8Array;
  format    : AudioFormatDescriptor;
  metadata? : MusicMetadata;
  cover?    : Uint8Array;
  sections  : ContainerSections;
}

export type DecodeWarning = MetadataDecodeError | UnknownAudioFormatError;

export type DecodeResult =
  | { kind: 'complete'; container: DecodedContainer }
  | { kind: 'partial';  container: DecodedContainer; warnings: DecodeWarning[] }
  | { kind: 'fatal';    error: NcmError; state: DecoderState };

export interface ContainerInfo {
  sections : ContainerSections;
  metadata : MetadataOutcome;
  format   : AudioFormatDescriptor;
  coverBytes : number;
}
