// packages/core/src/algorithms/MetaCipher.ts
import { NCM_CONSTANTS } from '../config/constants.js';
import { MetadataDecodeError } from '../errors/index.js';
import type { ArtistRef, MetadataOutcome, MusicMetadata } from '../types/index.js';
import { asciiBytes, base64Decode, base64Encode, concat, hexToBytes, startsWith, xorMask } from '../util/bytes.js';
import { isJsonObject, safeParseJson, type JsonObject } from '../util/json.js';
import { ecbDecrypt, ecbEncrypt } from './ecb/AesEcb.js';

const { MASK, MASTER_KEY_HEX, MARKER, PREFIX } = NCM_CONSTANTS.META;
const MASTER_KEY   = hexToBytes(MASTER_KEY_HEX);
const MARKER_BYTES = asciiBytes(MARKER);

/**
 * Decrypt the metadata section. Metadata is best effort: an empty section or
 * a missing marker yields `absent`, any later failure yields `error`, and
 * neither stops audio recovery.
 */
export function openMetadata(section: Uint8Array): MetadataOutcome {
  if (section.length === 0) return { kind: 'absent' };

  const unmasked = xorMask(section, MASK);
  if (!startsWith(unmasked, MARKER_BYTES)) return { kind: 'absent' };

  try {
    const b64    = new TextDecoder('ascii').decode(unmasked.subarray(MARKER_BYTES.length));
    const cipher = base64Decode(b64.trim());

    let plain: Uint8Array;
    try {
      plain = ecbDecrypt(MASTER_KEY, cipher);
    } catch {
      throw new MetadataDecodeError('Metadata did not decrypt: bad padding or foreign master key');
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(plain);
    } catch {
      throw new MetadataDecodeError('Metadata is not valid UTF-8');
    }
    if (!text.startsWith(PREFIX)) {
      throw new MetadataDecodeError(`Metadata is missing the "${PREFIX}" prefix`);
    }

    return { kind: 'ok', metadata: parseMusicMetadata(safeParseJson(text.slice(PREFIX.length))) };
  } catch (err) {
    const error = err instanceof MetadataDecodeError
      ? err
      : new MetadataDecodeError(err instanceof Error ? err.message : String(err));
    return { kind: 'error', error };
  }
}

/** Inverse of {@link openMetadata}; takes the raw JSON record. */
export function sealMetadata(record: JsonObject): Uint8Array {
  const plain  = asciiBytes(PREFIX + JSON.stringify(record));
  const b64    = base64Encode(ecbEncrypt(MASTER_KEY, plain));
  return xorMask(concat(MARKER_BYTES, asciiBytes(b64)), MASK);
}

/* ------------------------------------------------------------------ */
/*  Shape validation                                                   */
/* ------------------------------------------------------------------ */

type Id = number | string;

const str = (v: unknown): string | undefined => (typeof v === 'string' ? v : undefined);
const num = (v: unknown): number | undefined =>
  (typeof v === 'number' && Number.isFinite(v) ? v : undefined);
const id  = (v: unknown): Id | undefined => str(v) ?? num(v);
const strList = (v: unknown): string[] =>
  (Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : []);

/** Artists come as `[name, id]` pairs in most files and as bare names in a few. */
function parseArtists(v: unknown): ArtistRef[] {
  if (!Array.isArray(v)) return [];
  const out: ArtistRef[] = [];
  for (const entry of v) {
    if (typeof entry === 'string') {
      out.push({ name: entry });
    } else if (Array.isArray(entry) && typeof entry[0] === 'string') {
      const artistId = id(entry[1]);
      out.push(artistId === undefined ? { name: entry[0] } : { name: entry[0], id: artistId });
    }
  }
  return out;
}

export function parseMusicMetadata(value: unknown): MusicMetadata {
  if (!isJsonObject(value)) {
    throw new MetadataDecodeError('Metadata JSON is not an object');
  }
  return {
    format    : str(value.format),
    musicId   : id(value.musicId),
    musicName : str(value.musicName),
    artists   : parseArtists(value.artist),
    album     : str(value.album),
    albumId   : id(value.albumId),
    albumPic  : str(value.albumPic),
    duration  : num(value.duration),
    bitrate   : num(value.bitrate),
    alias     : strList(value.alias),
    transNames: strList(value.transNames),
    raw       : value,
  };
}
