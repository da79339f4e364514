// packages/node-runtime/src/cover.ts
import {
  CoverFetchError,
  DEFAULT_COVER_TIMEOUT_MS,
  type Logger,
  type MusicMetadata,
} from '../../core/src/index.js';
import { describeImage, inspectImage } from './image.js';
import type { CoverArt } from './tagging/index.js';

export const SONG_DETAIL_API = 'https://music.163.com/api/song/detail/';
const HIRES_PARAM = 'param=3000y3000';

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface CoverResolverOptions {
  timeoutMs? : number;
  fetchImpl? : FetchLike;
  log        : Logger;
}

export interface ResolvedCover {
  art    : CoverArt;
  source : 'remote' | 'embedded';
}

/**
 * Pick the cover to embed: the remote album art when enabled and reachable,
 * otherwise the image carried inside the container.
 */
export class CoverResolver {
  private readonly timeoutMs : number;
  private readonly fetchImpl : FetchLike;
  private readonly log       : Logger;

  constructor(opt: CoverResolverOptions) {
    this.timeoutMs = opt.timeoutMs ?? DEFAULT_COVER_TIMEOUT_MS;
    this.fetchImpl = opt.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log       = opt.log;
  }

  async resolve(
    meta: MusicMetadata | undefined,
    embedded: Uint8Array | undefined,
    remote: boolean,
  ): Promise<ResolvedCover | undefined> {
    if (remote && meta) {
      try {
        const art = await this.fetchRemote(meta);
        if (art) return { art, source: 'remote' };
      } catch (err) {
        this.log.log(1, `Remote cover unavailable: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    if (embedded) {
      const info = inspectImage(embedded);
      if (info) return { art: { bytes: embedded, info }, source: 'embedded' };
      this.log.log(1, 'Embedded cover is neither JPEG nor PNG');
    }
    return undefined;
  }

  /** Album picture URL from the metadata, or from the song detail API. */
  async lookupCoverUrl(meta: MusicMetadata): Promise<string | undefined> {
    if (meta.albumPic) return meta.albumPic;
    if (meta.musicId === undefined || meta.musicId === '' || meta.musicId === 0) return undefined;

    const res = await this.get(`${SONG_DETAIL_API}?ids=[${meta.musicId}]`);
    const body: unknown = await res.json();
    const url = pickPicUrl(body);
    if (!url) throw new CoverFetchError(`No cover URL for song ${meta.musicId}`);
    return url;
  }

  private async fetchRemote(meta: MusicMetadata): Promise<CoverArt | undefined> {
    const url = await this.lookupCoverUrl(meta);
    if (!url) return undefined;

    let bytes: Uint8Array;
    try {
      bytes = await this.download(url);
    } catch (err) {
      this.log.log(2, `Cover download failed, retrying with size hint: ${String(err)}`);
      bytes = await this.download(`${url}${url.includes('?') ? '&' : '?'}${HIRES_PARAM}`);
    }

    const info = inspectImage(bytes);
    if (!info) throw new CoverFetchError(`Cover at ${url} is not a JPEG or PNG image`);
    this.log.log(2, `Remote cover ${describeImage(info)}`);
    return { bytes, info };
  }

  private async download(url: string): Promise<Uint8Array> {
    const res = await this.get(url);
    return new Uint8Array(await res.arrayBuffer());
  }

  private async get(url: string): Promise<Response> {
    const res = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) throw new CoverFetchError(`GET ${url} → HTTP ${res.status}`);
    return res;
  }
}

function pickPicUrl(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('songs' in body)) return undefined;
  const songs = body.songs;
  if (!Array.isArray(songs) || songs.length === 0) return undefined;
  const first: unknown = songs[0];
  if (typeof first !== 'object' || first === null || !('album' in first)) return undefined;
  const album = first.album;
  if (typeof album !== 'object' || album === null || !('picUrl' in album)) return undefined;
  return typeof album.picUrl === 'string' && album.picUrl ? album.picUrl : undefined;
}
