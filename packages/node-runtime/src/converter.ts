// packages/node-runtime/src/converter.ts
import { existsSync } from 'node:fs';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import {
  FilesystemError,
  NcmDecoder,
  TagWriteError,
  type Logger,
} from '../../core/src/index.js';
import { CoverResolver, type ResolvedCover } from './cover.js';
import { describeImage } from './image.js';
import { tagAudio } from './tagging/index.js';

export interface ConvertOptions {
  /** Output directory; defaults to the directory of each input */
  outDir?      : string;
  tags         : boolean;
  remoteCover  : boolean;
  overwrite    : boolean;
}

export interface ConvertDeps {
  decoder : NcmDecoder;
  covers  : CoverResolver;
  log     : Logger;
}

export type ConversionReport =
  | {
      ok       : true;
      file     : string;
      output   : string;
      title    : string;
      artist   : string;
      album    : string;
      format   : string;
      cover    : string;
      warnings : string[];
    }
  | { ok: false; file: string; error: string; errorName: string };

function coverInfo(c: ResolvedCover | undefined): string {
  if (!c) return 'None';
  const size = describeImage(c.art.info);
  return c.source === 'embedded' ? `Embedded ${size}` : size;
}

function failure(file: string, err: unknown): ConversionReport {
  return err instanceof Error
    ? { ok: false, file, error: err.message, errorName: err.name }
    : { ok: false, file, error: String(err), errorName: 'Error' };
}

/**
 * Decode one container and write the tagged audio beside it (or into
 * `outDir`). Nothing is written when decoding fails.
 */
export async function convertFile(path: string, opt: ConvertOptions, deps: ConvertDeps): Promise<ConversionReport> {
  const file = basename(path);
  const stem = basename(path, extname(path));

  let input: Uint8Array;
  try {
    const buf = await readFile(path);
    input = new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  } catch (err) {
    return failure(file, new FilesystemError(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`));
  }

  const res = await deps.decoder.decode(input);
  if (res.kind === 'fatal') return failure(file, res.error);

  const { container } = res;
  const warnings = res.kind === 'partial' ? res.warnings.map(w => `${w.name}: ${w.message}`) : [];
  const meta     = container.metadata;

  const output = join(opt.outDir ?? dirname(path), `${stem}.${container.format.ext}`);
  if (!opt.overwrite && existsSync(output)) {
    return failure(file, new FilesystemError(`Output already exists: ${basename(output)}`));
  }

  const tags = {
    title  : meta?.musicName ?? stem,
    artists: meta?.artists.map(a => a.name) ?? [],
    album  : meta?.album,
  };

  let data  = container.audio;
  let cover = 'None';
  if (opt.tags && container.format.id !== 'unknown') {
    const resolved = await deps.covers.resolve(meta, container.cover, opt.remoteCover);
    try {
      data  = tagAudio(container.format.id, container.audio, { ...tags, cover: resolved?.art });
      cover = coverInfo(resolved);
    } catch (err) {
      if (!(err instanceof TagWriteError)) throw err;
      deps.log.log(1, `${file}: writing untagged audio, ${err.message}`);
      warnings.push(`${err.name}: ${err.message}`);
      cover = 'Failed';
    }
  }

  try {
    await writeFile(output, data, { flag: opt.overwrite ? 'w' : 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
      await rm(output, { force: true });
    }
    return failure(file, new FilesystemError(`Cannot write ${basename(output)}: ${err instanceof Error ? err.message : String(err)}`));
  }
  deps.log.log(2, `${file} → ${output} (${data.length} B)`);

  return {
    ok     : true,
    file,
    output : basename(output),
    title  : tags.title,
    artist : tags.artists[0] ?? 'Unknown',
    album  : tags.album ?? 'Unknown',
    format : container.format.id.toUpperCase(),
    cover,
    warnings,
  };
}

export function formatReport(r: ConversionReport): string[] {
  if (!r.ok) return [`${r.file} - Failed: ${r.error}`];
  const ext = extname(r.output).slice(1);
  return [
    `${r.title} - ${r.artist}.${ext} - Success`,
    ...r.warnings.map(w => `Warning: ${w}`),
    `Cover: ${r.cover}`,
  ];
}
