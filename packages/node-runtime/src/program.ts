// packages/node-runtime/src/program.ts
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { accessSync, constants as fsConstants, createReadStream, createWriteStream, statSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import {
  FilesystemError,
  NcmDecoder,
  NcmError,
  DEFAULT_COVER_TIMEOUT_MS,
  toVerbosity,
  type ContainerInfo,
} from '../../core/src/index.js';
import { convertBatch } from './batch.js';
import { formatReport } from './converter.js';
import type { FetchLike } from './cover.js';
import { findContainers } from './discover.js';
import { inspectImage } from './image.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

const SEPARATOR = '-'.repeat(50);

export interface CliIO {
  out(s: string): void;
  err(s: string): void;
  stdin     : Readable;
  stdout    : Writable;
  fetchImpl?: FetchLike;
}

function positiveInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`${label} must be a positive integer`);
    }
    return n;
  };
}

export function assertWritableDir(dir: string): string {
  const abs = resolve(dir);
  let isDir = false;
  try {
    isDir = statSync(abs).isDirectory();
  } catch {
    throw new FilesystemError(`Output directory does not exist: ${dir}`);
  }
  if (!isDir) throw new FilesystemError(`Output path is not a directory: ${dir}`);
  try {
    accessSync(abs, fsConstants.W_OK);
  } catch {
    throw new FilesystemError(`Output directory is not writeable: ${dir}`);
  }
  return abs;
}

async function readAll(stream: Readable): Promise<Uint8Array> {
  // Default 1 GiB limit; allow override via env (bytes)
  const envLimit  = Number(process.env.NCM_STDIN_MAX_BYTES);
  const MAX_BYTES = Number.isFinite(envLimit) && envLimit > 0 ? Math.floor(envLimit) : 1024 ** 3;

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const c of stream) {
    const buf = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    total += buf.length;
    if (total > MAX_BYTES) {
      throw new FilesystemError(`STDIN exceeds maximum allowed size (${MAX_BYTES} bytes). Aborting.`);
    }
    chunks.push(buf);
  }
  return new Uint8Array(Buffer.concat(chunks));
}

function inspectJson(file: string, info: ContainerInfo, cover: Uint8Array | undefined): Record<string, unknown> {
  const meta = info.metadata;
  const image = cover ? inspectImage(cover) : undefined;
  return {
    file,
    format  : info.format.id,
    sections: info.sections,
    metadata: meta.kind === 'ok'
      ? (({ raw: _raw, ...rest }) => rest)(meta.metadata)
      : null,
    ...(meta.kind === 'error' ? { metadataError: meta.error.message } : {}),
    cover   : info.coverBytes > 0 ? { bytes: info.coverBytes, ...image } : null,
  };
}

export function createProgram(io: CliIO): { program: Command; exitCode: () => number } {
  let code = 0;
  const program = new Command();

  program
    .name('ncm-unlock')
    .version(PKG_VERSION)
    .description('Recover the original audio (FLAC/MP3) and tags from NCM containers')
    .exitOverride()
    .configureOutput({ writeOut: s => io.out(s), writeErr: s => io.err(s) })
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser<number>((_, previous) => previous + 1),
    );

  const logSink = (msg: string) => io.err(msg + '\n');
  const verbosity = () => toVerbosity(program.opts<{ verbose: number }>().verbose);

  /* ------------------------------------------------------------------ */
  /*  convert                                                            */
  /* ------------------------------------------------------------------ */
  program
    .command('convert <paths...>')
    .description('Convert .ncm files and directories of them')
    .option('-o, --out-dir <dir>', 'output directory (default: beside each input)')
    .option('-r, --recursive', 'descend into sub-directories', false)
    .option('-j, --jobs <n>', 'parallel conversions', positiveInt('Jobs'))
    .option('--no-tags', 'write the raw audio without tags or cover')
    .option('--no-remote-cover', 'never download album art; use the embedded cover')
    .option('--cover-timeout <ms>', 'remote cover timeout', positiveInt('Timeout'), DEFAULT_COVER_TIMEOUT_MS)
    .option('--overwrite', 'replace existing output files', false)
    .action(async (paths: string[], o: {
      outDir?: string; recursive: boolean; jobs?: number; tags: boolean;
      remoteCover: boolean; coverTimeout: number; overwrite: boolean;
    }) => {
      const outDir = o.outDir === undefined ? undefined : assertWritableDir(o.outDir);
      const files  = await findContainers(paths, { recursive: o.recursive });
      if (!files.length) {
        io.out('No NCM files found.\n');
        return;
      }

      io.out(`Found ${files.length} NCM files.\n${SEPARATOR}\n`);
      const summary = await convertBatch(files, {
        outDir,
        tags          : o.tags,
        remoteCover   : o.remoteCover,
        overwrite     : o.overwrite,
        jobs          : o.jobs,
        coverTimeoutMs: o.coverTimeout,
        verbose       : verbosity(),
        logger        : logSink,
        fetchImpl     : io.fetchImpl,
      }, r => io.out([...formatReport(r), SEPARATOR].join('\n') + '\n'));

      io.out(`Total: ${files.length} | Success: ${summary.success} | Fail: ${summary.failed}\n`);
      if (summary.failed) code = 1;
    });

  /* ------------------------------------------------------------------ */
  /*  decrypt (stream-safe)                                              */
  /* ------------------------------------------------------------------ */
  program
    .command('decrypt <src>')
    .description('Decrypt one container to raw audio; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (src: string, o: { out: string }) => {
      const decoder = new NcmDecoder({ verbose: verbosity(), logger: logSink });
      const { writable, readable } = decoder.createDecryptionStream();

      const inStream  = src === '-' ? io.stdin : createReadStream(src);
      const outStream = o.out === '-' ? io.stdout : createWriteStream(o.out);

      try {
        await Promise.all([
          toWebReadable(inStream).pipeTo(writable),
          readable.pipeTo(toWebWritable(outStream)),
        ]);
      } catch (err) {
        if (o.out !== '-') await rm(o.out, { force: true });
        throw err;
      }
    });

  /* ------------------------------------------------------------------ */
  /*  inspect                                                            */
  /* ------------------------------------------------------------------ */
  program
    .command('inspect <src>')
    .description('Show section layout, metadata and payload format; use - for STDIN')
    .action(async (src: string) => {
      const bytes = src === '-' ? await readAll(io.stdin) : new Uint8Array(await readFile(src));
      const info  = await NcmDecoder.inspect(bytes);
      const cover = info.coverBytes > 0
        ? bytes.subarray(info.sections.cover.offset, info.sections.cover.offset + info.sections.cover.length)
        : undefined;
      const name  = src === '-' ? '-' : basename(src);
      io.out(JSON.stringify(inspectJson(name, info, cover), null, 2) + '\n');
    });

  return { program, exitCode: () => code };
}

/**
 * Parse `args` (without the node/script prefix) and run the command.
 * Resolves with the process exit code; errors are reported on `io.err`.
 */
export async function run(args: readonly string[], io: CliIO): Promise<number> {
  const { program, exitCode } = createProgram(io);
  try {
    await program.parseAsync([...args], { from: 'user' });
    return exitCode();
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof NcmError) {
      io.err(`Error [${err.name}]: ${err.message}\n`);
      return 1;
    }
    const msg = err instanceof Error ? err.message : String(err);
    io.err(`Error: ${msg}\n`);
    return 1;
  }
}
