// packages/node-runtime/src/batch.ts
import { cpus } from 'node:os';
import {
  NcmDecoder,
  createLogger,
  defaultWorkerCount,
  type Verbosity,
} from '../../core/src/index.js';
import { convertFile, type ConversionReport, type ConvertOptions } from './converter.js';
import { CoverResolver, type FetchLike } from './cover.js';
import { runPool } from './pool.js';

export interface BatchOptions extends ConvertOptions {
  jobs?           : number;
  coverTimeoutMs? : number;
  chunkSize?      : number;
  verbose?        : Verbosity;
  logger?         : (msg: string) => void;
  fetchImpl?      : FetchLike;
}

export interface BatchSummary {
  reports : ConversionReport[];
  success : number;
  failed  : number;
}

/** Convert every file; one failure never stops the others. */
export async function convertBatch(
  files    : readonly string[],
  opt      : BatchOptions,
  onResult : (r: ConversionReport) => void = () => {},
): Promise<BatchSummary> {
  const log     = createLogger(opt.verbose ?? 0, opt.logger);
  const decoder = new NcmDecoder({ chunkSize: opt.chunkSize, verbose: opt.verbose, logger: opt.logger });
  const covers  = new CoverResolver({ timeoutMs: opt.coverTimeoutMs, fetchImpl: opt.fetchImpl, log });
  const jobs    = opt.jobs ?? defaultWorkerCount(cpus().length);

  log.log(1, `Converting ${files.length} file(s) with ${jobs} job(s)`);
  const reports = await runPool(files, jobs, f => convertFile(f, opt, { decoder, covers, log }), onResult);

  const success = reports.filter(r => r.ok).length;
  return { reports, success, failed: reports.length - success };
}
