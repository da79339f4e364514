import { AudioFormatRegistry } from './FormatRegistry.js';
import type { AudioFormatDescriptor } from '../types/index.js';

export const DEFAULT_CHUNK_SIZE = 0x8000;
export const MAX_CHUNK_SIZE     = 64 * 1024 * 1024;
export const DEFAULT_COVER_TIMEOUT_MS = 5000;

const flac: AudioFormatDescriptor = {
  id: 'flac',
  ext: 'flac',
  mime: 'audio/flac',
  matches: head =>
    head.length >= 4 &&
    head[0] === 0x66 && head[1] === 0x4c && head[2] === 0x61 && head[3] === 0x43, // fLaC
};

AudioFormatRegistry.register(flac);

const mp3: AudioFormatDescriptor = {
  id: 'mp3',
  ext: 'mp3',
  mime: 'audio/mpeg',
  matches: head => {
    if (head.length >= 3 && head[0] === 0x49 && head[1] === 0x44 && head[2] === 0x33) return true; // ID3
    // 11-bit frame sync, layer bits must not be the reserved 00
    return head.length >= 2 && head[0] === 0xff && (head[1] & 0xe0) === 0xe0 && (head[1] & 0x06) !== 0;
  },
};

AudioFormatRegistry.register(mp3);

/**
 * Parallel jobs for batch conversion: leave two cores free on larger
 * machines, one on smaller ones, never fewer than one job.
 */
export function defaultWorkerCount(cpuCount: number): number {
  const cpus = cpuCount > 0 ? cpuCount : 4;
  if (cpus >= 4) return cpus - 2;
  return Math.max(1, cpus - 1);
}
