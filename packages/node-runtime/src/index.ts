// packages/node-runtime/src/index.ts
import { NcmDecoder, type NcmDecoderOptions } from '../../core/src/index.js';

export function createNcmDecoder(cfg?: NcmDecoderOptions): NcmDecoder {
  return new NcmDecoder(cfg);
}

export { NcmDecoder, type NcmDecoderOptions } from '../../core/src/index.js';
export { convertBatch, type BatchOptions, type BatchSummary } from './batch.js';
export { convertFile, formatReport, type ConversionReport, type ConvertOptions } from './converter.js';
export { CoverResolver, type FetchLike, type ResolvedCover } from './cover.js';
export { findContainers } from './discover.js';
export { inspectImage, type ImageInfo } from './image.js';
export { tagAudio, type AudioTags } from './tagging/index.js';
