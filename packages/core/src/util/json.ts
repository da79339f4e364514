import { MetadataDecodeError } from '../errors/index.js';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new MetadataDecodeError('Metadata is not valid JSON');
  }
}
