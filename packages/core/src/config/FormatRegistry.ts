// packages/core/src/config/FormatRegistry.ts
import type { AudioFormatDescriptor, AudioFormatId } from '../types/index.js';
import { FormatRegistryError } from '../errors/index.js';

export const UNKNOWN_FORMAT: AudioFormatDescriptor = {
  id: 'unknown',
  ext: 'bin',
  mime: 'application/octet-stream',
  matches: () => false,
};

export class AudioFormatRegistry {
  private static readonly byId = new Map<AudioFormatId, AudioFormatDescriptor>();

  static register(f: AudioFormatDescriptor): void {
    if (f.id === 'unknown') throw new FormatRegistryError('Format id "unknown" is reserved');
    if (this.byId.has(f.id)) throw new FormatRegistryError(`Format ${f.id} already registered`);
    this.byId.set(f.id, f);
  }
  static get(id: AudioFormatId): AudioFormatDescriptor {
    if (id === 'unknown') return UNKNOWN_FORMAT;
    const f = this.byId.get(id);
    if (!f) throw new FormatRegistryError(`Unknown audio format: ${id}`);
    return f;
  }
  static list(): AudioFormatDescriptor[] { return [...this.byId.values()]; }

  /** First registered format whose magic matches the leading bytes. */
  static sniff(head: Uint8Array): AudioFormatDescriptor {
    for (const f of this.byId.values()) {
      if (f.matches(head)) return f;
    }
    return UNKNOWN_FORMAT;
  }
}
