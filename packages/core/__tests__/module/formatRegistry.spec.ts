import { AudioFormatRegistry, UNKNOWN_FORMAT } from '../../src/config/FormatRegistry.js';
import { defaultWorkerCount } from '../../src/config/defaults.js';
import { FormatRegistryError } from '../../src/errors/index.js';

describe('AudioFormatRegistry', () => {
  it('has FLAC and MP3 registered by default', () => {
    expect(AudioFormatRegistry.list().map(f => f.id)).toEqual(['flac', 'mp3']);
    expect(AudioFormatRegistry.get('flac').mime).toBe('audio/flac');
    expect(AudioFormatRegistry.get('unknown')).toBe(UNKNOWN_FORMAT);
  });

  it.each([
    ['fLaC header',     [0x66, 0x4c, 0x61, 0x43, 0x00], 'flac'],
    ['ID3 tag',         [0x49, 0x44, 0x33, 0x04, 0x00], 'mp3'],
    ['MPEG frame sync', [0xff, 0xfb, 0x90, 0x64], 'mp3'],
    ['MPEG-2 sync',     [0xff, 0xf3, 0x40], 'mp3'],
    ['reserved layer',  [0xff, 0xe1, 0x00], 'unknown'],
    ['RIFF header',     [0x52, 0x49, 0x46, 0x46], 'unknown'],
    ['short fLa',       [0x66, 0x4c, 0x61], 'unknown'],
    ['empty',           [], 'unknown'],
  ])('sniffs %s', (_label, head, id) => {
    expect(AudioFormatRegistry.sniff(Uint8Array.from(head)).id).toBe(id);
  });

  it('refuses duplicates and the reserved id', () => {
    const dup = { ...AudioFormatRegistry.get('mp3') };
    expect(() => AudioFormatRegistry.register(dup)).toThrow(FormatRegistryError);
    expect(() => AudioFormatRegistry.register({ ...UNKNOWN_FORMAT })).toThrow('Format id "unknown" is reserved');
  });
});

describe('defaultWorkerCount', () => {
  it.each([
    [1, 1], [2, 1], [3, 2], [4, 2], [8, 6], [16, 14], [0, 2],
  ])('%i CPUs → %i jobs', (cpus, jobs) => {
    expect(defaultWorkerCount(cpus)).toBe(jobs);
  });
});
