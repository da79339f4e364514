import {
  decodeContainer,
  inspectContainer,
  sealAudioKey,
  Keybox,
  AudioDecryptor,
  concat,
  InvalidMagicError,
  TruncatedInputError,
  KeyRecoveryError,
  MetadataDecodeError,
  UnknownAudioFormatError,
  createLogger,
  NCM_CONSTANTS,
  type DecodeResult,
} from '../src/index.js';
import { encodeFrameLen } from '../src/util/frame.js';
import { AUDIO_KEY, buildContainer, flacPayload, mp3Payload, pngBytes } from './fixtures.js';

const MAGIC = new TextEncoder().encode('CTENFDAM');

/** Laid out field by field instead of through encodeContainer. */
function handBuilt(audio: Uint8Array): Uint8Array {
  const key = sealAudioKey(AUDIO_KEY);
  return concat(
    MAGIC, new Uint8Array(2),
    encodeFrameLen(key.length), key,
    encodeFrameLen(0),                       // no metadata
    encodeFrameLen(0xdeadbeef), new Uint8Array(1),
    encodeFrameLen(0),                       // cover frame
    encodeFrameLen(0),                       // cover length
    new AudioDecryptor(Keybox.derive(AUDIO_KEY)).decrypt(audio),
  );
}

function expectFatal(res: DecodeResult) {
  if (res.kind !== 'fatal') throw new Error(`expected fatal, got ${res.kind}`);
  return res;
}

function expectContainer(res: DecodeResult) {
  if (res.kind === 'fatal') throw new Error(`unexpected fatal: ${res.error.message}`);
  return res.container;
}

describe('decodeContainer | well-formed input', () => {
  it('decodes a container without metadata or cover', () => {
    const audio = mp3Payload();
    const res   = decodeContainer(handBuilt(audio));

    expect(res.kind).toBe('complete');
    const c = expectContainer(res);
    expect(c.audio).toEqual(audio);
    expect(c.metadata).toBeUndefined();
    expect(c.cover).toBeUndefined();
    expect(c.format.id).toBe('mp3');
    expect(c.sections).toEqual({
      key       : { offset: 14, length: 32 },
      meta      : { offset: 50, length: 0 },
      crc32     : 0xdeadbeef,
      coverSpace: 0,
      cover     : { offset: 63, length: 0 },
      audio     : { offset: 63, length: 300 },
    });
  });

  it('keeps decoding after a caller tries to overwrite the protocol constants', () => {
    expect(Object.isFrozen(NCM_CONSTANTS)).toBe(true);
    expect(Object.isFrozen(NCM_CONSTANTS.KEY)).toBe(true);
    expect(Reflect.set(NCM_CONSTANTS.KEY, 'MASTER_KEY_HEX', '00'.repeat(16))).toBe(false);
    expect(Reflect.set(NCM_CONSTANTS.META, 'MASK', 0)).toBe(false);
    expect(Reflect.set(NCM_CONSTANTS, 'MAGIC', 'XXXXXXXX')).toBe(false);

    expect(NCM_CONSTANTS.KEY.MASTER_KEY_HEX).toBe('687A4852416D736F356B496E62617857');
    expect(decodeContainer(buildContainer()).kind).toBe('complete');
  });

  it('recovers metadata and a FLAC payload', () => {
    const res = decodeContainer(buildContainer());
    expect(res.kind).toBe('complete');
    const c = expectContainer(res);
    expect(c.audio).toEqual(flacPayload());
    expect(c.format.ext).toBe('flac');
    expect(c.metadata?.musicName).toBe('Test Song');
    expect(c.metadata?.artists.map(a => a.name)).toEqual(['Artist One', 'Artist Two']);
  });

  it('skips the unused part of the cover frame', () => {
    const cover = pngBytes();
    const c = expectContainer(decodeContainer(buildContainer({ cover, coverSpace: 100 })));
    expect(c.cover).toEqual(cover);
    expect(c.sections.coverSpace).toBe(100);
    expect(c.sections.cover.length).toBe(33);
    expect(c.sections.audio.offset).toBe(c.sections.cover.offset + 100);
    expect(c.audio).toEqual(flacPayload());
  });

  it('gives the same audio for any chunk size', () => {
    const bytes = buildContainer({ audio: flacPayload(5000) });
    const a = expectContainer(decodeContainer(bytes, { chunkSize: 1 }));
    const b = expectContainer(decodeContainer(bytes, { chunkSize: 4096 }));
    expect(a.audio).toEqual(b.audio);
  });
});

describe('decodeContainer | partial results', () => {
  it('keeps the audio when metadata is corrupt', () => {
    const bytes = buildContainer();
    // meta section starts at 50; put a non-Base64 byte past the 22-byte marker
    bytes[50 + 22 + 5] = 0x2a ^ 0x63;

    const res = decodeContainer(bytes);
    expect(res.kind).toBe('partial');
    if (res.kind !== 'partial') return;
    expect(res.warnings).toHaveLength(1);
    expect(res.warnings[0]).toBeInstanceOf(MetadataDecodeError);
    expect(res.container.metadata).toBeUndefined();
    expect(res.container.audio).toEqual(flacPayload());
  });

  it('flags an unrecognised payload and falls back to .bin', () => {
    const audio = new Uint8Array(64).fill(0x11);
    const res = decodeContainer(buildContainer({ audio }));
    expect(res.kind).toBe('partial');
    if (res.kind !== 'partial') return;
    expect(res.warnings[0]).toBeInstanceOf(UnknownAudioFormatError);
    expect(res.container.format.ext).toBe('bin');
    expect(res.container.audio).toEqual(audio);
  });
});

describe('decodeContainer | fatal results', () => {
  it('rejects a wrong magic before anything else', () => {
    const bytes = handBuilt(mp3Payload());
    bytes[0] = 0x00;
    const res = expectFatal(decodeContainer(bytes));
    expect(res.error).toBeInstanceOf(InvalidMagicError);
    expect(res.error.message).toBe('Invalid input format. Not an NCM container.');
    expect(res.state).toBe('start');
  });

  it('treats input shorter than the magic as foreign', () => {
    const res = expectFatal(decodeContainer(Uint8Array.of(0x43, 0x54, 0x45)));
    expect(res.error).toBeInstanceOf(InvalidMagicError);
  });

  it('reports a key length that overruns the input', () => {
    const bytes = handBuilt(mp3Payload());
    bytes.set(encodeFrameLen(100_000), 10);
    const res = expectFatal(decodeContainer(bytes));
    expect(res.error).toBeInstanceOf(TruncatedInputError);
    expect(res.error.message).toBe('Truncated input: key section needs 100000 bytes at offset 14, 349 remain');
    expect(res.state).toBe('header-validated');
  });

  it('reports a cut-off metadata frame after the key', () => {
    const res = expectFatal(decodeContainer(handBuilt(mp3Payload()).slice(0, 52)));
    expect(res.error).toBeInstanceOf(TruncatedInputError);
    expect(res.state).toBe('key-recovered');
  });

  it('reports input that ends on the reserved byte after the crc', () => {
    const res = expectFatal(decodeContainer(handBuilt(mp3Payload()).slice(0, 54)));
    expect(res.error).toBeInstanceOf(TruncatedInputError);
    expect(res.error.message).toBe('Truncated input: reserved byte needs 1 bytes at offset 54, 0 remain');
    expect(res.state).toBe('meta-recovered');
  });

  it('fails key recovery on a tampered key section', () => {
    const bytes = handBuilt(mp3Payload());
    bytes[14] ^= 0x01;
    const res = expectFatal(decodeContainer(bytes));
    expect(res.error).toBeInstanceOf(KeyRecoveryError);
    expect(res.state).toBe('header-validated');
  });

  it('logs every state it passes through', () => {
    const lines: string[] = [];
    decodeContainer(handBuilt(mp3Payload()), { log: createLogger(4, m => lines.push(m)) });
    const states = lines.filter(l => l.startsWith('4| decoder → ')).map(l => l.slice(13));
    expect(states).toEqual([
      'header-validated', 'key-recovered', 'meta-recovered', 'cover-read', 'audio-decrypted', 'done',
    ]);
  });
});

describe('inspectContainer', () => {
  it('reports layout and format without a full decode', () => {
    const info = inspectContainer(buildContainer({ cover: pngBytes(), coverSpace: 40 }));
    expect(info.format.id).toBe('flac');
    expect(info.coverBytes).toBe(33);
    expect(info.metadata.kind).toBe('ok');
    expect(info.sections.audio.length).toBe(342);
  });

  it('throws fatal errors', () => {
    expect(() => inspectContainer(new Uint8Array(16))).toThrow(InvalidMagicError);
  });
});
