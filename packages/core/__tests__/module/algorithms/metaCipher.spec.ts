import { openMetadata, sealMetadata, parseMusicMetadata } from '../../../src/algorithms/MetaCipher.js';
import { ecbEncrypt } from '../../../src/algorithms/ecb/AesEcb.js';
import { NCM_CONSTANTS } from '../../../src/config/constants.js';
import { MetadataDecodeError } from '../../../src/errors/index.js';
import { base64Encode, hexToBytes, xorMask } from '../../../src/util/bytes.js';
import { SAMPLE_META } from '../../fixtures.js';

/** Mask `163 key(Don't modify):` + base64(AES(plain)) the way the encoder does. */
function section(plain: string): Uint8Array {
  const enc = new TextEncoder();
  const b64 = base64Encode(ecbEncrypt(hexToBytes(NCM_CONSTANTS.META.MASTER_KEY_HEX), enc.encode(plain)));
  return xorMask(enc.encode("163 key(Don't modify):" + b64), 0x63);
}

describe('MetaCipher', () => {
  it('uses the protocol constants', () => {
    expect(Buffer.from(NCM_CONSTANTS.META.MASTER_KEY_HEX, 'hex').toString('ascii')).toBe("#14ljk_!\\]&0U<'(");
    expect(NCM_CONSTANTS.META.MARKER).toHaveLength(22);
    expect(NCM_CONSTANTS.META.PREFIX).toBe('music:');
  });

  it('decodes a hand-built section', () => {
    const out = openMetadata(section('music:{"musicName":"Song","artist":[["A",1]],"format":"mp3"}'));
    expect(out.kind).toBe('ok');
    if (out.kind !== 'ok') return;
    expect(out.metadata.musicName).toBe('Song');
    expect(out.metadata.format).toBe('mp3');
    expect(out.metadata.artists).toEqual([{ name: 'A', id: 1 }]);
  });

  it('round-trips through sealMetadata', () => {
    const out = openMetadata(sealMetadata(SAMPLE_META));
    expect(out.kind).toBe('ok');
    if (out.kind !== 'ok') return;
    expect(out.metadata).toMatchObject({
      musicId  : 1234567,
      musicName: 'Test Song',
      album    : 'Test Album',
      albumPic : 'https://example.test/cover.jpg',
      duration : 180000,
      artists  : [{ name: 'Artist One', id: 11 }, { name: 'Artist Two', id: 22 }],
    });
    expect(out.metadata.raw).toEqual(SAMPLE_META);
  });

  it('treats an empty section as absent', () => {
    expect(openMetadata(new Uint8Array(0))).toEqual({ kind: 'absent' });
  });

  it('treats a section without the marker as absent', () => {
    expect(openMetadata(xorMask(new TextEncoder().encode('something else entirely'), 0x63)))
      .toEqual({ kind: 'absent' });
  });

  it('reports undecryptable payloads as MetadataDecodeError', () => {
    const enc = new TextEncoder();
    const bad = xorMask(enc.encode("163 key(Don't modify):" + base64Encode(new Uint8Array(32).fill(7))), 0x63);
    const out = openMetadata(bad);
    expect(out.kind).toBe('error');
    if (out.kind === 'error') expect(out.error).toBeInstanceOf(MetadataDecodeError);
  });

  it('reports broken base64 as MetadataDecodeError', () => {
    const bad = xorMask(new TextEncoder().encode("163 key(Don't modify):***"), 0x63);
    const out = openMetadata(bad);
    expect(out.kind).toBe('error');
    if (out.kind === 'error') expect(out.error.message).toMatch(/Invalid Base64/);
  });

  it('reports a missing music: prefix', () => {
    const out = openMetadata(section('dj:{"mainMusic":{}}'));
    expect(out.kind).toBe('error');
    if (out.kind === 'error') expect(out.error.message).toBe('Metadata is missing the "music:" prefix');
  });

  it('reports invalid JSON', () => {
    const out = openMetadata(section('music:{not json'));
    expect(out.kind).toBe('error');
    if (out.kind === 'error') expect(out.error.message).toBe('Metadata is not valid JSON');
  });
});

describe('parseMusicMetadata', () => {
  it('accepts bare artist names and drops malformed entries', () => {
    const m = parseMusicMetadata({ artist: ['Solo', 5, ['Pair', '77'], [3, 4]] });
    expect(m.artists).toEqual([{ name: 'Solo' }, { name: 'Pair', id: '77' }]);
  });

  it('ignores fields of the wrong type', () => {
    const m = parseMusicMetadata({ musicName: 12, duration: 'long', alias: ['x', 1] });
    expect(m.musicName).toBeUndefined();
    expect(m.duration).toBeUndefined();
    expect(m.alias).toEqual(['x']);
    expect(m.artists).toEqual([]);
  });

  it('rejects non-objects', () => {
    expect(() => parseMusicMetadata([1, 2])).toThrow(MetadataDecodeError);
    expect(() => parseMusicMetadata(null)).toThrow(MetadataDecodeError);
  });
});
