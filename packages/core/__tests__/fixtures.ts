// Synthetic containers and payloads shared by the specs
import { concat, encodeContainer, type EncodeInput } from '../src/index.js';

export const AUDIO_KEY = new TextEncoder().encode('0123456789abcd');   // 14 bytes → 32-byte key section

/** `fLaC` + last-block STREAMINFO (34 zero bytes) + fake frame bytes. */
export function flacPayload(frameBytes = 300): Uint8Array {
  const out = new Uint8Array(4 + 4 + 34 + frameBytes);
  out.set([0x66, 0x4c, 0x61, 0x43, 0x80, 0x00, 0x00, 0x22]);
  for (let i = 42; i < out.length; i++) out[i] = (i * 7) & 0xff;
  return out;
}

/** MPEG-1 Layer III frame header followed by filler. */
export function mp3Payload(len = 300): Uint8Array {
  const out = new Uint8Array(len);
  out.set([0xff, 0xfb, 0x90, 0x64]);
  for (let i = 4; i < len; i++) out[i] = (i * 13) & 0xff;
  return out;
}

export const SAMPLE_META = {
  format   : 'flac',
  musicId  : 1234567,
  musicName: 'Test Song',
  artist   : [['Artist One', 11], ['Artist Two', 22]],
  album    : 'Test Album',
  albumId  : 42,
  albumPic : 'https://example.test/cover.jpg',
  duration : 180000,
  bitrate  : 999000,
  alias    : [],
  transNames: [],
};

export function buildContainer(over: Partial<EncodeInput> = {}): Uint8Array {
  return encodeContainer({
    audioKey: AUDIO_KEY,
    audio   : flacPayload(),
    metadata: SAMPLE_META,
    ...over,
  });
}

/** 1x1 PNG header is enough for the image sniffers. */
export function pngBytes(width = 640, height = 480): Uint8Array {
  const b = new Uint8Array(33);
  b.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52]);
  new DataView(b.buffer).setUint32(16, width);
  new DataView(b.buffer).setUint32(20, height);
  b.set([8, 2, 0, 0, 0], 24);
  return b;
}

/** Drain a stream into one buffer. */
export async function collect(rs: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const rd = rs.getReader();
  const out: Uint8Array[] = [];
  for (;;) {
    const { done, value } = await rd.read();
    if (done) break;
    out.push(value);
  }
  return concat(...out);
}
