import { createNcmDecoder, NcmDecoder, tagAudio, inspectImage } from '../src/index.js';
import { buildContainer, flacPayload, pngBytes } from '../../core/__tests__/fixtures.js';

describe('node-runtime entry', () => {
  it('creates a configured decoder', async () => {
    const dec = createNcmDecoder({ chunkSize: 512 });
    expect(dec).toBeInstanceOf(NcmDecoder);
    expect(dec.getChunkSize()).toBe(512);

    const res = await dec.decode(buildContainer());
    expect(res.kind === 'complete' && res.container.audio).toEqual(flacPayload());
  });

  it('exposes the tagging helpers', () => {
    const info = inspectImage(pngBytes(2, 3));
    expect(info).toEqual({ mime: 'image/png', width: 2, height: 3 });
    const raw = Uint8Array.of(1, 2, 3);
    expect(tagAudio('unknown', raw, { artists: [] })).toBe(raw);
  });
});
