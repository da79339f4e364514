// packages/node-runtime/src/image.ts

export interface ImageInfo {
  mime    : 'image/jpeg' | 'image/png';
  width?  : number;
  height? : number;
}

const PNG_SIG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function be16(b: Uint8Array, o: number): number { return (b[o] << 8) | b[o + 1]; }
function be32(b: Uint8Array, o: number): number {
  return ((b[o] << 24) >>> 0) + (b[o + 1] << 16) + (b[o + 2] << 8) + b[o + 3];
}

/** Identify a JPEG or PNG cover and read its pixel size where the header allows. */
export function inspectImage(bytes: Uint8Array): ImageInfo | undefined {
  if (bytes.length >= 24 && PNG_SIG.every((v, i) => bytes[i] === v)) {
    // IHDR is always the first chunk
    return { mime: 'image/png', width: be32(bytes, 16), height: be32(bytes, 20) };
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return { mime: 'image/jpeg', ...jpegSize(bytes) };
  }
  return undefined;
}

function jpegSize(b: Uint8Array): { width?: number; height?: number } {
  let i = 2;
  while (i + 3 < b.length) {
    if (b[i] !== 0xff) return {};
    const marker = b[i + 1];
    if (marker === 0xff) { i++; continue; }                 // fill byte
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd8)) { i += 2; continue; }
    if (marker === 0xda || marker === 0xd9) return {};      // scan data or EOI before any SOF

    const len = be16(b, i + 2);
    const isSof = marker >= 0xc0 && marker <= 0xcf &&
                  marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isSof) {
      if (i + 8 >= b.length) return {};
      return { height: be16(b, i + 5), width: be16(b, i + 7) };
    }
    i += 2 + len;
  }
  return {};
}

export function describeImage(info: ImageInfo): string {
  return info.width !== undefined && info.height !== undefined
    ? `${info.width}x${info.height}`
    : info.mime;
}
