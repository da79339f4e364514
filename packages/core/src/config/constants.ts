// packages/core/src/config/constants.ts

/**
 * Protocol constants of the NCM container. These must stay byte-identical to
 * the files in the wild; every valid file fails key recovery otherwise.
 * Keys are kept as hex text and turned into bytes privately by the modules
 * that use them, so nothing here can be written to.
 */
export const NCM_CONSTANTS = Object.freeze({
  MAGIC: 'CTENFDAM',
  MAGIC_GAP_BYTES: 2,

  KEY: Object.freeze({
    MASK: 0x64,
    MASTER_KEY_HEX: '687A4852416D736F356B496E62617857',
    PREFIX: 'neteasecloudmusic',
  } as const),

  META: Object.freeze({
    MASK: 0x63,
    MASTER_KEY_HEX: '2331346C6A6B5F215C5D2630553C2728',
    MARKER: "163 key(Don't modify):",
    PREFIX: 'music:',
  } as const),

  // crc32 (4) + reserved (1) between the meta section and the cover frame
  CRC_BYTES: 4,
  CRC_GAP_BYTES: 1,

  AES_BLOCK: 16,
  KEYBOX_SIZE: 256,
} as const);
