// packages/core/src/algorithms/KeyCipher.ts
import { NCM_CONSTANTS } from '../config/constants.js';
import { KeyRecoveryError } from '../errors/index.js';
import { asciiBytes, concat, hexToBytes, startsWith, xorMask } from '../util/bytes.js';
import { ecbDecrypt, ecbEncrypt } from './ecb/AesEcb.js';

const { MASK, MASTER_KEY_HEX, PREFIX } = NCM_CONSTANTS.KEY;
const MASTER_KEY   = hexToBytes(MASTER_KEY_HEX);
const PREFIX_BYTES = asciiBytes(PREFIX);

/**
 * Recover the per-file audio key from the key section.
 *
 * unmask (XOR 0x64) → AES-ECB decrypt with the core key → strip PKCS#7 →
 * drop the 17-byte `neteasecloudmusic` prefix.
 *
 * @throws {KeyRecoveryError} on any failure; never returns a partial key.
 */
export function recoverAudioKey(section: Uint8Array): Uint8Array {
  if (section.length === 0 || section.length % NCM_CONSTANTS.AES_BLOCK !== 0) {
    throw new KeyRecoveryError(
      `Key section length ${section.length} is not a positive multiple of ${NCM_CONSTANTS.AES_BLOCK}`,
    );
  }

  let plain: Uint8Array;
  try {
    plain = ecbDecrypt(MASTER_KEY, xorMask(section, MASK));
  } catch {
    throw new KeyRecoveryError('Key section did not decrypt: bad padding or foreign master key');
  }

  if (plain.length <= PREFIX_BYTES.length) {
    throw new KeyRecoveryError(`Decrypted key too short (${plain.length} bytes)`);
  }
  if (!startsWith(plain, PREFIX_BYTES)) {
    throw new KeyRecoveryError('Decrypted key is missing its fixed prefix');
  }
  return plain.slice(PREFIX_BYTES.length);
}

/** Inverse of {@link recoverAudioKey}. */
export function sealAudioKey(audioKey: Uint8Array): Uint8Array {
  if (audioKey.length === 0) throw new KeyRecoveryError('Audio key must not be empty');
  const cipher = ecbEncrypt(MASTER_KEY, concat(PREFIX_BYTES, audioKey));
  return xorMask(cipher, MASK);
}
