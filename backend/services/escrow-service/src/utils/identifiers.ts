import { sha256, toUtf8Bytes } from 'ethers';

/**
 * 0x-prefixed SHA-256 over the parts and the salt, concatenated without
 * separators. Used for both listing ids (seller, title, unix seconds) and
 * order ids (listing id, buyer, epoch millis).
 */
export function generateId(parts: readonly string[], salt: number | bigint | string): string {
  return sha256(toUtf8Bytes(parts.join('') + String(salt)));
}
