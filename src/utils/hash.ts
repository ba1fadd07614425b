import { createHash } from 'node:crypto';

const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';
export const RESOURCE_TOKEN_LENGTH = 13;

const toBase32 = (bytes: Uint8Array, length: number) => {
  let out = '';
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5 && out.length < length) {
      out += BASE32_ALPHABET[(buffer >> (bits - 5)) & 31];
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
    if (out.length >= length) break;
  }
  return out;
};

/**
 * Short lowercase alphanumeric token used to make default resource names
 * unique per resource group, environment and region.
 */
export const resourceToken = (...parts: string[]) => {
  const digest = createHash('sha256').update(parts.join('|')).digest();
  return toBase32(digest, RESOURCE_TOKEN_LENGTH);
};

/**
 * Deterministic UUID from scope + principal + role, so a repeated
 * deployment maps onto the same role assignment.
 */
export const deterministicUuid = (
  scope: string,
  principalKey: string,
  roleId: string,
) => {
  const hash = createHash('md5')
    .update(`${scope}:${principalKey}:${roleId}`)
    .digest('hex');
  // Format as UUID: 8-4-4-4-12
  return [
    hash.slice(0, 8),
    hash.slice(8, 12),
    hash.slice(12, 16),
    hash.slice(16, 20),
    hash.slice(20, 32),
  ].join('-');
};
