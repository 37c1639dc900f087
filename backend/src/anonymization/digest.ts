import { createHash } from 'crypto';

/**
 * Key-stretched SHA-256.
 *
 * Hashes the UTF-8 bytes of `input`, then re-hashes the raw 32-byte digest `rounds` more
 * times. `rounds = 0` is a plain SHA-256. Returns lowercase hex.
 */
export function stretchDigest(input: string | null | undefined, rounds: number): string {
  let digest = createHash('sha256')
    .update(input ?? '', 'utf8')
    .digest();

  const extraRounds = Math.max(Math.trunc(rounds), 0);
  for (let i = 0; i < extraRounds; i++) {
    digest = createHash('sha256').update(digest).digest();
  }

  return digest.toString('hex');
}
