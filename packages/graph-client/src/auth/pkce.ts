import { createHash, randomBytes } from 'node:crypto';

/** Random code_verifier, base64url of 32 bytes. */
export function createCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

/** S256 code_challenge for a verifier. */
export function codeChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}
