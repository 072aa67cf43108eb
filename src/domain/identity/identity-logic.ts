import crypto from 'crypto';

/**
 * Identity & deduplication keys.
 *
 * Borrower identifier: secretHash(legalIdentifier)
 * Dedup key:           secretHash(legalIdentifier + sourceContractId)
 * Access token:        opaqueToken(dedupKey)
 *
 * All derivations are one-way and stable for a given secret, so re-ingesting
 * the same award produces the same keys.
 */

const ALTERNATIVE_CREDIT_MARKER = 'option-alternative';

export interface IdentityService {
  secretHash(seed: string): string;
  opaqueToken(seed: string): string;
  borrowerIdentifier(legalIdentifier: string): string;
  awardBorrowerIdentifier(legalIdentifier: string, sourceContractId: string): string;
  alternativeAwardBorrowerIdentifier(legalIdentifier: string, sourceContractId: string): string;
}

export function createIdentityService(secret: string): IdentityService {
  if (!secret) {
    throw new Error('HASH_SECRET_REQUIRED');
  }

  const secretHash = (seed: string): string =>
    crypto.createHmac('sha256', secret).update(seed, 'utf8').digest('hex');

  return {
    secretHash,
    opaqueToken,
    borrowerIdentifier: legalIdentifier => secretHash(legalIdentifier),
    awardBorrowerIdentifier: (legalIdentifier, sourceContractId) =>
      secretHash(legalIdentifier + sourceContractId),
    alternativeAwardBorrowerIdentifier: (legalIdentifier, sourceContractId) =>
      secretHash(legalIdentifier + sourceContractId + ALTERNATIVE_CREDIT_MARKER),
  };
}

/**
 * UUID-shaped token derived from SHA-256 of the seed, with the version nibble
 * set to 4 and the RFC 4122 variant bits so it passes UUID validators.
 */
export function opaqueToken(seed: string): string {
  const bytes = crypto.createHash('sha256').update(seed, 'utf8').digest().subarray(0, 16);
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;
  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}
