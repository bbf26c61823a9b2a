/** JWT payload as signed and verified */
export interface ClaimMap {
  iss?: string;
  sub?: string;
  aud?: string | string[];
  jti?: string;
  nbf?: number;
  exp?: number;
  iat?: number;
  [claim: string]: unknown;
}

export type SigningAlgorithm = "HS256";

/**
 * Signs and reads compact tokens with a shared secret. Implementations throw
 * on failure; `verify` checks the signature only and never the expiry.
 */
export interface TokenSigner {
  sign(
    claims: ClaimMap,
    secret: string,
    algorithm: SigningAlgorithm,
  ): Promise<string>;
  verify(
    token: string,
    secret: string,
    algorithm: SigningAlgorithm,
  ): Promise<ClaimMap>;
  /** Read the payload without checking the signature */
  decode(token: string): ClaimMap;
}

export function isClaimMap(value: unknown): value is ClaimMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
