import {
  InvalidSignatureError,
  VerifierFailureError,
  isClaimMap,
  type ClaimMap,
  type SigningAlgorithm,
  type TokenSigner,
} from "@roomgrant/core";

export const TEST_API_KEY = "test-key";
export const TEST_API_SECRET = "test-secret";

/**
 * Create a JWT-shaped token string for testing. The signature segment is the
 * base64url-encoded secret, so it is not cryptographically signed.
 */
export function createMockToken(
  claims: ClaimMap = {},
  secret = TEST_API_SECRET,
): string {
  const now = Math.floor(Date.now() / 1000);
  const payload: ClaimMap = {
    iss: TEST_API_KEY,
    sub: "test-user",
    nbf: now,
    exp: now + 3600,
    ...claims,
  };

  const header = base64url(JSON.stringify({ alg: "HS256", typ: "JWT" }));
  const body = base64url(JSON.stringify(payload));
  return `${header}.${body}.${base64url(secret)}`;
}

export interface MockSigner extends TokenSigner {
  /** Claim maps passed to `sign`, in call order */
  signed: ClaimMap[];
}

/** In-process signer producing `createMockToken` style tokens */
export function createMockSigner(): MockSigner {
  const signed: ClaimMap[] = [];

  return {
    signed,

    async sign(claims: ClaimMap, secret: string, _algorithm: SigningAlgorithm) {
      signed.push(claims);
      const header = base64url(JSON.stringify({ alg: "HS256", typ: "JWT" }));
      const body = base64url(JSON.stringify(claims));
      return `${header}.${body}.${base64url(secret)}`;
    },

    async verify(token: string, secret: string, _algorithm: SigningAlgorithm) {
      const claims = parseMockToken(token);
      if (token.split(".")[2] !== base64url(secret)) {
        throw new InvalidSignatureError();
      }
      return claims;
    },

    decode(token: string) {
      return parseMockToken(token);
    },
  };
}

function parseMockToken(token: string): ClaimMap {
  const parts = token.split(".");
  if (parts.length !== 3) {
    throw new VerifierFailureError("Invalid mock token format");
  }
  const payload: unknown = JSON.parse(
    Buffer.from(parts[1], "base64url").toString("utf-8"),
  );
  if (!isClaimMap(payload)) {
    throw new VerifierFailureError("Mock token payload is not an object");
  }
  return payload;
}

function base64url(str: string): string {
  return Buffer.from(str).toString("base64url");
}
