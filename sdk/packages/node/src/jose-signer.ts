import * as jose from "jose";
import {
  InvalidSignatureError,
  type ClaimMap,
  type SigningAlgorithm,
  type TokenSigner,
} from "@roomgrant/core";

const encoder = new TextEncoder();

/** HMAC signer backed by jose */
export class JoseTokenSigner implements TokenSigner {
  async sign(
    claims: ClaimMap,
    secret: string,
    algorithm: SigningAlgorithm,
  ): Promise<string> {
    return new jose.SignJWT(claims)
      .setProtectedHeader({ alg: algorithm, typ: "JWT" })
      .sign(encoder.encode(secret));
  }

  async verify(
    token: string,
    secret: string,
    algorithm: SigningAlgorithm,
  ): Promise<ClaimMap> {
    try {
      // compactVerify checks the signature only; expiry is left to the caller
      await jose.compactVerify(token, encoder.encode(secret), {
        algorithms: [algorithm],
      });
    } catch (error) {
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new InvalidSignatureError();
      }
      throw error;
    }
    return jose.decodeJwt(token);
  }

  decode(token: string): ClaimMap {
    return jose.decodeJwt(token);
  }
}
