import {
  InvalidIssuerError,
  MissingSecretError,
  TokenExpiredError,
  VerifierFailureError,
  describeError,
  err,
  isTokenError,
  nowInSeconds,
  ok,
  parseClaimMap,
  silentLogger,
  unwrap,
  type ClaimMap,
  type Logger,
  type Result,
  type TokenSigner,
} from "@roomgrant/core";
import { AccessToken } from "./access-token.js";
import { JoseTokenSigner } from "./jose-signer.js";

export interface ParseOptions {
  /** Reject tokens whose `exp` has passed (default: true) */
  verifyExpiry?: boolean;
  /** When set, the token's issuer must equal this API key */
  issuer?: string;
  /** Signer used to verify and decode (default: jose HS256) */
  signer?: TokenSigner;
  /** Logger for dropped claims and verification failures (default: silent) */
  logger?: Logger;
}

function toAccessToken(
  claims: ClaimMap,
  secret: string | undefined,
  signer: TokenSigner,
  logger: Logger,
): AccessToken {
  const parsed = parseClaimMap(claims, nowInSeconds(), {
    onMalformed: (path, value) =>
      logger.debug("[parseClaims] Dropped malformed claim", path, value),
  });

  const token = AccessToken.build(parsed.issuerKey ?? "", secret, {
    signer,
    logger,
  }).withGrants(parsed.grants);
  return parsed.validitySeconds === undefined
    ? token
    : token.withValidity(parsed.validitySeconds);
}

/**
 * Verify a token's signature with `secret` and rebuild it.
 * The returned token carries `secret`, since it verified the signature.
 */
export async function parseAndVerify(
  jwt: string,
  secret: string,
  options: ParseOptions = {},
): Promise<Result<AccessToken>> {
  const signer = options.signer ?? new JoseTokenSigner();
  const logger = options.logger ?? silentLogger;
  if (!secret) return err(new MissingSecretError());

  let claims: ClaimMap;
  try {
    claims = await signer.verify(jwt, secret, "HS256");
  } catch (error) {
    logger.debug("[parseAndVerify] Verification failed:", describeError(error));
    if (isTokenError(error)) return err(error);
    return err(new VerifierFailureError(describeError(error), error));
  }

  if (options.issuer !== undefined && claims.iss !== options.issuer) {
    return err(new InvalidIssuerError(options.issuer, claims.iss));
  }

  const verifyExpiry = options.verifyExpiry ?? true;
  if (
    verifyExpiry &&
    typeof claims.exp === "number" &&
    claims.exp < nowInSeconds()
  ) {
    return err(new TokenExpiredError(claims.exp));
  }

  return ok(toAccessToken(claims, secret, signer, logger));
}

/** Like `parseAndVerify`, but throws the failure */
export async function parseAndVerifyOrThrow(
  jwt: string,
  secret: string,
  options: ParseOptions = {},
): Promise<AccessToken> {
  return unwrap(await parseAndVerify(jwt, secret, options));
}

/**
 * Rebuild a token without checking its signature. For inspection only:
 * the returned token has no secret and its grants are not trusted.
 */
export function parseUnverified(
  jwt: string,
  options: Pick<ParseOptions, "signer" | "logger"> = {},
): Result<AccessToken> {
  const signer = options.signer ?? new JoseTokenSigner();
  const logger = options.logger ?? silentLogger;

  let claims: ClaimMap;
  try {
    claims = signer.decode(jwt);
  } catch (error) {
    if (isTokenError(error)) return err(error);
    return err(new VerifierFailureError(describeError(error), error));
  }
  return ok(toAccessToken(claims, undefined, signer, logger));
}

/** Like `parseUnverified`, but throws the failure */
export function parseUnverifiedOrThrow(
  jwt: string,
  options: Pick<ParseOptions, "signer" | "logger"> = {},
): AccessToken {
  return unwrap(parseUnverified(jwt, options));
}
