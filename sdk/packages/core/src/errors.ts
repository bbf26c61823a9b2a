export type TokenErrorCode =
  | "missing_issuer"
  | "missing_secret"
  | "invalid_validity"
  | "sensitive_credentials"
  | "signer_failure"
  | "invalid_signature"
  | "verifier_failure"
  | "invalid_issuer"
  | "token_expired";

/** Base error class for all token errors */
export class TokenError extends Error {
  constructor(
    public code: TokenErrorCode,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = "TokenError";
  }
}

/** Signing attempted without an API key */
export class MissingIssuerError extends TokenError {
  constructor(message = "API key is required to sign a token") {
    super("missing_issuer", message);
    this.name = "MissingIssuerError";
  }
}

/** Signing or verification attempted without an API secret */
export class MissingSecretError extends TokenError {
  constructor(message = "API secret is required") {
    super("missing_secret", message);
    this.name = "MissingSecretError";
  }
}

export class InvalidValidityError extends TokenError {
  constructor(validitySeconds: number) {
    super(
      "invalid_validity",
      `Token validity must be a non-negative whole number of seconds, got ${validitySeconds}`,
      { validitySeconds },
    );
    this.name = "InvalidValidityError";
  }
}

/** Room configuration carries credentials and signing them was not allowed */
export class SensitiveCredentialsError extends TokenError {
  constructor(public paths: string[]) {
    super(
      "sensitive_credentials",
      `Room configuration contains credentials at ${paths.join(", ")}`,
      { paths },
    );
    this.name = "SensitiveCredentialsError";
  }
}

export class SignerFailureError extends TokenError {
  constructor(public reason: string, cause?: unknown) {
    super("signer_failure", `Failed to sign token: ${reason}`, cause);
    this.name = "SignerFailureError";
  }
}

export class InvalidSignatureError extends TokenError {
  constructor(message = "Token signature verification failed") {
    super("invalid_signature", message);
    this.name = "InvalidSignatureError";
  }
}

export class VerifierFailureError extends TokenError {
  constructor(public reason: string, cause?: unknown) {
    super("verifier_failure", `Failed to read token: ${reason}`, cause);
    this.name = "VerifierFailureError";
  }
}

/** Token was issued by a different API key than expected */
export class InvalidIssuerError extends TokenError {
  constructor(expected: string, actual: string | undefined) {
    super(
      "invalid_issuer",
      `Token issuer ${actual ?? "(none)"} does not match ${expected}`,
      { expected, actual },
    );
    this.name = "InvalidIssuerError";
  }
}

export class TokenExpiredError extends TokenError {
  constructor(public expiredAt: number) {
    super("token_expired", `Token expired at ${expiredAt}`, { expiredAt });
    this.name = "TokenExpiredError";
  }
}

export function isTokenError(error: unknown): error is TokenError {
  return error instanceof TokenError;
}

/** Human-readable reason for an unknown thrown value */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
