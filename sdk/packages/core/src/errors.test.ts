import { describe, it, expect } from "vitest";
import {
  TokenError,
  MissingIssuerError,
  MissingSecretError,
  InvalidValidityError,
  SensitiveCredentialsError,
  SignerFailureError,
  InvalidSignatureError,
  VerifierFailureError,
  InvalidIssuerError,
  TokenExpiredError,
  isTokenError,
  describeError,
} from "./errors.js";
import { ok, err, unwrap } from "./result.js";

describe("TokenError", () => {
  it("creates base error with all properties", () => {
    const error = new TokenError("signer_failure", "Test message", {
      detail: "info",
    });
    expect(error.message).toBe("Test message");
    expect(error.code).toBe("signer_failure");
    expect(error.details).toEqual({ detail: "info" });
    expect(error.name).toBe("TokenError");
    expect(error instanceof Error).toBe(true);
  });
});

describe("typed error classes", () => {
  it("MissingIssuerError has correct code", () => {
    const error = new MissingIssuerError();
    expect(error.code).toBe("missing_issuer");
    expect(error.name).toBe("MissingIssuerError");
    expect(error instanceof TokenError).toBe(true);
  });

  it("MissingSecretError has correct code", () => {
    const error = new MissingSecretError();
    expect(error.code).toBe("missing_secret");
    expect(error.message).toBe("API secret is required");
  });

  it("InvalidValidityError reports the value", () => {
    const error = new InvalidValidityError(-5);
    expect(error.code).toBe("invalid_validity");
    expect(error.details).toEqual({ validitySeconds: -5 });
  });

  it("SensitiveCredentialsError lists the paths", () => {
    const error = new SensitiveCredentialsError(["a.secret", "b.account_key"]);
    expect(error.code).toBe("sensitive_credentials");
    expect(error.paths).toEqual(["a.secret", "b.account_key"]);
    expect(error.message).toBe(
      "Room configuration contains credentials at a.secret, b.account_key",
    );
  });

  it("SignerFailureError keeps the reason", () => {
    const cause = new Error("boom");
    const error = new SignerFailureError("boom", cause);
    expect(error.code).toBe("signer_failure");
    expect(error.reason).toBe("boom");
    expect(error.details).toBe(cause);
    expect(error.message).toBe("Failed to sign token: boom");
  });

  it("InvalidSignatureError has correct code", () => {
    expect(new InvalidSignatureError().code).toBe("invalid_signature");
  });

  it("VerifierFailureError keeps the reason", () => {
    const error = new VerifierFailureError("bad format");
    expect(error.code).toBe("verifier_failure");
    expect(error.reason).toBe("bad format");
  });

  it("InvalidIssuerError names both issuers", () => {
    const error = new InvalidIssuerError("expected-key", "other-key");
    expect(error.code).toBe("invalid_issuer");
    expect(error.message).toBe(
      "Token issuer other-key does not match expected-key",
    );
  });

  it("TokenExpiredError keeps the expiry", () => {
    const error = new TokenExpiredError(1700000000);
    expect(error.code).toBe("token_expired");
    expect(error.expiredAt).toBe(1700000000);
  });
});

describe("isTokenError / describeError", () => {
  it("recognizes token errors only", () => {
    expect(isTokenError(new MissingSecretError())).toBe(true);
    expect(isTokenError(new Error("plain"))).toBe(false);
    expect(isTokenError("string")).toBe(false);
  });

  it("describes errors and other thrown values", () => {
    expect(describeError(new Error("plain"))).toBe("plain");
    expect(describeError("text")).toBe("text");
    expect(describeError(42)).toBe("42");
  });
});

describe("Result helpers", () => {
  it("unwrap returns data of a success", () => {
    expect(unwrap(ok("jwt"))).toBe("jwt");
  });

  it("unwrap throws the error of a failure", () => {
    const error = new MissingIssuerError();
    expect(() => unwrap(err(error))).toThrow(error);
  });
});
