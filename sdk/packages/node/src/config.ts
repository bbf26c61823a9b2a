import {
  InvalidValidityError,
  MissingIssuerError,
  MissingSecretError,
  err,
  ok,
  type Result,
} from "@roomgrant/core";

export const API_KEY_ENV = "ROOMGRANT_API_KEY";
export const API_SECRET_ENV = "ROOMGRANT_API_SECRET";
export const TOKEN_TTL_ENV = "ROOMGRANT_TOKEN_TTL";

export interface TokenConfig {
  /** API key, sent as the token issuer */
  apiKey: string;
  /** Shared secret the token is signed with */
  apiSecret: string;
  /** Token lifetime in seconds (default: 6 hours) */
  validitySeconds?: number;
}

/** Read signing credentials from the environment */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<TokenConfig> {
  const apiKey = env[API_KEY_ENV]?.trim();
  const apiSecret = env[API_SECRET_ENV]?.trim();
  if (!apiKey) {
    return err(new MissingIssuerError(`${API_KEY_ENV} is not set`));
  }
  if (!apiSecret) {
    return err(new MissingSecretError(`${API_SECRET_ENV} is not set`));
  }

  const ttl = env[TOKEN_TTL_ENV]?.trim();
  if (!ttl) return ok({ apiKey, apiSecret });

  const validitySeconds = Number(ttl);
  if (!Number.isInteger(validitySeconds) || validitySeconds < 0) {
    return err(new InvalidValidityError(validitySeconds));
  }
  return ok({ apiKey, apiSecret, validitySeconds });
}
