// Re-export everything from @roomgrant/core
export * from "@roomgrant/core";

// Re-export node-specific modules
export { AccessToken } from "./access-token.js";
export type { AccessTokenOptions } from "./access-token.js";
export {
  parseAndVerify,
  parseAndVerifyOrThrow,
  parseUnverified,
  parseUnverifiedOrThrow,
} from "./token-parser.js";
export type { ParseOptions } from "./token-parser.js";
export { JoseTokenSigner } from "./jose-signer.js";
export {
  loadConfigFromEnv,
  API_KEY_ENV,
  API_SECRET_ENV,
  TOKEN_TTL_ENV,
} from "./config.js";
export type { TokenConfig } from "./config.js";
