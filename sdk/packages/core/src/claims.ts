import { hydrate, type HydrateOptions } from "./hydrate.js";
import type { ClaimMap } from "./signer.js";
import {
  DATA_MAP_KEYS,
  grantSetSchema,
  type GrantSet,
} from "./types/grants.js";
import {
  isPlainObject,
  pruneAbsent,
  toCamelCase,
  toSnakeCase,
} from "./utils.js";

/** Six hours */
export const DEFAULT_VALIDITY_SECONDS = 21_600;

/** Claims set by the codec itself, never taken from grants */
export const RESERVED_CLAIMS: readonly string[] = ["iss", "sub", "nbf", "exp"];

const REGISTERED_CLAIMS: readonly string[] = [...RESERVED_CLAIMS, "iat", "jti"];

/** Current Unix time in whole seconds */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export interface SigningWindow {
  /** Unix seconds, becomes `nbf` */
  issuedAt: number;
  /** Unix seconds, becomes `exp` */
  expiresAt: number;
}

/**
 * Grants as wire claims: absent values pruned at every depth, keys camelCased.
 * The identity is carried as `sub` and is not part of the result.
 */
export function flattenGrants(grants: GrantSet): Record<string, unknown> {
  const pruned = pruneAbsent({ ...grants, identity: undefined });
  const wire = toCamelCase(pruned, { preserveChildKeys: DATA_MAP_KEYS });
  return isPlainObject(wire) ? wire : {};
}

/** Full claim map to hand to the signer */
export function toClaimMap(
  issuerKey: string,
  grants: GrantSet,
  window: SigningWindow,
): ClaimMap {
  const claims: ClaimMap = {
    iss: issuerKey,
    nbf: window.issuedAt,
    exp: window.expiresAt,
  };
  if (grants.identity !== undefined) {
    claims.sub = grants.identity;
    // Participants without a display name are shown by identity
    if (grants.display_name === undefined) {
      claims.displayName = grants.identity;
    }
  }
  for (const [key, value] of Object.entries(flattenGrants(grants))) {
    if (!RESERVED_CLAIMS.includes(key)) claims[key] = value;
  }
  return claims;
}

/** Wire claims back into a grant set; unknown or malformed claims are dropped */
export function hydrateGrants(
  wireGrants: Record<string, unknown>,
  options: HydrateOptions = {},
): GrantSet {
  const internal = toSnakeCase(wireGrants, {
    preserveChildKeys: DATA_MAP_KEYS,
  });
  return hydrate(grantSetSchema, internal, options) ?? {};
}

export interface ParsedClaims {
  issuerKey?: string;
  grants: GrantSet;
  validitySeconds?: number;
}

function validityFrom(claims: ClaimMap, now: number): number | undefined {
  const exp = typeof claims.exp === "number" ? claims.exp : undefined;
  const nbf = typeof claims.nbf === "number" ? claims.nbf : undefined;
  if (exp === undefined) return undefined;
  if (nbf !== undefined && nbf > 0) return Math.max(0, exp - nbf);
  return Math.max(0, exp - now);
}

/**
 * Rebuild issuer, validity and grants from a claim map.
 * `validitySeconds` is the signed duration when `nbf` is known, otherwise the
 * time remaining until `exp`.
 */
export function parseClaimMap(
  claims: ClaimMap,
  now: number,
  options: HydrateOptions = {},
): ParsedClaims {
  const wireGrants: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(claims)) {
    if (!REGISTERED_CLAIMS.includes(key)) wireGrants[key] = value;
  }

  const grants = hydrateGrants(wireGrants, options);
  if (typeof claims.sub === "string") {
    grants.identity = claims.sub;
  } else {
    delete grants.identity;
  }

  return {
    issuerKey: typeof claims.iss === "string" ? claims.iss : undefined,
    grants,
    validitySeconds: validityFrom(claims, now),
  };
}
