import {
  DEFAULT_VALIDITY_SECONDS,
  InvalidValidityError,
  MissingIssuerError,
  MissingSecretError,
  SensitiveCredentialsError,
  SignerFailureError,
  describeError,
  err,
  findSensitiveCredentials,
  isTokenError,
  nowInSeconds,
  ok,
  silentLogger,
  toClaimMap,
  unwrap,
  type AgentGrant,
  type GrantSet,
  type InferenceGrant,
  type Logger,
  type ObservabilityGrant,
  type Result,
  type RoomConfiguration,
  type SipGrant,
  type TokenSigner,
  type VideoGrant,
} from "@roomgrant/core";
import { JoseTokenSigner } from "./jose-signer.js";
import type { TokenConfig } from "./config.js";

export interface AccessTokenOptions {
  /** Signer used by `toJwt` (default: jose HS256) */
  signer?: TokenSigner;
  /** Logger for signing diagnostics (default: silent) */
  logger?: Logger;
}

interface AccessTokenFields {
  issuerKey: string;
  signingSecret?: string;
  grants: GrantSet;
  validitySeconds?: number;
  allowsSensitiveCredentials: boolean;
}

/**
 * Immutable access token. Every `with*` method returns a new token;
 * nothing is validated until `toJwt`.
 *
 * @example
 * ```ts
 * const jwt = await AccessToken.build("api-key", "api-secret")
 *   .withIdentity("user123")
 *   .withVideoGrant(joinRoom("my-room"))
 *   .withValidity(3600)
 *   .toJwtOrThrow();
 * ```
 */
export class AccessToken {
  readonly issuerKey: string;
  readonly signingSecret?: string;
  readonly grants: GrantSet;
  readonly validitySeconds?: number;
  readonly allowsSensitiveCredentials: boolean;
  private signer: TokenSigner;
  private logger: Logger;

  private constructor(
    fields: AccessTokenFields,
    options: Required<AccessTokenOptions>,
  ) {
    this.issuerKey = fields.issuerKey;
    this.signingSecret = fields.signingSecret;
    this.grants = fields.grants;
    this.validitySeconds = fields.validitySeconds;
    this.allowsSensitiveCredentials = fields.allowsSensitiveCredentials;
    this.signer = options.signer;
    this.logger = options.logger;
  }

  /** Token with no grants, default validity and credentials disallowed */
  static build(
    issuerKey: string,
    secret?: string,
    options: AccessTokenOptions = {},
  ): AccessToken {
    return new AccessToken(
      {
        issuerKey,
        signingSecret: secret,
        grants: {},
        allowsSensitiveCredentials: false,
      },
      {
        signer: options.signer ?? new JoseTokenSigner(),
        logger: options.logger ?? silentLogger,
      },
    );
  }

  /** Token built from environment-derived configuration */
  static fromConfig(
    config: TokenConfig,
    options: AccessTokenOptions = {},
  ): AccessToken {
    const token = AccessToken.build(config.apiKey, config.apiSecret, options);
    return config.validitySeconds === undefined
      ? token
      : token.withValidity(config.validitySeconds);
  }

  private with(fields: Partial<AccessTokenFields>): AccessToken {
    return new AccessToken(
      {
        issuerKey: this.issuerKey,
        signingSecret: this.signingSecret,
        grants: this.grants,
        validitySeconds: this.validitySeconds,
        allowsSensitiveCredentials: this.allowsSensitiveCredentials,
        ...fields,
      },
      { signer: this.signer, logger: this.logger },
    );
  }

  private withGrant<K extends keyof GrantSet>(
    key: K,
    value: GrantSet[K],
  ): AccessToken {
    return this.with({ grants: { ...this.grants, [key]: value } });
  }

  /** The identity of the participant, sent as `sub` */
  get identity(): string | undefined {
    return this.grants.identity;
  }

  withIdentity(identity: string): AccessToken {
    return this.withGrant("identity", identity);
  }

  withDisplayName(displayName: string): AccessToken {
    return this.withGrant("display_name", displayName);
  }

  withKind(kind: string): AccessToken {
    return this.withGrant("participant_kind", kind);
  }

  withMetadata(metadata: string): AccessToken {
    return this.withGrant("metadata", metadata);
  }

  withAttributes(attributes: Record<string, string>): AccessToken {
    return this.withGrant("attributes", attributes);
  }

  withVideoGrant(grant: VideoGrant): AccessToken {
    return this.withGrant("video", grant);
  }

  withSipGrant(grant: SipGrant): AccessToken {
    return this.withGrant("sip", grant);
  }

  withAgentGrant(grant: AgentGrant): AccessToken {
    return this.withGrant("agent", grant);
  }

  withInferenceGrant(grant: InferenceGrant): AccessToken {
    return this.withGrant("inference", grant);
  }

  withObservabilityGrant(grant: ObservabilityGrant): AccessToken {
    return this.withGrant("observability", grant);
  }

  withRoomConfig(config: RoomConfiguration): AccessToken {
    return this.withGrant("room_config", config);
  }

  withRoomPreset(preset: string): AccessToken {
    return this.withGrant("room_preset", preset);
  }

  withIntegrityHash(hash: string): AccessToken {
    return this.withGrant("integrity_hash", hash);
  }

  /** Replace the whole grant set */
  withGrants(grants: GrantSet): AccessToken {
    return this.with({ grants });
  }

  /** Merge grants into the current set, top-level keys of `grants` win */
  addGrants(grants: GrantSet): AccessToken {
    return this.with({ grants: { ...this.grants, ...grants } });
  }

  /** Token lifetime in seconds (default: 6 hours) */
  withValidity(seconds: number): AccessToken {
    return this.with({ validitySeconds: seconds });
  }

  /** Allow credentials inside the room configuration to be signed into the token */
  allowSensitiveCredentials(allow = true): AccessToken {
    return this.with({ allowsSensitiveCredentials: allow });
  }

  /** Sign the token into a compact JWT */
  async toJwt(): Promise<Result<string>> {
    if (!this.issuerKey) return err(new MissingIssuerError());
    if (!this.signingSecret) return err(new MissingSecretError());

    const validFor = this.validitySeconds ?? DEFAULT_VALIDITY_SECONDS;
    if (!Number.isInteger(validFor) || validFor < 0) {
      return err(new InvalidValidityError(validFor));
    }

    if (this.grants.room_config) {
      const paths = findSensitiveCredentials(this.grants.room_config);
      if (paths.length > 0) {
        if (!this.allowsSensitiveCredentials) {
          return err(new SensitiveCredentialsError(paths));
        }
        this.logger.warn(
          "[AccessToken] Signing room configuration credentials:",
          paths.join(", "),
        );
      }
    }

    const issuedAt = nowInSeconds();
    const claims = toClaimMap(this.issuerKey, this.grants, {
      issuedAt,
      expiresAt: issuedAt + validFor,
    });

    try {
      return ok(await this.signer.sign(claims, this.signingSecret, "HS256"));
    } catch (error) {
      if (isTokenError(error)) return err(error);
      return err(new SignerFailureError(describeError(error), error));
    }
  }

  /** Like `toJwt`, but throws the failure */
  async toJwtOrThrow(): Promise<string> {
    return unwrap(await this.toJwt());
  }
}
