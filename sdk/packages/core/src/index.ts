// Types - Grants
export type {
  GrantSet,
  VideoGrant,
  SipGrant,
  AgentGrant,
  InferenceGrant,
  ObservabilityGrant,
} from "./types/grants.js";
export {
  grantSetSchema,
  videoGrantSchema,
  sipGrantSchema,
  agentGrantSchema,
  inferenceGrantSchema,
  observabilityGrantSchema,
  DATA_MAP_KEYS,
  joinRoom,
  roomAdmin,
  roomRecord,
  roomCreate,
  ingressAdmin,
} from "./types/grants.js";

// Types - Room configuration
export type { RoomConfiguration, RoomAgentDispatch } from "./types/room.js";
export {
  roomConfigurationSchema,
  roomAgentDispatchSchema,
} from "./types/room.js";
export type {
  RoomEgress,
  RoomCompositeEgressRequest,
  AutoParticipantEgress,
  AutoTrackEgress,
  EncodedFileOutput,
  StreamOutput,
  SegmentedFileOutput,
  ImageOutput,
  EncodingOptions,
  S3Upload,
  GcpUpload,
  AzureBlobUpload,
  WebhookConfig,
  FilterParams,
} from "./types/egress.js";
export {
  EncodedFileType,
  StreamProtocol,
  SegmentedFileProtocol,
  SegmentedFileSuffix,
  ImageFileSuffix,
  ImageCodec,
  EncodingOptionsPreset,
  roomEgressSchema,
} from "./types/egress.js";

// Hydration
export {
  hydrate,
  field,
  record,
  list,
  scalar,
  scalarList,
  scalarMap,
} from "./hydrate.js";
export type { ClaimSchema, HydrateOptions, Scalar } from "./hydrate.js";

// Claims
export {
  DEFAULT_VALIDITY_SECONDS,
  RESERVED_CLAIMS,
  nowInSeconds,
  flattenGrants,
  toClaimMap,
  hydrateGrants,
  parseClaimMap,
} from "./claims.js";
export type { SigningWindow, ParsedClaims } from "./claims.js";
export { findSensitiveCredentials, SENSITIVE_FIELDS } from "./credentials.js";

// Signer port
export { isClaimMap } from "./signer.js";
export type { ClaimMap, SigningAlgorithm, TokenSigner } from "./signer.js";

// Errors
export {
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
export type { TokenErrorCode } from "./errors.js";
export { ok, err, unwrap } from "./result.js";
export type { Result } from "./result.js";

// Logging
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Utils
export {
  toSnakeCase,
  toCamelCase,
  camelToSnake,
  snakeToCamel,
  pruneAbsent,
  isPlainObject,
} from "./utils.js";
export type { KeyConversionOptions } from "./utils.js";
