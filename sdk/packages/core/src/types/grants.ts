import { z } from "zod";
import {
  field,
  record,
  scalar,
  scalarList,
  scalarMap,
  type ClaimSchema,
  type Scalar,
} from "../hydrate.js";
import { roomConfigurationSchema, type RoomConfiguration } from "./room.js";

/** Room-level permissions */
export interface VideoGrant {
  /** Permission to create rooms */
  room_create?: Scalar;
  /** Permission to list available rooms */
  room_list?: Scalar;
  /** Permission to start a recording */
  room_record?: Scalar;
  /** Permission to control the specific room, `room` must be set */
  room_admin?: Scalar;
  /** Permission to join a room, `room` must be set */
  room_join?: Scalar;
  /** Name of the room the grant applies to */
  room?: Scalar;
  can_publish?: Scalar;
  can_subscribe?: Scalar;
  can_publish_data?: Scalar;
  /** Track sources the participant may publish, e.g. "camera", "microphone" */
  can_publish_sources?: Scalar[];
  can_update_own_metadata?: Scalar;
  /** Permission to manage ingress */
  ingress_admin?: Scalar;
  /** Participant is not visible to other participants */
  hidden?: Scalar;
  /** Participant is recording the room */
  recorder?: Scalar;
  /** Participant is an agent */
  agent?: Scalar;
  can_subscribe_metrics?: Scalar;
  /** Room a participant may be forwarded to */
  destination_room?: Scalar;
}

export interface SipGrant {
  /** Manage SIP trunks and dispatch rules */
  admin?: Scalar;
  /** Make outbound calls */
  call?: Scalar;
}

export interface AgentGrant {
  admin?: Scalar;
}

export interface InferenceGrant {
  perform?: Scalar;
}

export interface ObservabilityGrant {
  write?: Scalar;
}

/**
 * Everything a token grants its holder.
 * Scalar fields keep the JSON value found in the claims; tokens built here
 * use booleans for permissions and strings for names.
 */
export interface GrantSet {
  identity?: string;
  display_name?: Scalar;
  /** e.g. "standard", "agent", "sip" */
  participant_kind?: Scalar;
  video?: VideoGrant;
  sip?: SipGrant;
  agent?: AgentGrant;
  inference?: InferenceGrant;
  observability?: ObservabilityGrant;
  room_config?: RoomConfiguration;
  room_preset?: Scalar;
  /** Hash of an out-of-band payload bound to the token */
  integrity_hash?: Scalar;
  metadata?: Scalar;
  attributes?: Record<string, Scalar>;
}

export const videoGrantSchema: ClaimSchema<VideoGrant> = record({
  room_create: field(scalar),
  room_list: field(scalar),
  room_record: field(scalar),
  room_admin: field(scalar),
  room_join: field(scalar),
  room: field(scalar),
  can_publish: field(scalar),
  can_subscribe: field(scalar),
  can_publish_data: field(scalar),
  can_publish_sources: field(scalarList),
  can_update_own_metadata: field(scalar),
  ingress_admin: field(scalar),
  hidden: field(scalar),
  recorder: field(scalar),
  agent: field(scalar),
  can_subscribe_metrics: field(scalar),
  destination_room: field(scalar),
});

export const sipGrantSchema: ClaimSchema<SipGrant> = record({
  admin: field(scalar),
  call: field(scalar),
});

export const agentGrantSchema: ClaimSchema<AgentGrant> = record({
  admin: field(scalar),
});

export const inferenceGrantSchema: ClaimSchema<InferenceGrant> = record({
  perform: field(scalar),
});

export const observabilityGrantSchema: ClaimSchema<ObservabilityGrant> = record({
  write: field(scalar),
});

export const grantSetSchema: ClaimSchema<GrantSet> = record({
  identity: field(z.string()),
  display_name: field(scalar),
  participant_kind: field(scalar),
  video: field(videoGrantSchema),
  sip: field(sipGrantSchema),
  agent: field(agentGrantSchema),
  inference: field(inferenceGrantSchema),
  observability: field(observabilityGrantSchema),
  room_config: field(roomConfigurationSchema),
  room_preset: field(scalar),
  integrity_hash: field(scalar),
  metadata: field(scalar),
  attributes: field(scalarMap),
});

/** Keys whose values are caller data and keep their own keys on the wire */
export const DATA_MAP_KEYS: readonly string[] = ["attributes", "metadata"];

// Convenience helpers. Room-level booleans default to false.

function roomLevelGrant(overrides: VideoGrant): VideoGrant {
  return {
    room_create: false,
    room_list: false,
    room_record: false,
    room_admin: false,
    room_join: false,
    ingress_admin: false,
    ...overrides,
  };
}

/** Grant to join `room` */
export function joinRoom(
  room: string,
  canPublish = true,
  canSubscribe = true,
): VideoGrant {
  return roomLevelGrant({
    room,
    room_join: true,
    can_publish: canPublish,
    can_subscribe: canSubscribe,
  });
}

export function roomAdmin(room?: string): VideoGrant {
  return roomLevelGrant({ room, room_admin: true });
}

export function roomRecord(): VideoGrant {
  return roomLevelGrant({ room_record: true });
}

export function roomCreate(): VideoGrant {
  return roomLevelGrant({ room_create: true });
}

export function ingressAdmin(): VideoGrant {
  return roomLevelGrant({ ingress_admin: true });
}
