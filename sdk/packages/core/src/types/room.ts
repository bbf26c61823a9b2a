import {
  field,
  list,
  record,
  scalar,
  type ClaimSchema,
  type Scalar,
} from "../hydrate.js";
import { roomEgressSchema, type RoomEgress } from "./egress.js";

/** Agent dispatched into the room when it is created */
export interface RoomAgentDispatch {
  agent_name?: Scalar;
  metadata?: Scalar;
}

/** Room settings applied when a participant joining with the token creates the room */
export interface RoomConfiguration {
  name?: Scalar;
  /** Seconds to keep an empty room open */
  empty_timeout?: Scalar;
  /** Seconds to keep the room open after the last participant leaves */
  departure_timeout?: Scalar;
  max_participants?: Scalar;
  metadata?: Scalar;
  egress?: RoomEgress;
  /** Milliseconds */
  min_playout_delay?: Scalar;
  /** Milliseconds */
  max_playout_delay?: Scalar;
  sync_streams?: Scalar;
  agents?: RoomAgentDispatch[];
}

export const roomAgentDispatchSchema: ClaimSchema<RoomAgentDispatch> = record({
  agent_name: field(scalar),
  metadata: field(scalar),
});

export const roomConfigurationSchema: ClaimSchema<RoomConfiguration> = record({
  name: field(scalar),
  empty_timeout: field(scalar),
  departure_timeout: field(scalar),
  max_participants: field(scalar),
  metadata: field(scalar),
  egress: field(roomEgressSchema),
  min_playout_delay: field(scalar),
  max_playout_delay: field(scalar),
  sync_streams: field(scalar),
  agents: field(list(roomAgentDispatchSchema)),
});
