import { describe, it, expect, vi } from "vitest";
import {
  flattenGrants,
  hydrateGrants,
  parseClaimMap,
  toClaimMap,
} from "./claims.js";
import type { GrantSet } from "./types/grants.js";
import { EncodedFileType, StreamProtocol } from "./types/egress.js";

const signingWindow = { issuedAt: 1_000_000, expiresAt: 1_003_600 };

describe("flattenGrants", () => {
  it("keeps only the grant keys that are set", () => {
    expect(flattenGrants({ video: { room_join: true } })).toEqual({
      video: { roomJoin: true },
    });
  });

  it("prunes absent values at every depth", () => {
    const flat = flattenGrants({
      video: { room_join: true, room: undefined },
      room_config: {
        agents: [{ agent_name: "helper", metadata: undefined }],
        egress: undefined,
      },
      metadata: undefined,
    });
    expect(flat).toEqual({
      video: { roomJoin: true },
      roomConfig: { agents: [{ agentName: "helper" }] },
    });
  });

  it("renames keys inside nested lists", () => {
    const flat = flattenGrants({
      room_config: {
        egress: {
          room: {
            file_outputs: [{ file_type: EncodedFileType.OGG, filepath: "a.ogg" }],
          },
        },
      },
    });
    expect(flat).toEqual({
      roomConfig: {
        egress: {
          room: { fileOutputs: [{ fileType: "OGG", filepath: "a.ogg" }] },
        },
      },
    });
  });

  it("leaves the identity to the sub claim", () => {
    expect(flattenGrants({ identity: "user123", room_preset: "p" })).toEqual({
      roomPreset: "p",
    });
  });

  it("keeps attribute keys verbatim", () => {
    expect(
      flattenGrants({ attributes: { seat_number: "12" }, display_name: "Ann" }),
    ).toEqual({ attributes: { seat_number: "12" }, displayName: "Ann" });
  });
});

describe("toClaimMap", () => {
  it("adds the registered claims to the flattened grants", () => {
    const claims = toClaimMap(
      "api-key",
      { identity: "user123", video: { room_join: true, room: "my-room" } },
      signingWindow,
    );
    expect(claims).toEqual({
      iss: "api-key",
      sub: "user123",
      nbf: 1_000_000,
      exp: 1_003_600,
      displayName: "user123",
      video: { roomJoin: true, room: "my-room" },
    });
  });

  it("keeps an explicit display name over the identity", () => {
    const claims = toClaimMap(
      "api-key",
      { identity: "user123", display_name: "Ann" },
      signingWindow,
    );
    expect(claims.displayName).toBe("Ann");
  });

  it("omits sub when there is no identity", () => {
    const claims = toClaimMap("api-key", {}, signingWindow);
    expect(claims).toEqual({ iss: "api-key", nbf: 1_000_000, exp: 1_003_600 });
    expect(claims).not.toHaveProperty("sub");
  });
});

describe("parseClaimMap", () => {
  it("rebuilds identity, issuer, validity and grants", () => {
    const parsed = parseClaimMap(
      {
        iss: "api-key",
        sub: "user123",
        nbf: 1_000_000,
        exp: 1_003_600,
        iat: 1_000_000,
        jti: "id-1",
        video: { roomJoin: true, room: "my-room", canPublishSources: ["camera"] },
      },
      1_000_100,
    );
    expect(parsed).toEqual({
      issuerKey: "api-key",
      validitySeconds: 3600,
      grants: {
        identity: "user123",
        video: {
          room_join: true,
          room: "my-room",
          can_publish_sources: ["camera"],
        },
      },
    });
  });

  it("uses the remaining lifetime when nbf is missing or zero", () => {
    expect(parseClaimMap({ exp: 2_000 }, 1_500).validitySeconds).toBe(500);
    expect(parseClaimMap({ nbf: 0, exp: 2_000 }, 1_800).validitySeconds).toBe(
      200,
    );
  });

  it("never reports a negative validity", () => {
    expect(parseClaimMap({ exp: 1_000 }, 1_500).validitySeconds).toBe(0);
    expect(
      parseClaimMap({ nbf: 2_000, exp: 1_000 }, 0).validitySeconds,
    ).toBe(0);
  });

  it("leaves validity absent without exp", () => {
    expect(parseClaimMap({ iss: "k" }, 1_000).validitySeconds).toBeUndefined();
  });

  it("drops unknown claims and keeps known ones", () => {
    const parsed = parseClaimMap(
      { iss: "k", futureFeature: true, video: { roomJoin: true } },
      0,
    );
    expect(parsed.grants).toEqual({ video: { room_join: true } });
  });

  it("ignores an identity claim that is not the subject", () => {
    const parsed = parseClaimMap({ identity: "spoofed" }, 0);
    expect(parsed.grants).toEqual({});
  });

  it("reports malformed grant fields to the caller", () => {
    const onMalformed = vi.fn();
    const parsed = parseClaimMap(
      { video: "everything", sip: { admin: true } },
      0,
      { onMalformed },
    );
    expect(parsed.grants).toEqual({ sip: { admin: true } });
    expect(onMalformed).toHaveBeenCalledWith("video", "everything");
  });
});

describe("hydrateGrants", () => {
  it("keeps values a newer server sends", () => {
    const grants = hydrateGrants({
      video: { roomJoin: 1, room: 42 },
      roomConfig: {
        egress: {
          room: { fileOutputs: [{ fileType: "WEBM", filepath: "a" }] },
        },
      },
    });
    expect(grants).toEqual({
      video: { room_join: 1, room: 42 },
      room_config: {
        egress: {
          room: { file_outputs: [{ file_type: "WEBM", filepath: "a" }] },
        },
      },
    });
  });
});

describe("flatten / hydrate round-trip", () => {
  it("restores every present field", () => {
    const grants: GrantSet = {
      display_name: "Ann",
      participant_kind: "standard",
      video: {
        room_join: true,
        room: "my-room",
        can_publish: true,
        can_publish_sources: ["camera", "microphone"],
        destination_room: "overflow",
      },
      sip: { call: true },
      agent: { admin: false },
      inference: { perform: true },
      observability: { write: true },
      room_config: {
        name: "my-room",
        empty_timeout: 300,
        departure_timeout: 20,
        max_participants: 8,
        min_playout_delay: 100,
        max_playout_delay: 400,
        sync_streams: true,
        agents: [{ agent_name: "scribe", metadata: "{\"lang\":\"en\"}" }],
        egress: {
          room: {
            room_name: "my-room",
            audio_only: true,
            file_outputs: [
              {
                file_type: EncodedFileType.MP4,
                filepath: "rec/{room_name}.mp4",
                s3: { bucket: "recordings", metadata: { owner_id: "42" } },
              },
            ],
            stream_outputs: [
              { protocol: StreamProtocol.RTMP, urls: ["rtmp://live.test/x"] },
            ],
          },
        },
      },
      room_preset: "town-hall",
      integrity_hash: "abc123",
      metadata: "{\"plan\":\"pro\"}",
      attributes: { seat_number: "12", teamName: "blue" },
    };

    expect(hydrateGrants(flattenGrants(grants))).toEqual(grants);
  });
});
