import { z } from "zod";
import {
  field,
  list,
  record,
  scalar,
  scalarList,
  scalarMap,
  type ClaimSchema,
  type Scalar,
} from "../hydrate.js";

// Enumerated fields also take values added by newer servers as plain strings

export enum EncodedFileType {
  DefaultFiletype = "DEFAULT_FILETYPE",
  MP4 = "MP4",
  OGG = "OGG",
  MP3 = "MP3",
}

export enum StreamProtocol {
  DefaultProtocol = "DEFAULT_PROTOCOL",
  RTMP = "RTMP",
  SRT = "SRT",
}

export enum SegmentedFileProtocol {
  DefaultSegmentedFileProtocol = "DEFAULT_SEGMENTED_FILE_PROTOCOL",
  HLS = "HLS_PROTOCOL",
}

export enum SegmentedFileSuffix {
  Index = "INDEX",
  Timestamp = "TIMESTAMP",
}

export enum ImageFileSuffix {
  Index = "IMAGE_SUFFIX_INDEX",
  Timestamp = "IMAGE_SUFFIX_TIMESTAMP",
  NoneOverwrite = "IMAGE_SUFFIX_NONE_OVERWRITE",
}

export enum ImageCodec {
  Default = "IC_DEFAULT",
  JPEG = "IC_JPEG",
}

export enum EncodingOptionsPreset {
  H264_720P_30 = "H264_720P_30",
  H264_720P_60 = "H264_720P_60",
  H264_1080P_30 = "H264_1080P_30",
  H264_1080P_60 = "H264_1080P_60",
  PortraitH264_720P_30 = "PORTRAIT_H264_720P_30",
  PortraitH264_1080P_30 = "PORTRAIT_H264_1080P_30",
}

// Upload targets

export interface S3Upload {
  access_key?: Scalar;
  secret?: Scalar;
  session_token?: Scalar;
  region?: Scalar;
  endpoint?: Scalar;
  bucket?: Scalar;
  force_path_style?: Scalar;
  /** Object metadata, keys are kept as given */
  metadata?: Record<string, Scalar>;
  tagging?: Scalar;
  content_disposition?: Scalar;
}

export interface GcpUpload {
  /** Service account JSON */
  credentials?: Scalar;
  bucket?: Scalar;
}

export interface AzureBlobUpload {
  account_name?: Scalar;
  account_key?: Scalar;
  container_name?: Scalar;
}

// Output targets

export interface EncodedFileOutput {
  file_type?: EncodedFileType | string;
  filepath?: Scalar;
  disable_manifest?: Scalar;
  s3?: S3Upload;
  gcp?: GcpUpload;
  azure?: AzureBlobUpload;
}

export interface StreamOutput {
  protocol?: StreamProtocol | string;
  urls?: Scalar[];
}

export interface SegmentedFileOutput {
  protocol?: SegmentedFileProtocol | string;
  filename_prefix?: Scalar;
  playlist_name?: Scalar;
  live_playlist_name?: Scalar;
  /** Segment length in seconds */
  segment_duration?: Scalar;
  filename_suffix?: SegmentedFileSuffix | string;
  disable_manifest?: Scalar;
  s3?: S3Upload;
  gcp?: GcpUpload;
  azure?: AzureBlobUpload;
}

export interface ImageOutput {
  /** Seconds between captures */
  capture_interval?: Scalar;
  width?: Scalar;
  height?: Scalar;
  filename_prefix?: Scalar;
  filename_suffix?: ImageFileSuffix | string;
  image_codec?: ImageCodec | string;
  disable_manifest?: Scalar;
  s3?: S3Upload;
  gcp?: GcpUpload;
  azure?: AzureBlobUpload;
}

export interface EncodingOptions {
  width?: Scalar;
  height?: Scalar;
  depth?: Scalar;
  framerate?: Scalar;
  audio_codec?: Scalar;
  audio_bitrate?: Scalar;
  audio_frequency?: Scalar;
  video_codec?: Scalar;
  video_bitrate?: Scalar;
  key_frame_interval?: Scalar;
}

export interface FilterParams {
  include_events?: Scalar[];
  exclude_events?: Scalar[];
}

export interface WebhookConfig {
  url?: Scalar;
  signing_key?: Scalar;
  filter_params?: FilterParams;
}

// Egress requests

export interface RoomCompositeEgressRequest {
  room_name?: Scalar;
  layout?: Scalar;
  audio_only?: Scalar;
  video_only?: Scalar;
  custom_base_url?: Scalar;
  preset?: EncodingOptionsPreset | string;
  advanced?: EncodingOptions;
  file_outputs?: EncodedFileOutput[];
  stream_outputs?: StreamOutput[];
  segment_outputs?: SegmentedFileOutput[];
  image_outputs?: ImageOutput[];
  webhooks?: WebhookConfig[];
}

export interface AutoParticipantEgress {
  preset?: EncodingOptionsPreset | string;
  advanced?: EncodingOptions;
  file_outputs?: EncodedFileOutput[];
  segment_outputs?: SegmentedFileOutput[];
}

export interface AutoTrackEgress {
  /** Supports `{track_id}` style templating on the egress side */
  filepath?: Scalar;
  disable_manifest?: Scalar;
  s3?: S3Upload;
  gcp?: GcpUpload;
  azure?: AzureBlobUpload;
  webhooks?: WebhookConfig[];
}

/** Egress started automatically when the room is created */
export interface RoomEgress {
  room?: RoomCompositeEgressRequest;
  participant?: AutoParticipantEgress;
  tracks?: AutoTrackEgress;
}

// Field tables

export const s3UploadSchema: ClaimSchema<S3Upload> = record({
  access_key: field(scalar),
  secret: field(scalar),
  session_token: field(scalar),
  region: field(scalar),
  endpoint: field(scalar),
  bucket: field(scalar),
  force_path_style: field(scalar),
  metadata: field(scalarMap),
  tagging: field(scalar),
  content_disposition: field(scalar),
});

export const gcpUploadSchema: ClaimSchema<GcpUpload> = record({
  credentials: field(scalar),
  bucket: field(scalar),
});

export const azureBlobUploadSchema: ClaimSchema<AzureBlobUpload> = record({
  account_name: field(scalar),
  account_key: field(scalar),
  container_name: field(scalar),
});

export const encodedFileOutputSchema: ClaimSchema<EncodedFileOutput> = record({
  file_type: field(z.string()),
  filepath: field(scalar),
  disable_manifest: field(scalar),
  s3: field(s3UploadSchema),
  gcp: field(gcpUploadSchema),
  azure: field(azureBlobUploadSchema),
});

export const streamOutputSchema: ClaimSchema<StreamOutput> = record({
  protocol: field(z.string()),
  urls: field(scalarList),
});

export const segmentedFileOutputSchema: ClaimSchema<SegmentedFileOutput> =
  record({
    protocol: field(z.string()),
    filename_prefix: field(scalar),
    playlist_name: field(scalar),
    live_playlist_name: field(scalar),
    segment_duration: field(scalar),
    filename_suffix: field(z.string()),
    disable_manifest: field(scalar),
    s3: field(s3UploadSchema),
    gcp: field(gcpUploadSchema),
    azure: field(azureBlobUploadSchema),
  });

export const imageOutputSchema: ClaimSchema<ImageOutput> = record({
  capture_interval: field(scalar),
  width: field(scalar),
  height: field(scalar),
  filename_prefix: field(scalar),
  filename_suffix: field(z.string()),
  image_codec: field(z.string()),
  disable_manifest: field(scalar),
  s3: field(s3UploadSchema),
  gcp: field(gcpUploadSchema),
  azure: field(azureBlobUploadSchema),
});

export const encodingOptionsSchema: ClaimSchema<EncodingOptions> = record({
  width: field(scalar),
  height: field(scalar),
  depth: field(scalar),
  framerate: field(scalar),
  audio_codec: field(scalar),
  audio_bitrate: field(scalar),
  audio_frequency: field(scalar),
  video_codec: field(scalar),
  video_bitrate: field(scalar),
  key_frame_interval: field(scalar),
});

export const filterParamsSchema: ClaimSchema<FilterParams> = record({
  include_events: field(scalarList),
  exclude_events: field(scalarList),
});

export const webhookConfigSchema: ClaimSchema<WebhookConfig> = record({
  url: field(scalar),
  signing_key: field(scalar),
  filter_params: field(filterParamsSchema),
});

export const roomCompositeEgressRequestSchema: ClaimSchema<RoomCompositeEgressRequest> =
  record({
    room_name: field(scalar),
    layout: field(scalar),
    audio_only: field(scalar),
    video_only: field(scalar),
    custom_base_url: field(scalar),
    preset: field(z.string()),
    advanced: field(encodingOptionsSchema),
    file_outputs: field(list(encodedFileOutputSchema)),
    stream_outputs: field(list(streamOutputSchema)),
    segment_outputs: field(list(segmentedFileOutputSchema)),
    image_outputs: field(list(imageOutputSchema)),
    webhooks: field(list(webhookConfigSchema)),
  });

export const autoParticipantEgressSchema: ClaimSchema<AutoParticipantEgress> =
  record({
    preset: field(z.string()),
    advanced: field(encodingOptionsSchema),
    file_outputs: field(list(encodedFileOutputSchema)),
    segment_outputs: field(list(segmentedFileOutputSchema)),
  });

export const autoTrackEgressSchema: ClaimSchema<AutoTrackEgress> = record({
  filepath: field(scalar),
  disable_manifest: field(scalar),
  s3: field(s3UploadSchema),
  gcp: field(gcpUploadSchema),
  azure: field(azureBlobUploadSchema),
  webhooks: field(list(webhookConfigSchema)),
});

export const roomEgressSchema: ClaimSchema<RoomEgress> = record({
  room: field(roomCompositeEgressRequestSchema),
  participant: field(autoParticipantEgressSchema),
  tracks: field(autoTrackEgressSchema),
});
