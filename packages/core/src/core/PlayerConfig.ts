/**
 * PlayerConfig - defaults, merging and validation for player configurations.
 *
 * The defaults below are the only values ever filled in for the caller.
 * Passing a field explicitly as `undefined` drops it from the generated
 * document, default included.
 */

import type { ClipPlayerConfig, ContentReferenceKind, StreamPlayerConfig } from "../types";

export const DEFAULT_STREAM_PLAYER_CONFIG: Readonly<StreamPlayerConfig> = {
  layout: "video",
  chatMode: "mobile",
  theme: "dark",
  allowFullScreen: true,
};

export const DEFAULT_CLIP_PLAYER_CONFIG: Readonly<ClipPlayerConfig> = {
  clip: "",
  allowFullScreen: true,
  allowScrolling: false,
  autoplay: false,
  muted: false,
};

export function resolveStreamPlayerConfig(overrides: StreamPlayerConfig = {}): StreamPlayerConfig {
  return { ...DEFAULT_STREAM_PLAYER_CONFIG, ...overrides };
}

export function resolveClipPlayerConfig(overrides: Partial<ClipPlayerConfig> = {}): ClipPlayerConfig {
  return { ...DEFAULT_CLIP_PLAYER_CONFIG, ...overrides };
}

// ============================================================================
// Validation
// ============================================================================

export enum ConfigIssueCode {
  MULTIPLE_CONTENT_REFERENCES = "MULTIPLE_CONTENT_REFERENCES",
  MISSING_CONTENT_REFERENCE = "MISSING_CONTENT_REFERENCE",
  COLLECTION_WITHOUT_VIDEO = "COLLECTION_WITHOUT_VIDEO",
  MISSING_CLIP = "MISSING_CLIP",
}

export interface ConfigIssue {
  code: ConfigIssueCode;
  message: string;
  /** Config fields involved, in declaration order */
  fields: string[];
}

/**
 * Content fields that are set on a stream config, in declaration order.
 */
export function getContentReferences(config: StreamPlayerConfig): ContentReferenceKind[] {
  const kinds: ContentReferenceKind[] = [];
  if (config.channel !== undefined) kinds.push("channel");
  if (config.video !== undefined) kinds.push("video");
  if (config.collection !== undefined) kinds.push("collection");
  return kinds;
}

/**
 * Flag stream configs the embedded player cannot be expected to handle.
 *
 * Nothing is corrected here: a config with both `channel` and `video` still
 * renders both tokens, and the embedded player decides what happens.
 */
export function validateStreamPlayerConfig(config: StreamPlayerConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const refs = getContentReferences(config);

  if (refs.length === 0) {
    issues.push({
      code: ConfigIssueCode.MISSING_CONTENT_REFERENCE,
      message: "No channel, video or collection set",
      fields: ["channel", "video", "collection"],
    });
  } else if (refs.includes("channel") && refs.length > 1) {
    issues.push({
      code: ConfigIssueCode.MULTIPLE_CONTENT_REFERENCES,
      message: `Multiple content references set (${refs.join(", ")})`,
      fields: refs,
    });
  }

  if (config.collection !== undefined && config.video === undefined) {
    issues.push({
      code: ConfigIssueCode.COLLECTION_WITHOUT_VIDEO,
      message: "collection requires video to be set",
      fields: ["collection", "video"],
    });
  }

  return issues;
}

export function validateClipPlayerConfig(config: ClipPlayerConfig): ConfigIssue[] {
  if (config.clip) return [];
  return [
    {
      code: ConfigIssueCode.MISSING_CLIP,
      message: "No clip set",
      fields: ["clip"],
    },
  ];
}
