/**
 * MarkupGenerator - configuration to HTML/JS document, by key/value
 * substitution into a fixed template.
 *
 * Two token styles exist:
 * - script literal (`key: "value"`, booleans bare) for the `Twitch.Embed`
 *   options object of the full player
 * - HTML attribute (`key="value"`, everything quoted) for the clip iframe
 *
 * Token order is the declaration order of the config fields, never the order
 * in which they were set. Undefined fields produce no token.
 */

import type {
  ClipPlayerConfig,
  EmbedEntry,
  EmbedValue,
  ScrollingValue,
  StreamPlayerConfig,
} from "../types";
import { EMBED_KEYS, type EmbedKey } from "./EmbedKeys";
import {
  CLIP_PLACEHOLDER,
  CLIP_PLAYER_TEMPLATE,
  INITIALIZATION_PLACEHOLDER,
  STREAM_PLAYER_TEMPLATE,
} from "./templates";

/** Delimiter between script-literal tokens */
export const SCRIPT_PARAMETER_DELIMITER = ",";

/** Delimiter between HTML attribute tokens */
export const HTML_PARAMETER_DELIMITER = "\n";

const STREAM_FIELDS: ReadonlyArray<readonly [keyof StreamPlayerConfig, EmbedKey]> = [
  ["channel", EMBED_KEYS.channel],
  ["video", EMBED_KEYS.video],
  ["collection", EMBED_KEYS.collection],
  ["layout", EMBED_KEYS.layout],
  ["chatMode", EMBED_KEYS.chatMode],
  ["fontSize", EMBED_KEYS.fontSize],
  ["theme", EMBED_KEYS.theme],
  ["allowFullScreen", EMBED_KEYS.allowFullScreen],
  ["autoplay", EMBED_KEYS.autoplay],
  ["muted", EMBED_KEYS.muted],
];

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

// ============================================================================
// Token formatting
// ============================================================================

/** Object-literal key; quoted when it is not a plain identifier (`font-size`) */
export function formatScriptKey(key: string): string {
  return IDENTIFIER_PATTERN.test(key) ? key : JSON.stringify(key);
}

/**
 * Script-literal value. Strings are JSON-quoted with `<` escaped so a value
 * can never close the surrounding `<script>` element.
 */
export function formatScriptValue(value: EmbedValue): string {
  if (typeof value === "string") {
    return JSON.stringify(value).replace(/</g, "\\u003c");
  }
  return String(value);
}

/** `key: "value"` for strings, `key: value` for booleans and numbers */
export function formatScriptParameter(key: string, value: EmbedValue): string {
  return `${formatScriptKey(key)}: ${formatScriptValue(value)}`;
}

export function escapeHtmlAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** `key="value"`, whatever the value's type */
export function formatHtmlParameter(key: string, value: EmbedValue): string {
  return `${key}="${escapeHtmlAttribute(String(value))}"`;
}

// ============================================================================
// Entries
// ============================================================================

/**
 * Ordered option entries of a stream config, undefined fields skipped.
 */
export function buildStreamPlayerEntries(config: StreamPlayerConfig): EmbedEntry[] {
  const entries: EmbedEntry[] = [];
  for (const [field, key] of STREAM_FIELDS) {
    const value = config[field];
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}

export function toScrollingValue(allowScrolling: boolean): ScrollingValue {
  return allowScrolling ? "yes" : "no";
}

/**
 * Ordered attribute entries of a clip config. The clip id itself goes into
 * the iframe `src`, not into the entries.
 */
export function buildClipPlayerEntries(config: ClipPlayerConfig): EmbedEntry[] {
  const entries: EmbedEntry[] = [];
  if (config.allowFullScreen !== undefined) {
    entries.push([EMBED_KEYS.allowFullScreen, config.allowFullScreen]);
  }
  if (config.allowScrolling !== undefined) {
    entries.push([EMBED_KEYS.scrolling, toScrollingValue(config.allowScrolling)]);
  }
  if (config.autoplay !== undefined) {
    entries.push([EMBED_KEYS.autoplay, config.autoplay]);
  }
  if (config.muted !== undefined) {
    entries.push([EMBED_KEYS.muted, config.muted]);
  }
  if (config.preload !== undefined) {
    entries.push([EMBED_KEYS.preload, config.preload]);
  }
  return entries;
}

/**
 * Options object for constructing `Twitch.Embed` directly in a page.
 */
export function buildStreamEmbedOptions(
  config: StreamPlayerConfig,
  frame: { width: string; height: string } = { width: "100%", height: "100%" }
): Record<string, EmbedValue> {
  const options: Record<string, EmbedValue> = {
    [EMBED_KEYS.width]: frame.width,
    [EMBED_KEYS.height]: frame.height,
    playsinline: true,
  };
  for (const [key, value] of buildStreamPlayerEntries(config)) {
    options[key] = value;
  }
  return options;
}

// ============================================================================
// Documents
// ============================================================================

export function buildStreamPlayerTokens(config: StreamPlayerConfig): string[] {
  return buildStreamPlayerEntries(config).map(([key, value]) => formatScriptParameter(key, value));
}

export function buildClipPlayerTokens(config: ClipPlayerConfig): string[] {
  return buildClipPlayerEntries(config).map(([key, value]) => formatHtmlParameter(key, value));
}

/**
 * Document for the full player (channel, video or collection).
 */
export function generateStreamPlayerHtml(config: StreamPlayerConfig): string {
  const tokens = buildStreamPlayerTokens(config).join(SCRIPT_PARAMETER_DELIMITER);
  return STREAM_PLAYER_TEMPLATE.replace(INITIALIZATION_PLACEHOLDER, () => tokens);
}

/**
 * Iframe fragment for the clip player.
 */
export function generateClipPlayerHtml(config: ClipPlayerConfig): string {
  const tokens = buildClipPlayerTokens(config).join(HTML_PARAMETER_DELIMITER);
  const clip = encodeURIComponent(config.clip ?? "");
  return CLIP_PLAYER_TEMPLATE.replace(INITIALIZATION_PLACEHOLDER, () => tokens).replace(
    CLIP_PLACEHOLDER,
    () => clip
  );
}
