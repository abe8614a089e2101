/**
 * Core types for the Twitch embed player kit - framework agnostic
 */

/** Layout of the full embedded player */
export type PlayerLayout = "video" | "video-with-chat";

/** Color theme of the full embedded player */
export type PlayerTheme = "light" | "dark";

/**
 * Chat display mode.
 * - `default`: full-featured chat
 * - `mobile`: mobile-style chat
 */
export type ChatDisplayMode = "default" | "mobile";

/** Font size of the chat panel */
export type ChatFontSize = "small" | "medium" | "large";

/**
 * How much of a clip is fetched before playback.
 * - `none`: nothing is preloaded
 * - `metadata`: only clip metadata
 * - `auto`: the clip itself
 */
export type PreloadSetting = "none" | "metadata" | "auto";

/** Value the clip iframe's `scrolling` attribute takes */
export type ScrollingValue = "yes" | "no";

/**
 * Configuration of the full (stream/video/collection) player.
 *
 * Exactly one of `channel`, `video` or `collection` is expected to be set;
 * `collection` also needs `video`. Fields left undefined are omitted from the
 * generated document.
 */
export interface StreamPlayerConfig {
  /** Name of the live channel to watch */
  channel?: string;
  /** ID of the video (VOD) to watch */
  video?: string;
  /** ID of the collection to watch */
  collection?: string;
  layout?: PlayerLayout;
  chatMode?: ChatDisplayMode;
  fontSize?: ChatFontSize;
  theme?: PlayerTheme;
  allowFullScreen?: boolean;
  autoplay?: boolean;
  muted?: boolean;
}

/** Configuration of the clip player */
export interface ClipPlayerConfig {
  /** Clip slug, e.g. "SpikyColorfulInternArsonNoSexy" */
  clip: string;
  allowFullScreen?: boolean;
  allowScrolling?: boolean;
  autoplay?: boolean;
  muted?: boolean;
  preload?: PreloadSetting;
}

/** Scalar value an embed option can carry */
export type EmbedValue = string | number | boolean;

/** Ordered `[key, value]` pair produced from a player config */
export type EmbedEntry = readonly [key: string, value: EmbedValue];

/** Which content field of a stream config is set */
export type ContentReferenceKind = "channel" | "video" | "collection";

/**
 * Control surface of Twitch's embedded player (`embed.getPlayer()`).
 * Only the members this kit calls are listed.
 */
export interface EmbeddedPlayerHandle {
  play(): void;
  pause(): void;
  isPaused(): boolean;
  setVolume(volumeLevel: number): void;
  setVideo(videoId: string, timestamp: number): void;
  setChannel(channel: string): void;
  setCollection(collectionId: string, videoId: string): void;
}
