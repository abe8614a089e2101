/**
 * Option keys understood by Twitch's embed script and clip iframe.
 */
export const EMBED_KEYS = {
  allowFullScreen: "allowfullscreen",
  autoplay: "autoplay",
  chatMode: "chat",
  channel: "channel",
  clip: "clip",
  collection: "collection",
  fontSize: "font-size",
  height: "height",
  layout: "layout",
  muted: "muted",
  preload: "preload",
  scrolling: "scrolling",
  source: "src",
  theme: "theme",
  video: "video",
  width: "width",
} as const;

export type EmbedKey = (typeof EMBED_KEYS)[keyof typeof EMBED_KEYS];

/** URL of the interactive embed script (`Twitch.Embed`) */
export const TWITCH_EMBED_SCRIPT_URL = "https://embed.twitch.tv/embed/v1.js";

/** Base URL of the clip iframe player */
export const TWITCH_CLIP_EMBED_URL = "https://clips.twitch.tv/embed";
