/**
 * Types for the `Twitch` global that embed/v1.js installs on the page.
 * Only the members this kit touches are described.
 */

import type { EmbeddedPlayerHandle, EmbedValue } from "../types";

export interface TwitchEmbedInstance {
  addEventListener(event: string, callback: () => void): void;
  getPlayer(): EmbeddedPlayerHandle;
}

export interface TwitchEmbedConstructor {
  new (targetId: string, options: Record<string, EmbedValue>): TwitchEmbedInstance;
  readonly VIDEO_READY: string;
  readonly VIDEO_PLAY: string;
}

export interface TwitchNamespace {
  Embed: TwitchEmbedConstructor;
}

declare global {
  interface Window {
    Twitch?: TwitchNamespace;
  }
}
