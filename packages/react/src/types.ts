/**
 * React-specific types for the Twitch embed players
 */
import type { WebSurface } from '@embedkit/twitch-player-core';

/** Options shared by useStreamPlayer and useClipPlayer */
export interface PlayerHookOptions {
  /** Enable/disable the hook */
  enabled?: boolean;
  /** Verbose console logging in the player and surface */
  debug?: boolean;
  /**
   * Surface factory, called once per mount with the container element.
   * Defaults to an IframeSurface.
   */
  createSurface?: (container: HTMLElement) => WebSurface;
  /** Callback with every document loaded into the surface */
  onRender?: (html: string) => void;
}
