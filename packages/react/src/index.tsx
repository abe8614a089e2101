/**
 * @embedkit/twitch-player-react
 *
 * React components and hooks for embedded Twitch players.
 */

// Components
export { default as TwitchStreamPlayer } from "./components/TwitchStreamPlayer";
export type {
  TwitchStreamPlayerProps,
  TwitchStreamPlayerHandle,
} from "./components/TwitchStreamPlayer";
export { default as TwitchClipPlayer } from "./components/TwitchClipPlayer";
export type { TwitchClipPlayerProps } from "./components/TwitchClipPlayer";
export { default as PlayerErrorBoundary } from "./components/PlayerErrorBoundary";
export type {
  PlayerErrorBoundaryProps,
  PlayerErrorFallback,
} from "./components/PlayerErrorBoundary";

// Hooks
export { useStreamPlayer, streamPlayerConfigKey } from "./hooks/useStreamPlayer";
export type {
  UseStreamPlayerOptions,
  UseStreamPlayerReturn,
  StreamPlayerState,
} from "./hooks/useStreamPlayer";
export { useClipPlayer } from "./hooks/useClipPlayer";
export type { UseClipPlayerReturn, ClipPlayerState } from "./hooks/useClipPlayer";

// Types
export type { PlayerHookOptions } from "./types";

// Re-export the core API
export * from "@embedkit/twitch-player-core";
