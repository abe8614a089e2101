import type { CSSProperties } from "react";
import React from "react";
import {
  generateClipPlayerHtml,
  resolveClipPlayerConfig,
  type ClipPlayerConfig,
} from "@embedkit/twitch-player-core";
import { useClipPlayer } from "../hooks/useClipPlayer";
import type { PlayerHookOptions } from "../types";
import PlayerErrorBoundary, { type PlayerErrorFallback } from "./PlayerErrorBoundary";

interface ClipPlayerViewProps extends ClipPlayerConfig, PlayerHookOptions {
  className?: string;
  style?: CSSProperties;
}

export interface TwitchClipPlayerProps extends ClipPlayerViewProps {
  errorFallback?: PlayerErrorFallback;
  onPlayerError?: (error: Error) => void;
}

const ClipPlayerView: React.FC<ClipPlayerViewProps> = ({
  className,
  style,
  enabled,
  debug,
  createSurface,
  onRender,
  ...config
}) => {
  const { containerRef } = useClipPlayer(config, { enabled, debug, createSurface, onRender });

  return (
    <div
      ref={containerRef}
      className={className}
      data-twitch-player="clip"
      style={{ width: "100%", height: "100%", ...style }}
    />
  );
};

/**
 * Twitch clip iframe. Changing `clip` or any other prop reloads it, and
 * clears a mount failure shown through `errorFallback`.
 */
const TwitchClipPlayer: React.FC<TwitchClipPlayerProps> = ({
  errorFallback,
  onPlayerError,
  ...viewProps
}) => (
  <PlayerErrorBoundary
    fallback={errorFallback}
    onError={onPlayerError}
    resetKey={generateClipPlayerHtml(resolveClipPlayerConfig(viewProps))}
  >
    <ClipPlayerView {...viewProps} />
  </PlayerErrorBoundary>
);

export default TwitchClipPlayer;
