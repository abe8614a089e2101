import type { CSSProperties } from "react";
import React, { forwardRef, useImperativeHandle } from "react";
import type { StreamPlayerConfig } from "@embedkit/twitch-player-core";
import {
  streamPlayerConfigKey,
  useStreamPlayer,
  type UseStreamPlayerOptions,
} from "../hooks/useStreamPlayer";
import PlayerErrorBoundary, { type PlayerErrorFallback } from "./PlayerErrorBoundary";

interface StreamPlayerViewProps extends StreamPlayerConfig, UseStreamPlayerOptions {
  className?: string;
  style?: CSSProperties;
}

export interface TwitchStreamPlayerProps extends StreamPlayerViewProps {
  /** Rendered when mounting the player throws. Defaults to an alert with a retry button. */
  errorFallback?: PlayerErrorFallback;
  onPlayerError?: (error: Error) => void;
}

/** Runtime control of a mounted stream player */
export interface TwitchStreamPlayerHandle {
  play(): void;
  pause(): void;
  togglePlaybackState(): void;
  setVolume(volumeLevel: number): void;
  setVideo(videoId: string, timestamp?: number): void;
  setChannel(channel: string): void;
  setCollection(collectionId: string, videoId: string): void;
}

const StreamPlayerView = forwardRef<TwitchStreamPlayerHandle, StreamPlayerViewProps>(
  function StreamPlayerView(props, ref) {
    const { className, style, enabled, debug, createSurface, onRender, onCommand, ...config } =
      props;

    const {
      containerRef,
      play,
      pause,
      togglePlaybackState,
      setVolume,
      setVideo,
      setChannel,
      setCollection,
    } = useStreamPlayer(config, { enabled, debug, createSurface, onRender, onCommand });

    useImperativeHandle(
      ref,
      () => ({ play, pause, togglePlaybackState, setVolume, setVideo, setChannel, setCollection }),
      [play, pause, togglePlaybackState, setVolume, setVideo, setChannel, setCollection]
    );

    return (
      <div
        ref={containerRef}
        className={className}
        data-twitch-player="stream"
        style={{ width: "100%", height: "100%", ...style }}
      />
    );
  }
);

/**
 * Full Twitch player (channel, video or collection). Config props reload the
 * player; runtime control goes through the ref. A failure while mounting
 * shows `errorFallback` until the config changes or the user retries.
 *
 * @example
 * ```tsx
 * const ref = useRef<TwitchStreamPlayerHandle>(null);
 * <TwitchStreamPlayer ref={ref} channel="monstercat" theme="light" />
 * ref.current?.setVolume(0.5);
 * ```
 */
const TwitchStreamPlayer = forwardRef<TwitchStreamPlayerHandle, TwitchStreamPlayerProps>(
  function TwitchStreamPlayer(props, ref) {
    const { errorFallback, onPlayerError, ...viewProps } = props;

    return (
      <PlayerErrorBoundary
        fallback={errorFallback}
        onError={onPlayerError}
        resetKey={streamPlayerConfigKey(viewProps)}
      >
        <StreamPlayerView ref={ref} {...viewProps} />
      </PlayerErrorBoundary>
    );
  }
);

export default TwitchStreamPlayer;
