/**
 * useStreamPlayer.ts
 *
 * React hook that wraps StreamPlayer for declarative usage.
 * The player is created once per mount; config changes reload the document.
 */

import { useState, useEffect, useRef, useCallback, type RefObject } from 'react';
import {
  StreamPlayer,
  IframeSurface,
  buildStreamPlayerTokens,
  resolveStreamPlayerConfig,
  type ConfigIssue,
  type PlayerCommand,
  type StreamPlayerConfig,
} from '@embedkit/twitch-player-core';
import type { PlayerHookOptions } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface UseStreamPlayerOptions extends PlayerHookOptions {
  /** Callback for every runtime command sent to the document */
  onCommand?: (command: PlayerCommand, script: string) => void;
}

export interface StreamPlayerState {
  /** Document currently loaded into the surface */
  html: string | null;
  /** Issues found in the rendered config */
  issues: ConfigIssue[];
}

export interface UseStreamPlayerReturn {
  /** Container ref to attach to your player container div */
  containerRef: RefObject<HTMLDivElement>;
  /** Current state (reactive) */
  state: StreamPlayerState;
  /** Player instance (for direct method calls) */
  player: StreamPlayer | null;
  play: () => void;
  pause: () => void;
  togglePlaybackState: () => void;
  /** 0 is muted, 1 is maximum */
  setVolume: (volumeLevel: number) => void;
  setVideo: (videoId: string, timestamp?: number) => void;
  setChannel: (channel: string) => void;
  setCollection: (collectionId: string, videoId: string) => void;
}

const initialState: StreamPlayerState = {
  html: null,
  issues: [],
};

/** Identity of a config as far as the generated document is concerned */
export function streamPlayerConfigKey(config: StreamPlayerConfig): string {
  return buildStreamPlayerTokens(resolveStreamPlayerConfig(config)).join(',');
}

// ============================================================================
// Hook
// ============================================================================

export function useStreamPlayer(
  config: StreamPlayerConfig,
  options: UseStreamPlayerOptions = {}
): UseStreamPlayerReturn {
  const { enabled = true, debug = false, createSurface, onRender, onCommand } = options;

  const containerRef = useRef<HTMLDivElement>(null);
  const playerRef = useRef<StreamPlayer | null>(null);
  const renderedKeyRef = useRef<string | null>(null);
  const [state, setState] = useState<StreamPlayerState>(initialState);

  // Latest values for callbacks and effects
  const configRef = useRef(config);
  configRef.current = config;
  const callbacksRef = useRef({ createSurface, onRender, onCommand });
  callbacksRef.current = { createSurface, onRender, onCommand };

  const key = streamPlayerConfigKey(config);

  // Create and mount the player
  useEffect(() => {
    if (!enabled) return;

    const container = containerRef.current;
    if (!container) return;

    const surface =
      callbacksRef.current.createSurface?.(container) ?? new IframeSurface(container, { debug });
    const player = new StreamPlayer({
      surface,
      config: configRef.current,
      autoRender: false,
      debug,
    });
    playerRef.current = player;

    const unsubs: Array<() => void> = [];

    unsubs.push(player.on('render', ({ html, issues }) => {
      setState({ html, issues });
      callbacksRef.current.onRender?.(html);
    }));

    unsubs.push(player.on('command', ({ command, script }) => {
      callbacksRef.current.onCommand?.(command, script);
    }));

    player.render();
    renderedKeyRef.current = streamPlayerConfigKey(configRef.current);

    return () => {
      unsubs.forEach(fn => fn());
      player.destroy();
      playerRef.current = null;
      renderedKeyRef.current = null;
      setState(initialState);
    };
  }, [enabled, debug]);

  // Reload when the config changes
  useEffect(() => {
    const player = playerRef.current;
    if (!player || renderedKeyRef.current === key) return;
    player.setConfig(configRef.current);
    renderedKeyRef.current = key;
  }, [key]);

  // Stable action callbacks
  const play = useCallback(() => {
    playerRef.current?.play();
  }, []);

  const pause = useCallback(() => {
    playerRef.current?.pause();
  }, []);

  const togglePlaybackState = useCallback(() => {
    playerRef.current?.togglePlaybackState();
  }, []);

  const setVolume = useCallback((volumeLevel: number) => {
    playerRef.current?.setVolume(volumeLevel);
  }, []);

  const setVideo = useCallback((videoId: string, timestamp?: number) => {
    playerRef.current?.setVideo(videoId, timestamp);
  }, []);

  const setChannel = useCallback((channel: string) => {
    playerRef.current?.setChannel(channel);
  }, []);

  const setCollection = useCallback((collectionId: string, videoId: string) => {
    playerRef.current?.setCollection(collectionId, videoId);
  }, []);

  return {
    containerRef,
    state,
    player: playerRef.current,
    play,
    pause,
    togglePlaybackState,
    setVolume,
    setVideo,
    setChannel,
    setCollection,
  };
}

export default useStreamPlayer;
