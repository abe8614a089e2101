/**
 * useClipPlayer.ts
 *
 * React hook that wraps ClipPlayer. Clips have no runtime control, so the
 * hook only mounts the player and reloads it when the config changes.
 */

import { useState, useEffect, useRef, type RefObject } from 'react';
import {
  ClipPlayer,
  IframeSurface,
  generateClipPlayerHtml,
  resolveClipPlayerConfig,
  type ClipPlayerConfig,
  type ConfigIssue,
} from '@embedkit/twitch-player-core';
import type { PlayerHookOptions } from '../types';

export interface ClipPlayerState {
  html: string | null;
  issues: ConfigIssue[];
}

export interface UseClipPlayerReturn {
  containerRef: RefObject<HTMLDivElement>;
  state: ClipPlayerState;
  player: ClipPlayer | null;
}

const initialState: ClipPlayerState = {
  html: null,
  issues: [],
};

export function useClipPlayer(
  config: Partial<ClipPlayerConfig>,
  options: PlayerHookOptions = {}
): UseClipPlayerReturn {
  const { enabled = true, debug = false, createSurface, onRender } = options;

  const containerRef = useRef<HTMLDivElement>(null);
  const playerRef = useRef<ClipPlayer | null>(null);
  const renderedHtmlRef = useRef<string | null>(null);
  const [state, setState] = useState<ClipPlayerState>(initialState);

  const configRef = useRef(config);
  configRef.current = config;
  const callbacksRef = useRef({ createSurface, onRender });
  callbacksRef.current = { createSurface, onRender };

  // The fragment is small enough to serve as its own change key
  const html = generateClipPlayerHtml(resolveClipPlayerConfig(config));

  useEffect(() => {
    if (!enabled) return;

    const container = containerRef.current;
    if (!container) return;

    const surface =
      callbacksRef.current.createSurface?.(container) ??
      new IframeSurface(container, { title: 'Twitch clip', debug });
    const player = new ClipPlayer({
      surface,
      config: configRef.current,
      autoRender: false,
      debug,
    });
    playerRef.current = player;

    const unsubscribe = player.on('render', ({ html: rendered, issues }) => {
      renderedHtmlRef.current = rendered;
      setState({ html: rendered, issues });
      callbacksRef.current.onRender?.(rendered);
    });

    player.render();

    return () => {
      unsubscribe();
      player.destroy();
      playerRef.current = null;
      renderedHtmlRef.current = null;
      setState(initialState);
    };
  }, [enabled, debug]);

  useEffect(() => {
    const player = playerRef.current;
    if (!player || renderedHtmlRef.current === html) return;
    player.setConfig(configRef.current);
  }, [html]);

  return {
    containerRef,
    state,
    player: playerRef.current,
  };
}

export default useClipPlayer;
