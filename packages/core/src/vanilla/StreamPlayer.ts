/**
 * StreamPlayer - hosts a full Twitch player (channel, video or collection)
 * on a WebSurface.
 *
 * Configuration changes go through configure(), which regenerates the
 * document and reloads the surface. Runtime operations (play, pause,
 * volume, switching content) are sent as scripts to the loaded document and
 * never reload it. They also leave the stored configuration untouched, so
 * the next configure() starts from the configured content again.
 *
 * @example
 * ```typescript
 * const player = new StreamPlayer({
 *   surface: new IframeSurface(container),
 *   config: { channel: 'monstercat' },
 * });
 *
 * player.setVolume(0.5);          // queued until the embed is ready
 * player.configure({ theme: 'light' }); // full reload, queue dropped
 * ```
 */

import { TypedEventEmitter } from "../core/EventEmitter";
import { generateStreamPlayerHtml } from "../core/MarkupGenerator";
import {
  resolveStreamPlayerConfig,
  validateStreamPlayerConfig,
  type ConfigIssue,
} from "../core/PlayerConfig";
import { serializeCommand, type PlayerCommand } from "../core/PlayerCommands";
import type { WebSurface } from "../surfaces/WebSurface";
import type { StreamPlayerConfig } from "../types";

export interface StreamPlayerOptions {
  surface: WebSurface;
  /** Merged over DEFAULT_STREAM_PLAYER_CONFIG */
  config?: StreamPlayerConfig;
  /** Render during construction (default: true) */
  autoRender?: boolean;
  debug?: boolean;
}

export interface StreamPlayerEvents {
  render: { html: string; config: StreamPlayerConfig; issues: ConfigIssue[] };
  command: { command: PlayerCommand; script: string };
}

export class StreamPlayer extends TypedEventEmitter<StreamPlayerEvents> {
  private readonly surface: WebSurface;
  private readonly debug: boolean;
  private currentConfig: StreamPlayerConfig;
  private lastHtml: string | null = null;
  private destroyed = false;

  constructor(options: StreamPlayerOptions) {
    super();
    this.surface = options.surface;
    this.debug = options.debug ?? false;
    this.currentConfig = resolveStreamPlayerConfig(options.config);

    if (options.autoRender !== false) {
      this.render();
    }
  }

  get config(): StreamPlayerConfig {
    return { ...this.currentConfig };
  }

  /** Last document loaded into the surface, null before the first render */
  get html(): string | null {
    return this.lastHtml;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Merge `patch` into the configuration and reload the surface.
   * @returns the newly loaded document
   */
  configure(patch: StreamPlayerConfig): string {
    this.assertUsable("configure");
    this.currentConfig = { ...this.currentConfig, ...patch };
    return this.render();
  }

  /**
   * Replace the whole configuration (defaults re-applied) and reload.
   * @returns the newly loaded document
   */
  setConfig(config: StreamPlayerConfig): string {
    this.assertUsable("setConfig");
    this.currentConfig = resolveStreamPlayerConfig(config);
    return this.render();
  }

  /**
   * Generate the document for the current configuration and load it.
   * Anything the previous document had queued is lost.
   */
  render(): string {
    this.assertUsable("render");
    const config = this.config;
    const issues = validateStreamPlayerConfig(config);
    for (const issue of issues) {
      console.warn(`[StreamPlayer] ${issue.message}`);
    }

    const html = generateStreamPlayerHtml(config);
    this.log(`Rendering document (${html.length} chars)`);
    this.surface.load(html);
    this.lastHtml = html;
    this.emit("render", { html, config, issues });
    return html;
  }

  // ==========================================================================
  // Runtime commands
  // ==========================================================================

  play(): void {
    this.send({ type: "play" });
  }

  pause(): void {
    this.send({ type: "pause" });
  }

  /** Play when paused, pause when playing */
  togglePlaybackState(): void {
    this.send({ type: "togglePlayback" });
  }

  /** 0 is muted, 1 is maximum. Not clamped. */
  setVolume(volumeLevel: number): void {
    this.send({ type: "setVolume", volumeLevel });
  }

  setVideo(videoId: string, timestamp: number = 0): void {
    this.send({ type: "setVideo", videoId, timestamp });
  }

  setChannel(channel: string): void {
    this.send({ type: "setChannel", channel });
  }

  setCollection(collectionId: string, videoId: string): void {
    this.send({ type: "setCollection", collectionId, videoId });
  }

  send(command: PlayerCommand): void {
    this.assertUsable(command.type);
    const script = serializeCommand(command);
    this.log(`Dispatching ${command.type}`);
    this.surface.evaluate(script);
    this.emit("command", { command, script });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.surface.destroy();
    this.removeAllListeners();
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new Error(`Cannot perform ${operation} on destroyed StreamPlayer`);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[StreamPlayer] ${message}`);
    }
  }
}

export default StreamPlayer;
