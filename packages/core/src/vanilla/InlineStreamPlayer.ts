/**
 * InlineStreamPlayer - full Twitch player embedded straight into the host
 * page, without a generated document or iframe.
 *
 * The embed script is loaded once, `Twitch.Embed` is constructed on a
 * mount element with the same ordered options the document generator uses,
 * and runtime commands go through a CommandBridge whose ready signal is the
 * embed's VIDEO_READY event. configure() rebuilds the embed with a fresh
 * bridge; commands still queued on the old one are dropped.
 */

import { CommandBridge } from "../core/CommandBridge";
import { loadTwitchEmbedScript } from "../core/EmbedScriptLoader";
import { TWITCH_EMBED_SCRIPT_URL } from "../core/EmbedKeys";
import { TypedEventEmitter } from "../core/EventEmitter";
import { buildStreamEmbedOptions } from "../core/MarkupGenerator";
import { resolveStreamPlayerConfig, validateStreamPlayerConfig } from "../core/PlayerConfig";
import { applyCommand, type PlayerCommand } from "../core/PlayerCommands";
import type { TwitchNamespace } from "../core/TwitchEmbedApi";
import type { EmbeddedPlayerHandle, StreamPlayerConfig } from "../types";

export interface InlineStreamPlayerOptions {
  /** DOM element or CSS selector to mount the player in */
  target: HTMLElement | string;
  /** Merged over DEFAULT_STREAM_PLAYER_CONFIG */
  config?: StreamPlayerConfig;
  width?: string;
  height?: string;
  /** Override the embed script URL */
  scriptUrl?: string;
  debug?: boolean;
}

export interface InlineStreamPlayerEvents {
  embed: { config: StreamPlayerConfig };
  ready: { drained: number };
  command: { command: PlayerCommand; queued: boolean };
}

let mountCounter = 0;

function resolveTarget(target: HTMLElement | string): HTMLElement {
  if (typeof target !== "string") return target;
  const element = document.querySelector<HTMLElement>(target);
  if (!element) {
    throw new Error(`[InlineStreamPlayer] Target not found: ${target}`);
  }
  return element;
}

export class InlineStreamPlayer extends TypedEventEmitter<InlineStreamPlayerEvents> {
  private readonly container: HTMLElement;
  private readonly width: string;
  private readonly height: string;
  private readonly scriptUrl: string;
  private readonly debug: boolean;
  private currentConfig: StreamPlayerConfig;
  private bridge = new CommandBridge<EmbeddedPlayerHandle>();
  private twitch: TwitchNamespace | null = null;
  private mount: HTMLDivElement | null = null;
  private destroyed = false;

  constructor(options: InlineStreamPlayerOptions) {
    super();
    this.container = resolveTarget(options.target);
    this.width = options.width ?? "100%";
    this.height = options.height ?? "100%";
    this.scriptUrl = options.scriptUrl ?? TWITCH_EMBED_SCRIPT_URL;
    this.debug = options.debug ?? false;
    this.currentConfig = resolveStreamPlayerConfig(options.config);
  }

  get config(): StreamPlayerConfig {
    return { ...this.currentConfig };
  }

  get isReady(): boolean {
    return this.bridge.isReady;
  }

  /** Commands waiting for the current embed to become ready */
  get pendingCommands(): number {
    return this.bridge.pendingCount;
  }

  /**
   * Load the embed script (if needed) and build the embed. Later calls are
   * no-ops. Commands sent before this resolves are queued.
   */
  async attach(): Promise<void> {
    this.assertUsable("attach");
    if (this.twitch) return;
    const twitch = await loadTwitchEmbedScript(this.scriptUrl, this.container.ownerDocument);
    if (this.destroyed || this.twitch) return;
    this.twitch = twitch;
    this.build(twitch);
  }

  /**
   * Merge `patch` into the configuration and rebuild the embed.
   * Before attach() resolves only the configuration changes.
   */
  configure(patch: StreamPlayerConfig): void {
    this.assertUsable("configure");
    this.currentConfig = { ...this.currentConfig, ...patch };
    if (this.twitch) {
      this.teardown();
      this.build(this.twitch);
    }
  }

  play(): void {
    this.send({ type: "play" });
  }

  pause(): void {
    this.send({ type: "pause" });
  }

  togglePlaybackState(): void {
    this.send({ type: "togglePlayback" });
  }

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
    const ranNow = this.bridge.dispatch((handle) => applyCommand(handle, command));
    this.log(`${command.type} ${ranNow ? "executed" : "queued"}`);
    this.emit("command", { command, queued: !ranNow });
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.teardown();
    this.twitch = null;
    this.removeAllListeners();
  }

  private build(twitch: TwitchNamespace): void {
    const config = this.config;
    for (const issue of validateStreamPlayerConfig(config)) {
      console.warn(`[InlineStreamPlayer] ${issue.message}`);
    }

    const doc = this.container.ownerDocument;
    const mount = doc.createElement("div");
    mount.id = `twitch-embed-${++mountCounter}`;
    mount.style.width = "100%";
    mount.style.height = "100%";
    this.container.appendChild(mount);
    this.mount = mount;

    const bridge = this.bridge;
    bridge.on("ready", ({ drained }) => {
      this.log(`Embed ready, drained ${drained} queued command(s)`);
      this.emit("ready", { drained });
    });

    const embed = new twitch.Embed(
      mount.id,
      buildStreamEmbedOptions(config, { width: this.width, height: this.height })
    );
    embed.addEventListener(twitch.Embed.VIDEO_READY, () => {
      bridge.signalReady(embed.getPlayer());
    });

    this.log(`Embed created in #${mount.id}`);
    this.emit("embed", { config });
  }

  private teardown(): void {
    const dropped = this.bridge.clear();
    if (dropped > 0) {
      this.log(`Dropped ${dropped} queued command(s)`);
    }
    this.bridge.removeAllListeners();
    this.bridge = new CommandBridge<EmbeddedPlayerHandle>();
    this.mount?.remove();
    this.mount = null;
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new Error(`Cannot perform ${operation} on destroyed InlineStreamPlayer`);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[InlineStreamPlayer] ${message}`);
    }
  }
}

export default InlineStreamPlayer;
