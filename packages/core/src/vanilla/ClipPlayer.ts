/**
 * ClipPlayer - hosts Twitch's non-interactive clip iframe on a WebSurface.
 * There is no runtime control; every change is a reload.
 */

import { TypedEventEmitter } from "../core/EventEmitter";
import { generateClipPlayerHtml } from "../core/MarkupGenerator";
import {
  resolveClipPlayerConfig,
  validateClipPlayerConfig,
  type ConfigIssue,
} from "../core/PlayerConfig";
import type { WebSurface } from "../surfaces/WebSurface";
import type { ClipPlayerConfig } from "../types";

export interface ClipPlayerOptions {
  surface: WebSurface;
  /** Merged over DEFAULT_CLIP_PLAYER_CONFIG */
  config?: Partial<ClipPlayerConfig>;
  /** Render during construction (default: true) */
  autoRender?: boolean;
  debug?: boolean;
}

export interface ClipPlayerEvents {
  render: { html: string; config: ClipPlayerConfig; issues: ConfigIssue[] };
}

export class ClipPlayer extends TypedEventEmitter<ClipPlayerEvents> {
  private readonly surface: WebSurface;
  private readonly debug: boolean;
  private currentConfig: ClipPlayerConfig;
  private lastHtml: string | null = null;
  private destroyed = false;

  constructor(options: ClipPlayerOptions) {
    super();
    this.surface = options.surface;
    this.debug = options.debug ?? false;
    this.currentConfig = resolveClipPlayerConfig(options.config);

    if (options.autoRender !== false) {
      this.render();
    }
  }

  get config(): ClipPlayerConfig {
    return { ...this.currentConfig };
  }

  get html(): string | null {
    return this.lastHtml;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  configure(patch: Partial<ClipPlayerConfig>): string {
    this.assertUsable("configure");
    this.currentConfig = { ...this.currentConfig, ...patch };
    return this.render();
  }

  /** Replace the whole configuration (defaults re-applied) and reload */
  setConfig(config: Partial<ClipPlayerConfig>): string {
    this.assertUsable("setConfig");
    this.currentConfig = resolveClipPlayerConfig(config);
    return this.render();
  }

  /** Switch to another clip (reloads) */
  setClip(clip: string): string {
    return this.configure({ clip });
  }

  render(): string {
    this.assertUsable("render");
    const config = this.config;
    const issues = validateClipPlayerConfig(config);
    for (const issue of issues) {
      console.warn(`[ClipPlayer] ${issue.message}`);
    }

    const html = generateClipPlayerHtml(config);
    this.log(`Rendering clip ${config.clip || "(none)"}`);
    this.surface.load(html);
    this.lastHtml = html;
    this.emit("render", { html, config, issues });
    return html;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.surface.destroy();
    this.removeAllListeners();
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new Error(`Cannot perform ${operation} on destroyed ClipPlayer`);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[ClipPlayer] ${message}`);
    }
  }
}

export default ClipPlayer;
