/**
 * @embedkit/twitch-player-core
 *
 * Framework-agnostic core for embedding Twitch players.
 * This package provides:
 * - Player configuration defaults and validation
 * - Markup generation for the full player and the clip iframe
 * - A command bridge for runtime control once the embed is ready
 * - Surfaces to load the generated documents into
 * - Vanilla StreamPlayer / ClipPlayer / InlineStreamPlayer
 */

// Types
export type {
  PlayerLayout,
  PlayerTheme,
  ChatDisplayMode,
  ChatFontSize,
  PreloadSetting,
  ScrollingValue,
  StreamPlayerConfig,
  ClipPlayerConfig,
  EmbedValue,
  EmbedEntry,
  ContentReferenceKind,
  EmbeddedPlayerHandle,
} from "./types";

// Keys and URLs
export { EMBED_KEYS, TWITCH_EMBED_SCRIPT_URL, TWITCH_CLIP_EMBED_URL } from "./core/EmbedKeys";
export type { EmbedKey } from "./core/EmbedKeys";

// Configuration
export {
  DEFAULT_STREAM_PLAYER_CONFIG,
  DEFAULT_CLIP_PLAYER_CONFIG,
  resolveStreamPlayerConfig,
  resolveClipPlayerConfig,
  getContentReferences,
  validateStreamPlayerConfig,
  validateClipPlayerConfig,
  ConfigIssueCode,
} from "./core/PlayerConfig";
export type { ConfigIssue } from "./core/PlayerConfig";

// Markup generation
export {
  generateStreamPlayerHtml,
  generateClipPlayerHtml,
  buildStreamPlayerEntries,
  buildClipPlayerEntries,
  buildStreamPlayerTokens,
  buildClipPlayerTokens,
  buildStreamEmbedOptions,
  formatScriptKey,
  formatScriptValue,
  formatScriptParameter,
  formatHtmlParameter,
  escapeHtmlAttribute,
  toScrollingValue,
  SCRIPT_PARAMETER_DELIMITER,
  HTML_PARAMETER_DELIMITER,
} from "./core/MarkupGenerator";
export {
  STREAM_PLAYER_TEMPLATE,
  CLIP_PLAYER_TEMPLATE,
  INITIALIZATION_PLACEHOLDER,
  CLIP_PLACEHOLDER,
} from "./core/templates";

// Commands
export {
  serializeCommand,
  commandBody,
  applyCommand,
  PERFORM_COMMAND_FUNCTION,
} from "./core/PlayerCommands";
export type { PlayerCommand, PlayerCommandType } from "./core/PlayerCommands";
export { CommandBridge } from "./core/CommandBridge";
export type { BridgeState, PendingCommand, CommandBridgeEvents } from "./core/CommandBridge";

// Embed script
export { loadTwitchEmbedScript } from "./core/EmbedScriptLoader";
export type {
  TwitchNamespace,
  TwitchEmbedConstructor,
  TwitchEmbedInstance,
} from "./core/TwitchEmbedApi";

// Utilities
export { TypedEventEmitter, TypedEventEmitter as EventEmitter } from "./core/EventEmitter";
export { BaseDisposable } from "./core/Disposable";
export type { Disposable } from "./core/Disposable";
export { ContentCycler } from "./core/ContentCycler";

// Surfaces
export type { WebSurface } from "./surfaces/WebSurface";
export { IframeSurface, BLANK_BASE_ELEMENT } from "./surfaces/IframeSurface";
export type { IframeSurfaceOptions } from "./surfaces/IframeSurface";

// Players
export { StreamPlayer } from "./vanilla/StreamPlayer";
export type { StreamPlayerOptions, StreamPlayerEvents } from "./vanilla/StreamPlayer";
export { ClipPlayer } from "./vanilla/ClipPlayer";
export type { ClipPlayerOptions, ClipPlayerEvents } from "./vanilla/ClipPlayer";
export { InlineStreamPlayer } from "./vanilla/InlineStreamPlayer";
export type {
  InlineStreamPlayerOptions,
  InlineStreamPlayerEvents,
} from "./vanilla/InlineStreamPlayer";
