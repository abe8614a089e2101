/**
 * Runtime commands for the full embedded player.
 *
 * Each command has two renderings:
 * - script text for a loaded document (`serializeCommand`), routed through
 *   the document's `performPlayerCommand` queue
 * - a direct call against a player handle (`applyCommand`)
 *
 * Arguments are passed through unchecked; the embedded player decides what
 * an out-of-range volume means.
 */

import type { EmbeddedPlayerHandle } from "../types";
import { formatScriptValue } from "./MarkupGenerator";

export type PlayerCommand =
  | { type: "play" }
  | { type: "pause" }
  | { type: "togglePlayback" }
  | { type: "setVolume"; volumeLevel: number }
  | { type: "setVideo"; videoId: string; timestamp: number }
  | { type: "setChannel"; channel: string }
  | { type: "setCollection"; collectionId: string; videoId: string };

export type PlayerCommandType = PlayerCommand["type"];

/** Name of the queue-or-run function the stream document declares */
export const PERFORM_COMMAND_FUNCTION = "performPlayerCommand";

function assertNever(value: never): never {
  throw new Error(`Unknown player command: ${JSON.stringify(value)}`);
}

/**
 * Statement(s) run against the document's `player` variable.
 */
export function commandBody(command: PlayerCommand): string {
  switch (command.type) {
    case "play":
      return "player.play();";
    case "pause":
      return "player.pause();";
    case "togglePlayback":
      return "if (player.isPaused()) { player.play(); } else { player.pause(); }";
    case "setVolume":
      return `player.setVolume(${command.volumeLevel});`;
    case "setVideo":
      return `player.setVideo(${formatScriptValue(command.videoId)}, ${command.timestamp});`;
    case "setChannel":
      return `player.setChannel(${formatScriptValue(command.channel)});`;
    case "setCollection":
      return `player.setCollection(${formatScriptValue(command.collectionId)}, ${formatScriptValue(command.videoId)});`;
    default:
      return assertNever(command);
  }
}

/**
 * Script snippet to evaluate in a loaded stream document.
 *
 * @example
 * serializeCommand({ type: "setVolume", volumeLevel: 0.5 });
 * // performPlayerCommand(function() { player.setVolume(0.5); })
 */
export function serializeCommand(command: PlayerCommand): string {
  return `${PERFORM_COMMAND_FUNCTION}(function() { ${commandBody(command)} })`;
}

/**
 * Run a command directly against an embedded player handle.
 */
export function applyCommand(handle: EmbeddedPlayerHandle, command: PlayerCommand): void {
  switch (command.type) {
    case "play":
      handle.play();
      return;
    case "pause":
      handle.pause();
      return;
    case "togglePlayback":
      if (handle.isPaused()) {
        handle.play();
      } else {
        handle.pause();
      }
      return;
    case "setVolume":
      handle.setVolume(command.volumeLevel);
      return;
    case "setVideo":
      handle.setVideo(command.videoId, command.timestamp);
      return;
    case "setChannel":
      handle.setChannel(command.channel);
      return;
    case "setCollection":
      handle.setCollection(command.collectionId, command.videoId);
      return;
    default:
      assertNever(command);
  }
}
