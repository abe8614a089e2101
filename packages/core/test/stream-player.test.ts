import { afterEach, describe, expect, it, vi } from "vitest";

import { generateStreamPlayerHtml } from "../src/core/MarkupGenerator";
import { resolveStreamPlayerConfig } from "../src/core/PlayerConfig";
import { StreamPlayer } from "../src/vanilla/StreamPlayer";
import { createRecordingSurface } from "./helpers/recording-surface";

describe("StreamPlayer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("renders the resolved config into the surface on construction", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "monstercat" } });

    const expected = generateStreamPlayerHtml(resolveStreamPlayerConfig({ channel: "monstercat" }));
    expect(surface.load).toHaveBeenCalledTimes(1);
    expect(surface.load).toHaveBeenCalledWith(expected);
    expect(player.html).toBe(expected);
  });

  it("waits for render() when autoRender is false", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a" }, autoRender: false });

    expect(surface.load).not.toHaveBeenCalled();
    expect(player.html).toBeNull();

    player.render();
    expect(surface.load).toHaveBeenCalledTimes(1);
  });

  it("configure merges the patch and reloads", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a" } });

    const html = player.configure({ theme: "light", muted: true });

    expect(player.config).toEqual({
      channel: "a",
      layout: "video",
      chatMode: "mobile",
      theme: "light",
      allowFullScreen: true,
      muted: true,
    });
    expect(surface.load).toHaveBeenCalledTimes(2);
    expect(surface.load).toHaveBeenLastCalledWith(html);
    expect(html).toContain('theme: "light",allowfullscreen: true,muted: true');
  });

  it("setConfig replaces the config instead of merging", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a", theme: "light" } });

    player.setConfig({ video: "v1" });

    expect(player.config).toEqual({
      video: "v1",
      layout: "video",
      chatMode: "mobile",
      theme: "dark",
      allowFullScreen: true,
    });
    expect(surface.load).toHaveBeenCalledTimes(2);
  });

  it("returns a copy of the config", () => {
    const player = new StreamPlayer({ surface: createRecordingSurface(), config: { channel: "a" } });
    const config = player.config;
    config.channel = "b";
    expect(player.config.channel).toBe("a");
  });

  it("evaluates serialized commands without reloading", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a" } });

    player.setVolume(0.2);
    player.pause();
    player.play();
    player.togglePlaybackState();
    player.setVideo("v9");
    player.setChannel("b");
    player.setCollection("c1", "v1");

    expect(surface.evaluate.mock.calls.map(([script]) => script)).toEqual([
      "performPlayerCommand(function() { player.setVolume(0.2); })",
      "performPlayerCommand(function() { player.pause(); })",
      "performPlayerCommand(function() { player.play(); })",
      "performPlayerCommand(function() { if (player.isPaused()) { player.play(); } else { player.pause(); } })",
      'performPlayerCommand(function() { player.setVideo("v9", 0); })',
      'performPlayerCommand(function() { player.setChannel("b"); })',
      'performPlayerCommand(function() { player.setCollection("c1", "v1"); })',
    ]);
    expect(surface.load).toHaveBeenCalledTimes(1);
    expect(player.config.channel).toBe("a");
  });

  it("emits render and command events", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, autoRender: false });
    const onRender = vi.fn();
    const onCommand = vi.fn();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    player.on("render", onRender);
    player.on("command", onCommand);

    player.configure({ video: "v1" });
    player.setVolume(1);

    expect(onRender).toHaveBeenCalledWith({
      html: player.html,
      config: player.config,
      issues: [],
    });
    expect(onCommand).toHaveBeenCalledWith({
      command: { type: "setVolume", volumeLevel: 1 },
      script: "performPlayerCommand(function() { player.setVolume(1); })",
    });
  });

  it("warns about config issues but still renders every token", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a", video: "b" } });

    expect(warnSpy).toHaveBeenCalledWith(
      "[StreamPlayer] Multiple content references set (channel, video)"
    );
    expect(player.html).toContain('channel: "a",video: "b",');
  });

  it("logs only in debug mode", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const quiet = new StreamPlayer({ surface: createRecordingSurface(), config: { channel: "a" } });
    quiet.play();
    expect(logSpy).not.toHaveBeenCalled();

    const loud = new StreamPlayer({
      surface: createRecordingSurface(),
      config: { channel: "a" },
      debug: true,
    });
    loud.play();
    expect(logSpy).toHaveBeenCalledWith(
      `[StreamPlayer] Rendering document (${loud.html?.length ?? 0} chars)`
    );
    expect(logSpy).toHaveBeenCalledWith("[StreamPlayer] Dispatching play");
  });

  it("destroy tears down the surface and rejects further use", () => {
    const surface = createRecordingSurface();
    const player = new StreamPlayer({ surface, config: { channel: "a" } });

    player.destroy();
    player.destroy();

    expect(surface.destroy).toHaveBeenCalledTimes(1);
    expect(player.isDestroyed).toBe(true);
    expect(() => player.play()).toThrow("Cannot perform play on destroyed StreamPlayer");
    expect(() => player.configure({ theme: "light" })).toThrow(
      "Cannot perform configure on destroyed StreamPlayer"
    );
  });
});
