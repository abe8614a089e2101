import { describe, expect, it, vi } from "vitest";

import { TypedEventEmitter } from "../src/core/EventEmitter";

interface SurfaceEvents {
  render: { html: string };
  command: string;
}

class TestEmitter extends TypedEventEmitter<SurfaceEvents> {
  emitPublic<K extends keyof SurfaceEvents>(event: K, data: SurfaceEvents[K]) {
    this.emit(event, data);
  }
}

describe("TypedEventEmitter", () => {
  it("on returns an unsubscribe function", () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();

    const unsub = emitter.on("render", listener);
    emitter.emitPublic("render", { html: "<p>a</p>" });
    expect(listener).toHaveBeenCalledWith({ html: "<p>a</p>" });

    unsub();
    emitter.emitPublic("render", { html: "<p>b</p>" });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("off detaches only the given listener", () => {
    const emitter = new TestEmitter();
    const kept = vi.fn();
    const removed = vi.fn();

    emitter.on("command", kept);
    emitter.on("command", removed);
    emitter.off("command", removed);
    emitter.emitPublic("command", "play");

    expect(kept).toHaveBeenCalledTimes(1);
    expect(removed).not.toHaveBeenCalled();
  });

  it("keeps notifying after a listener throws", () => {
    const emitter = new TestEmitter();
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const after = vi.fn();

    emitter.on("command", () => {
      throw new Error("listener failed");
    });
    emitter.on("command", after);
    emitter.emitPublic("command", "pause");

    expect(after).toHaveBeenCalledWith("pause");
    expect(errorSpy).toHaveBeenCalledWith(
      "[EventEmitter] Error in command listener:",
      expect.any(Error)
    );
    errorSpy.mockRestore();
  });

  it("removeAllListeners detaches every event", () => {
    const emitter = new TestEmitter();
    const onRender = vi.fn();
    const onCommand = vi.fn();
    emitter.on("render", onRender);
    emitter.on("command", onCommand);

    emitter.removeAllListeners();
    emitter.emitPublic("render", { html: "<p>c</p>" });
    emitter.emitPublic("command", "play");

    expect(onRender).not.toHaveBeenCalled();
    expect(onCommand).not.toHaveBeenCalled();
  });

  it("on after removeAllListeners subscribes again", () => {
    const emitter = new TestEmitter();
    emitter.removeAllListeners();
    const listener = vi.fn();

    emitter.on("command", listener);
    emitter.emitPublic("command", "pause");

    expect(listener).toHaveBeenCalledWith("pause");
  });
});
