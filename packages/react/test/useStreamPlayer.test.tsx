import { describe, it, expect, vi } from "vitest";
import { render, act } from "@testing-library/react";
import { ConfigIssueCode, type StreamPlayerConfig } from "@embedkit/twitch-player-core";
import {
  useStreamPlayer,
  type UseStreamPlayerOptions,
  type UseStreamPlayerReturn,
} from "../src/hooks/useStreamPlayer";
import { createFakeSurface } from "./helpers";

interface HarnessProps {
  config: StreamPlayerConfig;
  options: UseStreamPlayerOptions;
  onHook: (hook: UseStreamPlayerReturn) => void;
}

interface HookBox {
  current: UseStreamPlayerReturn | null;
}

function Harness({ config, options, onHook }: HarnessProps) {
  const hook = useStreamPlayer(config, options);
  onHook(hook);
  return <div ref={hook.containerRef} />;
}

describe("useStreamPlayer", () => {
  it("tracks the rendered document and its issues", () => {
    const surface = createFakeSurface();
    const latest: HookBox = { current: null };
    const onHook = (hook: UseStreamPlayerReturn) => {
      latest.current = hook;
    };
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const { rerender } = render(
      <Harness config={{}} options={{ createSurface: () => surface }} onHook={onHook} />
    );

    expect(latest.current?.state.html).toBe(surface.load.mock.calls[0][0]);
    expect(latest.current?.state.issues.map((issue) => issue.code)).toEqual([
      ConfigIssueCode.MISSING_CONTENT_REFERENCE,
    ]);

    rerender(
      <Harness
        config={{ channel: "monstercat" }}
        options={{ createSurface: () => surface }}
        onHook={onHook}
      />
    );

    expect(latest.current?.state.issues).toEqual([]);
    expect(latest.current?.state.html).toBe(surface.load.mock.calls[1][0]);
  });

  it("calls onRender with every loaded document", () => {
    const onRender = vi.fn();
    const surface = createFakeSurface();

    const { rerender } = render(
      <Harness
        config={{ channel: "a" }}
        options={{ createSurface: () => surface, onRender }}
        onHook={() => {}}
      />
    );
    rerender(
      <Harness
        config={{ channel: "b" }}
        options={{ createSurface: () => surface, onRender }}
        onHook={() => {}}
      />
    );

    expect(onRender.mock.calls).toEqual([
      [surface.load.mock.calls[0][0]],
      [surface.load.mock.calls[1][0]],
    ]);
  });

  it("keeps action callbacks stable across renders", () => {
    const seen: UseStreamPlayerReturn[] = [];
    const onHook = (hook: UseStreamPlayerReturn) => {
      seen.push(hook);
    };
    const options = { createSurface: createFakeSurface };

    const { rerender } = render(<Harness config={{ channel: "a" }} options={options} onHook={onHook} />);
    rerender(<Harness config={{ channel: "b" }} options={options} onHook={onHook} />);

    const first = seen[0];
    const last = seen[seen.length - 1];
    expect(last.play).toBe(first.play);
    expect(last.setVolume).toBe(first.setVolume);
  });

  it("ignores commands once unmounted", () => {
    const surface = createFakeSurface();
    const latest: HookBox = { current: null };

    const { unmount } = render(
      <Harness
        config={{ channel: "a" }}
        options={{ createSurface: () => surface }}
        onHook={(hook) => {
          latest.current = hook;
        }}
      />
    );
    const hook = latest.current;
    unmount();

    act(() => {
      hook?.play();
    });
    expect(surface.evaluate).not.toHaveBeenCalled();
  });
});
