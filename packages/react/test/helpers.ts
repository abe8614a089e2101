import { vi } from "vitest";
import type { WebSurface } from "@embedkit/twitch-player-core";

export function createFakeSurface() {
  return {
    load: vi.fn<(html: string) => void>(),
    evaluate: vi.fn<(script: string) => void>(),
    destroy: vi.fn<() => void>(),
  } satisfies WebSurface;
}

export type FakeSurface = ReturnType<typeof createFakeSurface>;

/** Surface factory whose first call throws, as when the host cannot embed */
export function createSurfaceFailingOnce(surface: WebSurface, message = "no iframe support") {
  return vi
    .fn<(container: HTMLElement) => WebSurface>()
    .mockImplementationOnce(() => {
      throw new Error(message);
    })
    .mockImplementation(() => surface);
}
