// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";

import { BLANK_BASE_ELEMENT, IframeSurface } from "../src/surfaces/IframeSurface";

function fireLoad(surface: IframeSurface): void {
  surface.iframe.dispatchEvent(new Event("load"));
}

describe("IframeSurface", () => {
  afterEach(() => {
    document.body.innerHTML = "";
    vi.restoreAllMocks();
  });

  it("mounts a configured iframe in the container", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);

    const surface = new IframeSurface(container);

    expect(container.firstElementChild).toBe(surface.iframe);
    expect(surface.iframe.title).toBe("Twitch player");
    expect(surface.iframe.getAttribute("allow")).toBe("autoplay; fullscreen");
    expect(surface.iframe.getAttribute("scrolling")).toBe("no");
    expect(surface.iframe.style.width).toBe("100%");
  });

  it("takes title and permissions from options", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);

    const surface = new IframeSurface(container, { title: "Clip", allow: "fullscreen" });

    expect(surface.iframe.title).toBe("Clip");
    expect(surface.iframe.getAttribute("allow")).toBe("fullscreen");
  });

  it("loads documents through srcdoc", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const surface = new IframeSurface(container);

    surface.load("<p>first</p>");

    expect(surface.iframe.srcdoc).toBe('<base href="about:blank"><p>first</p>');
  });

  it("pins every loaded document to a blank base URL", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const surface = new IframeSurface(container);

    surface.load('<a href="/videos">videos</a>');
    expect(surface.iframe.srcdoc.startsWith(BLANK_BASE_ELEMENT)).toBe(true);

    surface.load("<p>second</p>");
    expect(surface.iframe.srcdoc).toBe(`${BLANK_BASE_ELEMENT}<p>second</p>`);
  });

  it("holds scripts until the loaded document fires load", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const surface = new IframeSurface(container);

    surface.load("<p>doc</p>");
    surface.evaluate("void 0;");
    expect(surface.pendingScripts).toBe(1);

    fireLoad(surface);

    expect(surface.pendingScripts).toBe(0);
    const injected = surface.iframe.contentDocument?.querySelector("script");
    expect(injected?.text).toBe("void 0;");
  });

  it("ignores load events before any document was loaded", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const surface = new IframeSurface(container);

    surface.evaluate("void 0;");
    fireLoad(surface);

    expect(surface.pendingScripts).toBe(1);
  });

  it("drops scripts queued for the previous document", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const surface = new IframeSurface(container, { debug: true });

    surface.load("<p>one</p>");
    surface.evaluate("void 1;");
    surface.evaluate("void 2;");
    surface.load("<p>two</p>");

    expect(surface.pendingScripts).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(
      "[IframeSurface] Dropped 2 script(s) queued for the previous document"
    );
  });

  it("destroy removes the iframe and rejects further loads", () => {
    const container = document.createElement("div");
    document.body.appendChild(container);
    const surface = new IframeSurface(container);

    surface.destroy();

    expect(surface.disposed).toBe(true);
    expect(container.childElementCount).toBe(0);
    expect(() => surface.load("<p>x</p>")).toThrow("Cannot perform load on disposed object");
    expect(() => surface.evaluate("void 0;")).toThrow(
      "Cannot perform evaluate on disposed object"
    );
  });
});
