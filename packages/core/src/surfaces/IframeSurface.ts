/**
 * IframeSurface - WebSurface backed by an `<iframe srcdoc>`.
 *
 * Documents are written to `srcdoc` behind a `<base href="about:blank">`,
 * so they have no usable base URL.
 *
 * `srcdoc` documents load asynchronously, so scripts evaluated before the
 * iframe fires `load` wait in a CommandBridge keyed to that document. Each
 * `load()` starts a new bridge; scripts still waiting for the previous
 * document are dropped.
 */

import { CommandBridge } from "../core/CommandBridge";
import { BaseDisposable } from "../core/Disposable";
import type { WebSurface } from "./WebSurface";

export interface IframeSurfaceOptions {
  /** Accessible title of the iframe */
  title?: string;
  /** Permissions policy for the iframe */
  allow?: string;
  debug?: boolean;
}

/**
 * Prepended to every document. A srcdoc document otherwise inherits the
 * host page's base URL; against about:blank relative URLs do not resolve.
 */
export const BLANK_BASE_ELEMENT = '<base href="about:blank">';

function injectScript(doc: Document, script: string): void {
  const element = doc.createElement("script");
  element.text = script;
  (doc.body ?? doc.documentElement).appendChild(element);
}

export class IframeSurface extends BaseDisposable implements WebSurface {
  readonly iframe: HTMLIFrameElement;
  private bridge = new CommandBridge<Document>();
  private readonly debug: boolean;

  private readonly handleLoad = (): void => {
    // Ignore the initial about:blank load
    if (!this.iframe.srcdoc) return;
    const doc = this.iframe.contentDocument;
    if (!doc) return;
    this.bridge.signalReady(doc);
  };

  constructor(container: HTMLElement, options: IframeSurfaceOptions = {}) {
    super();
    this.debug = options.debug ?? false;

    const iframe = container.ownerDocument.createElement("iframe");
    iframe.title = options.title ?? "Twitch player";
    iframe.setAttribute("allow", options.allow ?? "autoplay; fullscreen");
    iframe.setAttribute("allowfullscreen", "");
    iframe.setAttribute("scrolling", "no");
    iframe.style.width = "100%";
    iframe.style.height = "100%";
    iframe.style.border = "0";
    iframe.style.display = "block";
    iframe.style.background = "transparent";
    container.appendChild(iframe);
    iframe.addEventListener("load", this.handleLoad);

    this.iframe = iframe;
  }

  /** Scripts waiting for the current document to finish loading */
  get pendingScripts(): number {
    return this.bridge.pendingCount;
  }

  load(html: string): void {
    this.throwIfDisposed("load");
    const dropped = this.bridge.clear();
    if (dropped > 0) {
      this.log(`Dropped ${dropped} script(s) queued for the previous document`);
    }
    this.bridge = new CommandBridge<Document>();
    this.iframe.srcdoc = BLANK_BASE_ELEMENT + html;
  }

  evaluate(script: string): void {
    this.throwIfDisposed("evaluate");
    this.bridge.dispatch((doc) => injectScript(doc, script));
  }

  destroy(): void {
    this.dispose();
  }

  protected onDispose(): void {
    this.iframe.removeEventListener("load", this.handleLoad);
    this.bridge.clear();
    this.iframe.remove();
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[IframeSurface] ${message}`);
    }
  }
}

export default IframeSurface;
