/**
 * A web rendering surface the players draw into.
 *
 * Browsers use {@link IframeSurface}. Other hosts (a mobile web view, a
 * desktop shell) implement this with their own "load HTML string" and
 * "evaluate script" calls. Documents must be loaded against a blank base
 * URL, never the host page's; the templates only reference absolute URLs.
 */
export interface WebSurface {
  /** Replace the current document. Runtime state of the old one is lost. */
  load(html: string): void;
  /** Evaluate a script snippet in the current document. */
  evaluate(script: string): void;
  destroy(): void;
}
