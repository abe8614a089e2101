/**
 * Loads Twitch's embed script into a document once per URL.
 */

import { TWITCH_EMBED_SCRIPT_URL } from "./EmbedKeys";
import type { TwitchNamespace } from "./TwitchEmbedApi";

/** In-flight loads, per document and then per script URL */
const pendingLoads = new WeakMap<Document, Map<string, Promise<TwitchNamespace>>>();

function pendingLoadsFor(doc: Document): Map<string, Promise<TwitchNamespace>> {
  let loads = pendingLoads.get(doc);
  if (!loads) {
    loads = new Map();
    pendingLoads.set(doc, loads);
  }
  return loads;
}

function resolveNamespace(doc: Document): TwitchNamespace | undefined {
  return doc.defaultView?.Twitch;
}

/**
 * Resolve the `Twitch` namespace, appending the embed script to `<head>` if
 * `doc` does not have it yet. Concurrent calls for the same document share
 * one `<script>`; another document gets its own.
 * A failed load is forgotten so a later call can try again.
 */
export function loadTwitchEmbedScript(
  url: string = TWITCH_EMBED_SCRIPT_URL,
  doc: Document = document
): Promise<TwitchNamespace> {
  const existing = resolveNamespace(doc);
  if (existing) return Promise.resolve(existing);

  const loads = pendingLoadsFor(doc);
  const pending = loads.get(url);
  if (pending) return pending;

  const load = new Promise<TwitchNamespace>((resolve, reject) => {
    const script = doc.createElement("script");
    script.src = url;
    script.async = true;
    script.onload = () => {
      const namespace = resolveNamespace(doc);
      if (namespace) {
        resolve(namespace);
      } else {
        loads.delete(url);
        reject(new Error(`Twitch embed script from ${url} did not define Twitch.Embed`));
      }
    };
    script.onerror = () => {
      loads.delete(url);
      reject(new Error(`Failed to load Twitch embed script from ${url}`));
    };
    doc.head.appendChild(script);
  });

  loads.set(url, load);
  return load;
}
