import path from "node:path";
import os from "node:os";

export function getDataPath(): string {
  return path.join(os.homedir(), ".cronrelay");
}

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 * An already-aborted signal resolves `false` without arming a timer.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function formatTime(ms: number | null): string {
  if (ms == null) return "never";
  return new Date(ms).toISOString();
}

export function preview(text: string, max = 80): string {
  return text.length > max ? text.slice(0, max) + "…" : text;
}

export function splitMessage(content: string, maxLen = 4000): string[] {
  if (content.length <= maxLen) return [content];
  const chunks: string[] = [];
  let rest = content;
  while (rest.length > maxLen) {
    const cut = rest.slice(0, maxLen);
    let idx = Math.max(cut.lastIndexOf("\n"), cut.lastIndexOf(" "));
    if (idx <= 0) idx = maxLen;
    chunks.push(rest.slice(0, idx));
    rest = rest.slice(idx).trimStart();
  }
  if (rest) chunks.push(rest);
  return chunks;
}
