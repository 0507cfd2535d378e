import type { ImageFetcher } from "../jobs/types.ts";

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/** Fetches camera snapshots over HTTP(S) with the global fetch. */
export class HttpImageFetcher implements ImageFetcher {
  constructor(private readonly timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const forward = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forward, { once: true });

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} from ${url}`);
      }
      return new Uint8Array(await response.arrayBuffer());
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }
}
