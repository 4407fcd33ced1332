import path from "path";
import { fileURLToPath } from "url";
import type { WorkItem } from "../../core/items/workItem";
import type { Downloader } from "../../ports/Downloader";
import { DownloadError, toErrorMessage } from "../../shared/errors/pipeline.errors";
import { fileExists, writeFileAtomic } from "../../shared/fs/atomicWrite";
import { sha256 } from "../../shared/hash/cacheKey";

const extensionFor = (url: URL, contentType: string | null): string => {
  const fromPath = path.extname(url.pathname).toLowerCase();
  if (/^\.[a-z0-9]{1,5}$/.test(fromPath)) return fromPath;
  if (contentType?.includes("pdf")) return ".pdf";
  if (contentType?.includes("html")) return ".html";
  return ".txt";
};

/**
 * Fetches http(s) sources into `<downloadDir>/<sha256(url)><ext>`. Local paths
 * and file:// URLs are returned as they are.
 */
export class HttpDownloader implements Downloader {
  constructor(
    private readonly downloadDir: string,
    private readonly timeoutMs = 30000
  ) {}

  async download(item: WorkItem, signal?: AbortSignal): Promise<string> {
    const location = item.sourceLocation;
    if (location.startsWith("file://")) return fileURLToPath(location);
    if (!/^https?:\/\//i.test(location)) return location;

    const url = new URL(location);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const res = await fetch(url, { signal: controller.signal });
      if (!res.ok) {
        await res.body?.cancel();
        const message = `Download of ${url.origin}${url.pathname} failed: ${res.status}`;
        throw new DownloadError(message, { retryable: res.status === 429 || res.status >= 500, status: res.status });
      }

      const target = path.join(
        this.downloadDir,
        `${sha256(location)}${extensionFor(url, res.headers.get("content-type"))}`
      );
      if (await fileExists(target)) {
        await res.body?.cancel();
        return target;
      }
      await writeFileAtomic(target, new Uint8Array(await res.arrayBuffer()));
      return target;
    } catch (err) {
      if (err instanceof DownloadError) throw err;
      if (controller.signal.aborted && !signal?.aborted) {
        throw new DownloadError(`Download of ${url.origin}${url.pathname} timed out after ${this.timeoutMs}ms`, {
          retryable: true
        });
      }
      throw new DownloadError(`Download of ${url.origin}${url.pathname} failed: ${toErrorMessage(err)}`, {
        retryable: true,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
