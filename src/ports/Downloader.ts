import type { WorkItem } from "../core/items/workItem";

export interface Downloader {
  /** Returns a local path the conversion backends can read. */
  download(item: WorkItem, signal?: AbortSignal): Promise<string>;
}
