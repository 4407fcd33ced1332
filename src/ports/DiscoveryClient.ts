import type { WorkItem } from "../core/items/workItem";

export interface DiscoveryClient {
  discover(query: string): Promise<WorkItem[]>;
}
