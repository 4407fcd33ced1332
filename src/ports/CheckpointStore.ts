export interface CheckpointStore {
  loadCompleted(runId: string): Promise<Set<string>>;
  recordCompleted(runId: string, itemId: string): Promise<void>;
  recordCompletedMany(runId: string, itemIds: Iterable<string>): Promise<void>;
  clear(runId: string): Promise<void>;
  listRuns(): Promise<string[]>;
}
