import type { Post, ReadOptions, Target, WriteOutcome } from "./models";

export interface TargetRecord {
  key: string;
  kind: Target["kind"];
  label: string;
  firstCollectedAt: Date;
  lastCollectedAt: Date;
  newestPostId: string | null;
  oldestPostId: string | null;
}

/**
 * Durable, idempotent post store keyed by post id.
 *
 * Every write is its own atomic unit; callers never need to roll anything back.
 */
export interface PostStore {
  has(id: string): Promise<boolean>;
  get(id: string): Promise<Post | null>;
  upsert(post: Post, targetKey?: string): Promise<WriteOutcome>;
  existingIdsFor(target: Target): Promise<Set<string>>;
  read(target: Target, options?: ReadOptions): Promise<Post[]>;
  countFor(target: Target): Promise<number>;
  markSelfThread(ids: readonly string[]): Promise<number>;

  recordTarget(target: Target, label: string): Promise<TargetRecord>;
  updateTargetBounds(target: Target, newestPostId: string | null, oldestPostId: string | null): Promise<void>;
  findTarget(target: Target): Promise<TargetRecord | null>;
}
