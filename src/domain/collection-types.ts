import type { DelayRange } from "../core/cooldown";
import type { RetryOptions } from "../core/retry";
import type { RunStatus, StopReason } from "./models";

export interface CollectionWarning {
  code: "THREAD_EXPANSION_FAILED";
  message: string;
  conversationId: string;
  postId: string;
}

export interface CollectOptions {
  /** Stop once this many previously unseen timeline posts have been emitted. */
  maxCount?: number;
  /** Posts older than `now - maxAgeMs` end the run after the page that contains them. */
  maxAgeMs?: number;
  maxPages?: number;
  expandThreads?: boolean;
  /** Pause between consecutive conversation fetches while expanding threads. */
  threadDelay?: DelayRange;
  retry?: RetryOptions;
  signal?: AbortSignal;
  now?: () => Date;
  /** Human-readable origin of the target (URL or handle), kept in the target ledger. */
  label?: string;
  onWarning?: (warning: CollectionWarning) => void;
}

export interface CollectionSummary {
  targetKey: string;
  status: RunStatus;
  stopReason: StopReason | null;
  pagesFetched: number;
  postsSeen: number;
  postsNew: number;
  postsMalformed: number;
  postsTooOld: number;
  threadsExpanded: number;
  threadPostsNew: number;
  newestPostId: string | null;
  oldestPostId: string | null;
  warnings: CollectionWarning[];
  error: { code: string; message: string } | null;
}

export function emptySummary(targetKey: string): CollectionSummary {
  return {
    targetKey,
    status: "running",
    stopReason: null,
    pagesFetched: 0,
    postsSeen: 0,
    postsNew: 0,
    postsMalformed: 0,
    postsTooOld: 0,
    threadsExpanded: 0,
    threadPostsNew: 0,
    newestPostId: null,
    oldestPostId: null,
    warnings: [],
    error: null,
  };
}
