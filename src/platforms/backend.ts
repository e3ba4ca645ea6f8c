import type { RawPost, Target } from "../domain/models";

/** Opaque continuation token. Only the backend that issued it may interpret it. */
export type Cursor = string;

export interface FetchPage {
  /** Newest first. */
  posts: RawPost[];
  nextCursor: Cursor | null;
}

export type BackendKind = "api" | "browser";

/**
 * Paginated source of raw posts. Credentials, profiles and proxies are given to
 * an implementation when it is constructed; callers only ever pass targets and cursors.
 */
export interface FetchBackend {
  readonly kind: BackendKind;

  fetchPage(target: Target, cursor: Cursor | null): Promise<FetchPage>;

  /** The whole conversation `postId` belongs to, in the order the source returns it. */
  fetchConversation(postId: string): Promise<RawPost[]>;

  close(): Promise<void>;
}
