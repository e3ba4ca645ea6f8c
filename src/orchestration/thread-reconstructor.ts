import type { Post } from "../domain/models";
import { comparePostsOldestFirst } from "../domain/models";
import type { PostStore } from "../domain/store";
import type { FetchBackend } from "../platforms/backend";
import { normalizePost } from "../core/normalize";
import { MalformedPayloadError, ThreadExpansionError, errorMessage } from "../core/errors";
import { DEFAULT_RETRY_OPTIONS, RetryExhaustedError, retryWithBackoff, type RetryOptions } from "../core/retry";
import { logger } from "../core/logger";

export interface ThreadReconstruction {
  /** Id of the conversation root, whichever post the reconstruction started from. */
  conversationId: string;
  /** Every fetched post, oldest first, with the self-thread flag as stored. */
  posts: Post[];
  /** Ids of the root author's reply chain, including the root when it is theirs. */
  chainIds: string[];
  /** Posts this reconstruction stored for the first time, oldest first. */
  inserted: Post[];
  malformed: number;
}

export interface ThreadReconstructorOptions {
  retry?: RetryOptions;
}

export class ThreadReconstructor {
  private retry: RetryOptions;

  constructor(
    private backend: FetchBackend,
    private store: PostStore,
    options: ThreadReconstructorOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
  }

  /**
   * True when the post replies to its own author. Without any local knowledge of
   * the parent or the conversation root the answer is false.
   */
  async isSelfReply(post: Post, runPosts?: ReadonlyMap<string, Post>): Promise<boolean> {
    if (!post.inReplyToId) return false;
    if (post.inReplyToAuthorId) return post.inReplyToAuthorId === post.authorId;

    const parent = runPosts?.get(post.inReplyToId) ?? (await this.store.get(post.inReplyToId));
    if (parent) return parent.authorId === post.authorId;

    if (post.conversationId !== post.id) {
      const root = runPosts?.get(post.conversationId) ?? (await this.store.get(post.conversationId));
      if (root) return root.authorId === post.authorId;
    }

    return false;
  }

  /**
   * Fetches the conversation containing `postId` (the root or any reply in it),
   * stores every post and marks the root author's reply chain as a self-thread.
   * Fetch failures surface as ThreadExpansionError; store failures propagate unchanged.
   */
  async reconstruct(
    postId: string,
    linkToTargetKey?: string,
    retry: RetryOptions = this.retry
  ): Promise<ThreadReconstruction> {
    let raws;
    try {
      raws = await retryWithBackoff(() => this.backend.fetchConversation(postId), retry, `fetchConversation:${postId}`);
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      throw new ThreadExpansionError(`Could not fetch conversation ${postId}: ${errorMessage(cause)}`, postId, cause);
    }

    const byId = new Map<string, Post>();
    let malformed = 0;
    for (const raw of raws) {
      try {
        const post = normalizePost(raw);
        if (!byId.has(post.id)) byId.set(post.id, post);
      } catch (error) {
        if (!(error instanceof MalformedPayloadError)) throw error;
        malformed++;
        logger.warn({ postId, error: error.message, field: error.field }, "Skipping malformed conversation post");
      }
    }

    const focal = byId.get(postId) ?? (await this.store.get(postId));
    const conversationId = focal?.conversationId ?? postId;
    const log = logger.child({ conversationId });
    if (conversationId !== postId) {
      log.debug({ postId }, "Resolved conversation root from a reply");
    }

    const fetched = [...byId.values()].sort(comparePostsOldestFirst);
    const root = byId.get(conversationId) ?? (await this.store.get(conversationId));
    const rootAuthorId = root?.authorId ?? fetched[0]?.authorId;

    const chain = new Set<string>();
    if (root && root.authorId === rootAuthorId) {
      chain.add(root.id);
    }
    for (const post of fetched) {
      if (post.id === conversationId || post.authorId !== rootAuthorId || !post.inReplyToId) continue;
      if (chain.has(post.inReplyToId) || post.inReplyToId === conversationId) {
        chain.add(post.id);
      }
    }

    const isThread = chain.size >= 2;
    const posts: Post[] = [];
    const inserted: Post[] = [];

    for (const post of fetched) {
      const flagged: Post = { ...post, isSelfThread: isThread && chain.has(post.id) };
      const outcome = await this.store.upsert(flagged, linkToTargetKey);
      posts.push(flagged);
      if (outcome === "inserted") inserted.push(flagged);
    }

    const chainIds = isThread ? [...chain] : [];
    if (isThread) {
      // Covers a stored root that the conversation fetch no longer returns.
      await this.store.markSelfThread(chainIds);
    }

    log.info(
      { fetched: fetched.length, inserted: inserted.length, chainLength: chainIds.length, malformed },
      "Conversation reconstructed"
    );

    return { conversationId, posts, chainIds, inserted, malformed };
  }
}
