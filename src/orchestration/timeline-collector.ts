import type { Post, RunStatus, StopReason, Target } from "../domain/models";
import { compareIds, describeTarget, targetKey } from "../domain/models";
import type { PostStore } from "../domain/store";
import type { CollectOptions, CollectionSummary, CollectionWarning } from "../domain/collection-types";
import { emptySummary } from "../domain/collection-types";
import type { Cursor, FetchBackend, FetchPage } from "../platforms/backend";
import { normalizePost } from "../core/normalize";
import {
  AuthError,
  BackendUnavailableError,
  MalformedPayloadError,
  NotFoundError,
  StoreFailureError,
  ThreadExpansionError,
  errorCode,
  errorMessage,
} from "../core/errors";
import { DEFAULT_RETRY_OPTIONS, RetryExhaustedError, retryWithBackoff, type RetryOptions } from "../core/retry";
import { actionDelay } from "../core/cooldown";
import { logger, type Logger } from "../core/logger";
import { ThreadReconstructor } from "./thread-reconstructor";

/** Rejected credentials and unknown accounts will not go away by asking again. */
export const DEFAULT_COLLECT_RETRY: RetryOptions = {
  ...DEFAULT_RETRY_OPTIONS,
  isRetryable: (error) => !(error instanceof AuthError) && !(error instanceof NotFoundError),
};

/**
 * One collection run. Posts are produced lazily as the caller iterates; nothing is
 * fetched before the first `next()` and nothing more after the caller stops.
 * `summary` is updated as the run progresses. `done` settles once iteration ends,
 * or on `close()` for a run that is dropped without being iterated to the end.
 */
export class CollectionRun implements AsyncIterable<Post> {
  private iterated = false;

  constructor(
    readonly summary: CollectionSummary,
    private posts: AsyncGenerator<Post, void, undefined>,
    readonly done: Promise<CollectionSummary>,
    private abandon: () => void
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<Post> {
    if (this.iterated) {
      throw new Error(`Collection run for ${this.summary.targetKey} was already iterated; start a new run`);
    }
    this.iterated = true;
    return this.posts;
  }

  /** Consumes the run without looking at the posts. */
  async drain(): Promise<CollectionSummary> {
    const iterator = this[Symbol.asyncIterator]();
    let step = await iterator.next();
    while (!step.done) {
      step = await iterator.next();
    }
    return this.done;
  }

  /** Stops the run wherever it is, fetching nothing more, and settles `done`. */
  async close(): Promise<CollectionSummary> {
    if (this.iterated) await this.posts.return(undefined);
    this.iterated = true;
    // A generator that never started skips its own cleanup.
    if (this.summary.status === "running") this.abandon();
    return this.done;
  }
}

interface RunContext {
  target: Target;
  key: string;
  options: CollectOptions;
  retry: RetryOptions;
  summary: CollectionSummary;
  log: Logger;
}

export class TimelineCollector {
  private reconstructor: ThreadReconstructor;

  constructor(
    private backend: FetchBackend,
    private store: PostStore,
    reconstructor?: ThreadReconstructor
  ) {
    this.reconstructor = reconstructor ?? new ThreadReconstructor(backend, store, { retry: DEFAULT_COLLECT_RETRY });
  }

  collect(target: Target, options: CollectOptions = {}): CollectionRun {
    const key = targetKey(target);
    const summary = emptySummary(key);

    let settle: (summary: CollectionSummary) => void = () => undefined;
    const done = new Promise<CollectionSummary>((resolve) => {
      settle = resolve;
    });

    const context: RunContext = {
      target,
      key,
      options,
      retry: options.retry ?? DEFAULT_COLLECT_RETRY,
      summary,
      log: logger.child({ targetKey: key, backend: this.backend.kind }),
    };

    const abandon = () => {
      this.finish(summary, "consumer_stopped", "incomplete");
      context.log.info("Collection run closed before it started");
      settle(summary);
    };

    return new CollectionRun(summary, this.execute(context, () => settle(summary)), done, abandon);
  }

  private async *execute(ctx: RunContext, settle: () => void): AsyncGenerator<Post, void, undefined> {
    const { target, options, summary, log } = ctx;
    log.info(
      {
        maxCount: options.maxCount,
        maxAgeMs: options.maxAgeMs,
        maxPages: options.maxPages,
        expandThreads: options.expandThreads ?? false,
      },
      "Collection run started"
    );

    try {
      await this.store.recordTarget(target, options.label ?? describeTarget(target));

      if (target.kind === "conversation") {
        yield* this.collectConversation(ctx, target.conversationId);
      } else {
        yield* this.collectTimeline(ctx);
      }
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        this.fail(summary, "backend_unavailable", error);
        log.error({ error: error.message, cause: errorMessage(error.cause) }, "Backend unavailable, ending run");
      } else if (error instanceof StoreFailureError) {
        this.fail(summary, "store_failure", error);
        log.error({ error: error.message }, "Store failure, ending run");
      } else {
        this.fail(summary, null, error);
        log.error({ error }, "Collection run failed unexpectedly");
        throw error;
      }
    } finally {
      if (summary.status === "running") {
        this.finish(summary, "consumer_stopped", "incomplete");
        log.info("Consumer stopped iterating");
      }

      await this.recordBounds(ctx);

      log.info(
        {
          status: summary.status,
          stopReason: summary.stopReason,
          pagesFetched: summary.pagesFetched,
          postsSeen: summary.postsSeen,
          postsNew: summary.postsNew,
          postsMalformed: summary.postsMalformed,
          postsTooOld: summary.postsTooOld,
          threadsExpanded: summary.threadsExpanded,
          threadPostsNew: summary.threadPostsNew,
          warnings: summary.warnings.length,
        },
        "Collection run finished"
      );
      settle();
    }
  }

  private async *collectTimeline(ctx: RunContext): AsyncGenerator<Post, void, undefined> {
    const { target, key, options, summary, log } = ctx;
    const { maxCount, maxAgeMs, maxPages, signal } = options;
    const unlimited = maxCount === undefined && maxAgeMs === undefined && maxPages === undefined;
    const now = options.now ?? (() => new Date());
    const cutoff = maxAgeMs !== undefined ? new Date(now().getTime() - maxAgeMs) : null;

    const runPosts = new Map<string, Post>();
    const expandedConversations = new Set<string>();
    let cursor: Cursor | null = null;
    let previousPageHadNothingNew = false;
    // New posts handed to the caller so far, from pages and expanded threads alike.
    let emitted = 0;

    if (maxCount !== undefined && maxCount <= 0) {
      this.finish(summary, "max_count", "complete");
      return;
    }

    while (true) {
      if (signal?.aborted) {
        this.finish(summary, "cancelled", "incomplete");
        log.info({ pagesFetched: summary.pagesFetched }, "Collection cancelled");
        return;
      }

      const page = await this.fetchPage(ctx, cursor);
      summary.pagesFetched++;

      const queued: Post[] = [];
      const triggers: Post[] = [];
      let pageNew = 0;
      let crossedCutoff = false;
      let reachedMaxCount = false;

      for (const raw of page.posts) {
        const post = this.normalize(raw, ctx);
        if (!post) continue;
        summary.postsSeen++;

        if (cutoff && post.createdAt < cutoff) {
          summary.postsTooOld++;
          crossedCutoff = true;
          continue;
        }

        runPosts.set(post.id, post);
        this.trackBounds(summary, post.id);

        const outcome = await this.store.upsert(post, key);
        if (outcome === "inserted") {
          pageNew++;
          summary.postsNew++;
          queued.push(post);
        }
        if (options.expandThreads) triggers.push(post);

        if (maxCount !== undefined && emitted + queued.length >= maxCount) {
          reachedMaxCount = true;
          break;
        }
      }

      log.debug(
        { page: summary.pagesFetched, received: page.posts.length, new: pageNew, hasNext: page.nextCursor !== null },
        "Page processed"
      );

      let threadChain = new Set<string>();
      let threadPosts: Post[] = [];
      if (options.expandThreads && triggers.length > 0) {
        const expansion = await this.expandThreads(ctx, triggers, runPosts, expandedConversations);
        threadChain = expansion.chainIds;
        const queuedIds = new Set(queued.map((post) => post.id));
        threadPosts = expansion.inserted.filter((post) => !queuedIds.has(post.id));
      }

      if (maxCount !== undefined) {
        // Thread posts past the cap stay stored but are not emitted.
        threadPosts = threadPosts.slice(0, Math.max(0, maxCount - emitted - queued.length));
      }
      emitted += queued.length + threadPosts.length;
      if (maxCount !== undefined && emitted >= maxCount) reachedMaxCount = true;

      for (const post of queued) {
        yield threadChain.has(post.id) ? { ...post, isSelfThread: true } : post;
      }
      for (const post of threadPosts) {
        yield post;
      }

      if (reachedMaxCount) {
        this.finish(summary, "max_count", "complete");
      } else if (crossedCutoff) {
        this.finish(summary, "max_age", "complete");
      } else if (maxPages !== undefined && summary.pagesFetched >= maxPages) {
        this.finish(summary, "max_pages", "complete");
      } else if (page.nextCursor === null) {
        this.finish(summary, pageNew === 0 ? "saturated" : "exhausted", "complete");
      } else if (unlimited && pageNew === 0 && previousPageHadNothingNew) {
        this.finish(summary, "caught_up", "complete");
      }

      if (summary.status !== "running") return;

      previousPageHadNothingNew = pageNew === 0;
      cursor = page.nextCursor;
    }
  }

  /** `postId` may be the conversation root or any reply in it; the reconstructor resolves the root. */
  private async *collectConversation(ctx: RunContext, postId: string): AsyncGenerator<Post, void, undefined> {
    const { options, summary, log } = ctx;

    if (options.signal?.aborted) {
      this.finish(summary, "cancelled", "incomplete");
      log.info("Collection cancelled");
      return;
    }

    let reconstruction;
    try {
      reconstruction = await this.reconstructor.reconstruct(postId, ctx.key, ctx.retry);
    } catch (error) {
      if (error instanceof ThreadExpansionError) {
        throw new BackendUnavailableError(error.message, "BACKEND_UNAVAILABLE", error.cause);
      }
      throw error;
    }

    summary.pagesFetched = 1;
    summary.postsSeen = reconstruction.posts.length;
    summary.postsMalformed = reconstruction.malformed;
    if (reconstruction.chainIds.length > 0) summary.threadsExpanded = 1;
    for (const post of reconstruction.posts) {
      this.trackBounds(summary, post.id);
    }

    const { maxCount } = options;
    const emitted = maxCount !== undefined ? reconstruction.inserted.slice(0, Math.max(0, maxCount)) : reconstruction.inserted;
    summary.postsNew = emitted.length;

    for (const post of emitted) {
      yield post;
    }

    const capped = maxCount !== undefined && reconstruction.inserted.length >= maxCount;
    this.finish(summary, capped ? "max_count" : "exhausted", "complete");
  }

  private async fetchPage(ctx: RunContext, cursor: Cursor | null): Promise<FetchPage> {
    try {
      return await retryWithBackoff(
        () => this.backend.fetchPage(ctx.target, cursor),
        ctx.retry,
        `fetchPage:${ctx.key}`
      );
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      throw new BackendUnavailableError(
        `Fetching ${ctx.key} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
        "BACKEND_UNAVAILABLE",
        cause
      );
    }
  }

  private normalize(raw: FetchPage["posts"][number], ctx: RunContext): Post | null {
    try {
      return normalizePost(raw);
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) throw error;
      ctx.summary.postsMalformed++;
      ctx.log.warn({ error: error.message, field: error.field, source: raw.source }, "Skipping malformed post");
      return null;
    }
  }

  private async expandThreads(
    ctx: RunContext,
    triggers: Post[],
    runPosts: ReadonlyMap<string, Post>,
    expanded: Set<string>
  ): Promise<{ chainIds: Set<string>; inserted: Post[] }> {
    const { options, summary, log } = ctx;
    const chainIds = new Set<string>();
    const inserted: Post[] = [];

    for (const post of triggers) {
      if (expanded.has(post.conversationId)) continue;
      if (!(await this.reconstructor.isSelfReply(post, runPosts))) continue;

      expanded.add(post.conversationId);
      const stored = await this.store.get(post.id);
      if (stored?.isSelfThread) {
        log.debug({ conversationId: post.conversationId }, "Thread already reconstructed");
        continue;
      }

      if (options.threadDelay && summary.threadsExpanded + summary.warnings.length > 0) {
        await actionDelay(options.threadDelay);
      }

      try {
        const reconstruction = await this.reconstructor.reconstruct(post.conversationId, ctx.key, ctx.retry);
        summary.threadsExpanded++;
        summary.threadPostsNew += reconstruction.inserted.length;
        for (const id of reconstruction.chainIds) chainIds.add(id);
        inserted.push(...reconstruction.inserted);
      } catch (error) {
        if (!(error instanceof ThreadExpansionError)) throw error;
        const warning: CollectionWarning = {
          code: error.code,
          message: error.message,
          conversationId: error.conversationId,
          postId: post.id,
        };
        summary.warnings.push(warning);
        options.onWarning?.(warning);
        log.warn({ conversationId: error.conversationId, postId: post.id, error: error.message }, "Thread expansion failed");
      }
    }

    return { chainIds, inserted };
  }

  private trackBounds(summary: CollectionSummary, id: string): void {
    if (!summary.newestPostId || compareIds(id, summary.newestPostId) > 0) summary.newestPostId = id;
    if (!summary.oldestPostId || compareIds(id, summary.oldestPostId) < 0) summary.oldestPostId = id;
  }

  private async recordBounds(ctx: RunContext): Promise<void> {
    const { summary } = ctx;
    if (!summary.newestPostId && !summary.oldestPostId) return;
    try {
      await this.store.updateTargetBounds(ctx.target, summary.newestPostId, summary.oldestPostId);
    } catch (error) {
      ctx.log.error({ error: errorMessage(error) }, "Failed to record target bounds");
      if (!summary.error) {
        this.fail(summary, summary.stopReason ?? "store_failure", error);
      }
    }
  }

  private finish(summary: CollectionSummary, reason: StopReason, status: RunStatus): void {
    summary.stopReason = reason;
    summary.status = status;
  }

  private fail(summary: CollectionSummary, reason: StopReason | null, error: unknown): void {
    summary.stopReason = reason;
    summary.status = "incomplete";
    summary.error = { code: errorCode(error), message: errorMessage(error) };
  }
}
