import { and, asc, desc, eq, inArray, sql, type SQL } from "drizzle-orm";
import { alias } from "drizzle-orm/sqlite-core";
import type { NewPostRow, PostRow } from "../schema";
import { posts, targetPosts } from "../schema";
import { getDb, type Db } from "../client";
import { logger } from "../../core/logger";
import { StoreFailureError } from "../../core/errors";
import type { Post, ReadOptions, Target, WriteOutcome } from "../../domain/models";
import { compareIds, targetKey } from "../../domain/models";
import type { PostStore, TargetRecord } from "../../domain/store";
import { TargetsRepository } from "./targets.repo";

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export function toPostRow(post: Post, storedAt: Date = new Date()): NewPostRow {
  return {
    id: post.id,
    createdAt: toSeconds(post.createdAt),
    authorId: post.authorId,
    authorHandle: post.authorHandle,
    text: post.text,
    conversationId: post.conversationId,
    inReplyToId: post.inReplyToId,
    inReplyToAuthorId: post.inReplyToAuthorId,
    isRetweet: post.isRetweet,
    isQuote: post.isQuote,
    hasMedia: post.hasMedia,
    isSelfThread: post.isSelfThread,
    raw: post.raw,
    storedAt: toSeconds(storedAt),
  };
}

export function fromPostRow(row: PostRow): Post {
  return {
    id: row.id,
    createdAt: new Date(row.createdAt * 1000),
    authorId: row.authorId,
    authorHandle: row.authorHandle,
    text: row.text,
    conversationId: row.conversationId,
    inReplyToId: row.inReplyToId,
    inReplyToAuthorId: row.inReplyToAuthorId,
    isRetweet: row.isRetweet,
    isQuote: row.isQuote,
    hasMedia: row.hasMedia,
    isSelfThread: row.isSelfThread,
    raw: row.raw,
  };
}

export class PostsRepository implements PostStore {
  private targetsRepo: TargetsRepository;

  constructor(private db: Db = getDb()) {
    this.targetsRepo = new TargetsRepository(db);
  }

  async has(id: string): Promise<boolean> {
    return this.guard("has", () => {
      const row = this.db.select({ id: posts.id }).from(posts).where(eq(posts.id, id)).limit(1).get();
      return row !== undefined;
    });
  }

  async get(id: string): Promise<Post | null> {
    return this.guard("get", () => {
      const row = this.db.select().from(posts).where(eq(posts.id, id)).limit(1).get();
      return row ? fromPostRow(row) : null;
    });
  }

  /**
   * Inserts the post unless its id is already stored. A stored row is never
   * rewritten; the only exception is upgrading `isSelfThread` from false to true.
   */
  async upsert(post: Post, linkToTargetKey?: string): Promise<WriteOutcome> {
    return this.guard("upsert", () =>
      this.db.transaction((tx) => {
        const now = new Date();
        const inserted = tx
          .insert(posts)
          .values(toPostRow(post, now))
          .onConflictDoNothing({ target: posts.id })
          .returning({ id: posts.id })
          .all();

        const outcome: WriteOutcome = inserted.length > 0 ? "inserted" : "already_present";

        if (outcome === "already_present" && post.isSelfThread) {
          tx.update(posts)
            .set({ isSelfThread: true })
            .where(and(eq(posts.id, post.id), eq(posts.isSelfThread, false)))
            .run();
        }

        if (linkToTargetKey) {
          tx.insert(targetPosts)
            .values({ targetKey: linkToTargetKey, postId: post.id, linkedAt: toSeconds(now) })
            .onConflictDoNothing()
            .run();
        }

        logger.trace({ postId: post.id, outcome, targetKey: linkToTargetKey }, "Post upserted");
        return outcome;
      })
    );
  }

  async existingIdsFor(target: Target): Promise<Set<string>> {
    return this.guard("existingIdsFor", () => {
      const rows = this.db.select({ id: posts.id }).from(posts).where(this.targetCondition(target)).all();
      return new Set(rows.map((r) => r.id));
    });
  }

  async read(target: Target, options: ReadOptions = {}): Promise<Post[]> {
    const { order = "newest", limit, excludeRetweets, conversationId, selfThreadOnly } = options;

    return this.guard("read", () => {
      const conditions: SQL[] = [this.targetCondition(target)];
      if (excludeRetweets) conditions.push(eq(posts.isRetweet, false));
      if (conversationId) conditions.push(eq(posts.conversationId, conversationId));
      if (selfThreadOnly) conditions.push(eq(posts.isSelfThread, true));

      const direction = order === "newest" ? desc : asc;
      const query = this.db
        .select()
        .from(posts)
        .where(and(...conditions))
        .orderBy(direction(posts.createdAt), direction(sql`length(${posts.id})`), direction(posts.id));

      const rows = limit !== undefined ? query.limit(limit).all() : query.all();
      return rows.map(fromPostRow);
    });
  }

  async countFor(target: Target): Promise<number> {
    return this.guard("countFor", () => {
      const row = this.db
        .select({ count: sql<number>`count(*)` })
        .from(posts)
        .where(this.targetCondition(target))
        .get();
      return row?.count ?? 0;
    });
  }

  async markSelfThread(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;

    return this.guard("markSelfThread", () => {
      const updated = this.db
        .update(posts)
        .set({ isSelfThread: true })
        .where(and(inArray(posts.id, [...ids]), eq(posts.isSelfThread, false)))
        .returning({ id: posts.id })
        .all();
      logger.debug({ requested: ids.length, updated: updated.length }, "Self-thread flags set");
      return updated.length;
    });
  }

  async recordTarget(target: Target, label: string): Promise<TargetRecord> {
    return this.guard("recordTarget", () => this.targetsRepo.record(target, label));
  }

  async updateTargetBounds(target: Target, newestPostId: string | null, oldestPostId: string | null): Promise<void> {
    this.guard("updateTargetBounds", () => {
      const existing = this.targetsRepo.find(target);
      if (!existing) return;

      const newest =
        existing.newestPostId && newestPostId
          ? compareIds(newestPostId, existing.newestPostId) > 0
            ? newestPostId
            : existing.newestPostId
          : newestPostId ?? existing.newestPostId;
      const oldest =
        existing.oldestPostId && oldestPostId
          ? compareIds(oldestPostId, existing.oldestPostId) < 0
            ? oldestPostId
            : existing.oldestPostId
          : oldestPostId ?? existing.oldestPostId;

      this.targetsRepo.setBounds(existing.key, newest, oldest);
    });
  }

  async findTarget(target: Target): Promise<TargetRecord | null> {
    return this.guard("findTarget", () => this.targetsRepo.find(target));
  }

  /**
   * A conversation target may name any post of the conversation, so it matches the
   * conversation that post belongs to as well as a conversation rooted at that id.
   */
  private targetCondition(target: Target): SQL {
    if (target.kind === "conversation") {
      const focal = alias(posts, "focal");
      const rootOfFocal = this.db
        .select({ conversationId: focal.conversationId })
        .from(focal)
        .where(eq(focal.id, target.conversationId));
      return sql`(${eq(posts.conversationId, target.conversationId)} or ${inArray(posts.conversationId, rootOfFocal)})`;
    }
    return inArray(
      posts.id,
      this.db.select({ id: targetPosts.postId }).from(targetPosts).where(eq(targetPosts.targetKey, targetKey(target)))
    );
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      logger.error({ error, operation }, "Post store operation failed");
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreFailureError(`Post store ${operation} failed: ${message}`, "STORE_FAILURE", error);
    }
  }
}

export const postsRepo = new PostsRepository();
