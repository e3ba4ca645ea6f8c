import { sqliteTable, text, integer, blob, index, primaryKey } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const targets = sqliteTable("targets", {
  key: text("key").primaryKey(),
  kind: text("kind", { enum: ["list", "user", "conversation"] }).notNull(),
  label: text("label").notNull(),
  firstCollectedAt: integer("first_collected_at").notNull(),
  lastCollectedAt: integer("last_collected_at").notNull(),
  newestPostId: text("newest_post_id"),
  oldestPostId: text("oldest_post_id"),
});

export const posts = sqliteTable(
  "posts",
  {
    id: text("id").primaryKey(),
    createdAt: integer("created_at").notNull(),
    authorId: text("author_id").notNull(),
    authorHandle: text("author_handle").notNull(),
    text: text("text").notNull(),
    conversationId: text("conversation_id").notNull(),
    inReplyToId: text("in_reply_to_id"),
    inReplyToAuthorId: text("in_reply_to_author_id"),
    isRetweet: integer("is_retweet", { mode: "boolean" }).notNull().default(false),
    isQuote: integer("is_quote", { mode: "boolean" }).notNull().default(false),
    hasMedia: integer("has_media", { mode: "boolean" }).notNull().default(false),
    isSelfThread: integer("is_self_thread", { mode: "boolean" }).notNull().default(false),
    raw: blob("raw", { mode: "json" }).$type<unknown>().notNull(),
    storedAt: integer("stored_at").notNull(),
  },
  (table) => ({
    createdAtIdx: index("posts_created_at_idx").on(sql`created_at DESC`),
    authorIdx: index("posts_author_id_idx").on(table.authorId),
    conversationIdx: index("posts_conversation_id_idx").on(table.conversationId, table.createdAt),
    inReplyToIdx: index("posts_in_reply_to_id_idx").on(table.inReplyToId),
  })
);

export const targetPosts = sqliteTable(
  "target_posts",
  {
    targetKey: text("target_key").notNull(),
    postId: text("post_id").notNull().references(() => posts.id),
    linkedAt: integer("linked_at").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.targetKey, table.postId] }),
    postIdx: index("target_posts_post_id_idx").on(table.postId),
  })
);

export const collectionRuns = sqliteTable(
  "collection_runs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    targetKey: text("target_key").notNull(),
    backend: text("backend").notNull(),
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
    status: text("status", { enum: ["running", "complete", "incomplete"] }).notNull().default("running"),
    stopReason: text("stop_reason"),
    pagesFetched: integer("pages_fetched").notNull().default(0),
    postsSeen: integer("posts_seen").notNull().default(0),
    postsNew: integer("posts_new").notNull().default(0),
    postsMalformed: integer("posts_malformed").notNull().default(0),
    threadPostsNew: integer("thread_posts_new").notNull().default(0),
    errorCode: text("error_code"),
    errorDetail: text("error_detail"),
  },
  (table) => ({
    targetStartedIdx: index("collection_runs_target_started_idx").on(table.targetKey, sql`started_at DESC`),
  })
);

export type TargetRow = typeof targets.$inferSelect;
export type NewTargetRow = typeof targets.$inferInsert;
export type PostRow = typeof posts.$inferSelect;
export type NewPostRow = typeof posts.$inferInsert;
export type TargetPostRow = typeof targetPosts.$inferSelect;
export type CollectionRunRow = typeof collectionRuns.$inferSelect;
export type NewCollectionRunRow = typeof collectionRuns.$inferInsert;
