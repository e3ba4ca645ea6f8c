import { z } from "zod";

export const TargetSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("list"), listId: z.string().regex(/^\d+$/) }),
  z.object({ kind: z.literal("user"), user: z.string().min(1) }),
  z.object({ kind: z.literal("conversation"), conversationId: z.string().regex(/^\d+$/) }),
]);
export type Target = z.infer<typeof TargetSchema>;
export type TargetKind = Target["kind"];

export const PostSourceSchema = z.enum(["api", "dom"]);
export type PostSource = z.infer<typeof PostSourceSchema>;

export interface RawPost {
  source: PostSource;
  payload: unknown;
}

export const PostSchema = z.object({
  id: z.string().min(1),
  createdAt: z.date(),
  authorId: z.string().min(1),
  authorHandle: z.string(),
  text: z.string(),
  conversationId: z.string().min(1),
  inReplyToId: z.string().nullable(),
  inReplyToAuthorId: z.string().nullable(),
  isRetweet: z.boolean(),
  isQuote: z.boolean(),
  hasMedia: z.boolean(),
  isSelfThread: z.boolean(),
  raw: z.unknown(),
});
export type Post = z.infer<typeof PostSchema>;

export type WriteOutcome = "inserted" | "already_present";

export const ReadOrderSchema = z.enum(["newest", "oldest"]);
export type ReadOrder = z.infer<typeof ReadOrderSchema>;

export interface ReadOptions {
  order?: ReadOrder;
  limit?: number;
  excludeRetweets?: boolean;
  conversationId?: string;
  selfThreadOnly?: boolean;
}

export const RunStatusSchema = z.enum(["running", "complete", "incomplete"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const StopReasonSchema = z.enum([
  "max_count",
  "max_age",
  "max_pages",
  "saturated",
  "exhausted",
  "caught_up",
  "cancelled",
  "consumer_stopped",
  "timed_out",
  "backend_unavailable",
  "store_failure",
]);
export type StopReason = z.infer<typeof StopReasonSchema>;

export function targetKey(target: Target): string {
  switch (target.kind) {
    case "list":
      return `list:${target.listId}`;
    case "user":
      return `user:${target.user.replace(/^@/, "").toLowerCase()}`;
    case "conversation":
      return `conversation:${target.conversationId}`;
  }
}

export function describeTarget(target: Target): string {
  switch (target.kind) {
    case "list":
      return `list ${target.listId}`;
    case "user":
      return `user @${target.user.replace(/^@/, "")}`;
    case "conversation":
      return `conversation ${target.conversationId}`;
  }
}

/** Numeric comparison of decimal post ids, which do not fit in a double. */
export function compareIds(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function comparePostsOldestFirst(a: Post, b: Post): number {
  const delta = a.createdAt.getTime() - b.createdAt.getTime();
  return delta !== 0 ? delta : compareIds(a.id, b.id);
}
