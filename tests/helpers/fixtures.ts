import type { Post, RawPost } from "../../src/domain/models";
import { normalizePost } from "../../src/core/normalize";
import type { Cursor, FetchBackend, FetchPage } from "../../src/platforms/backend";
import type { Target } from "../../src/domain/models";
import { createDb } from "../../src/db/client";
import { PostsRepository } from "../../src/db/repositories/posts.repo";
import { RunsRepository } from "../../src/db/repositories/runs.repo";
import type { RetryOptions } from "../../src/core/retry";

const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export const BASE_TIME = new Date("2024-11-22T20:00:00Z");

export const FAST_RETRY: RetryOptions = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

export function minutesAfterBase(minutes: number): Date {
  return new Date(BASE_TIME.getTime() + minutes * 60_000);
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `Fri Nov 22 20:08:47 +0000 2024` */
export function toLegacyDate(date: Date): string {
  return (
    `${DAYS[date.getUTCDay()]} ${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000 ${date.getUTCFullYear()}`
  );
}

export interface TweetFields {
  id: string;
  createdAt: Date;
  authorId?: string;
  handle?: string;
  text?: string;
  conversationId?: string;
  inReplyToId?: string;
  inReplyToAuthorId?: string;
  retweet?: boolean;
  mediaCount?: number;
  noteText?: string;
}

export function tweetResult(fields: TweetFields): Record<string, unknown> {
  const authorId = fields.authorId ?? "1000";
  return {
    __typename: "Tweet",
    rest_id: fields.id,
    core: {
      user_results: {
        result: { __typename: "User", rest_id: authorId, core: { screen_name: fields.handle ?? `user${authorId}` } },
      },
    },
    legacy: {
      id_str: fields.id,
      created_at: toLegacyDate(fields.createdAt),
      full_text: fields.text ?? `post ${fields.id}`,
      user_id_str: authorId,
      conversation_id_str: fields.conversationId ?? fields.id,
      ...(fields.inReplyToId ? { in_reply_to_status_id_str: fields.inReplyToId } : {}),
      ...(fields.inReplyToAuthorId ? { in_reply_to_user_id_str: fields.inReplyToAuthorId } : {}),
      is_quote_status: false,
      ...(fields.retweet ? { retweeted_status_result: { result: {} } } : {}),
      ...(fields.mediaCount ? { extended_entities: { media: Array.from({ length: fields.mediaCount }, () => ({ type: "photo" })) } } : {}),
    },
    ...(fields.noteText ? { note_tweet: { note_tweet_results: { result: { text: fields.noteText } } } } : {}),
  };
}

export function apiTweet(fields: TweetFields): RawPost {
  return { source: "api", payload: tweetResult(fields) };
}

export function makePost(fields: TweetFields): Post {
  return normalizePost(apiTweet(fields));
}

export interface PageScript {
  posts: RawPost[];
  /** Calls that throw before this page is served. */
  failTimes?: number;
  alwaysFail?: boolean;
  /** No next cursor after this page. Defaults to true for the last scripted page. */
  last?: boolean;
}

/**
 * Scripted backend. Page `n` is served for cursor `c<n>` (page 0 for a null cursor);
 * every call is recorded.
 */
export class FakeBackend implements FetchBackend {
  readonly kind = "api";
  readonly pageCalls: Array<{ target: Target; cursor: Cursor | null }> = [];
  readonly conversationCalls: string[] = [];
  closed = false;
  private failures = new Map<number, number>();

  constructor(
    private pages: PageScript[],
    private conversations: Record<string, RawPost[] | Error> = {}
  ) {}

  async fetchPage(target: Target, cursor: Cursor | null): Promise<FetchPage> {
    this.pageCalls.push({ target, cursor });
    const index = cursor === null ? 0 : Number(cursor.slice(1));
    const script = this.pages[index];
    if (!script) throw new Error(`No scripted page for cursor ${cursor}`);

    if (script.alwaysFail) throw new Error(`page ${index} unavailable`);
    const failed = this.failures.get(index) ?? 0;
    if (failed < (script.failTimes ?? 0)) {
      this.failures.set(index, failed + 1);
      throw new Error(`page ${index} failed transiently`);
    }

    const last = script.last ?? index === this.pages.length - 1;
    return { posts: script.posts, nextCursor: last ? null : `c${index + 1}` };
  }

  async fetchConversation(conversationId: string): Promise<RawPost[]> {
    this.conversationCalls.push(conversationId);
    const scripted = this.conversations[conversationId];
    if (scripted instanceof Error) throw scripted;
    return scripted ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function createTestStore() {
  const handle = createDb(":memory:");
  return {
    handle,
    store: new PostsRepository(handle.db),
    runs: new RunsRepository(handle.db),
  };
}
