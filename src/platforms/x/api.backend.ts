import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { RawPost, Target } from "../../domain/models";
import type { Cursor, FetchBackend, FetchPage } from "../backend";
import { AuthError, BackendUnavailableError, NotFoundError, RateLimitError } from "../../core/errors";
import { logger } from "../../core/logger";
import { extractTimeline, extractUserId } from "./timeline-response";

const FEATURES_PATH = fileURLToPath(new URL("./graphql-features.json", import.meta.url));
const FeaturesSchema = z.record(z.boolean());

// TweetDetail pages through long conversations; past this many pages we stop asking.
const MAX_CONVERSATION_PAGES = 10;

const GraphqlErrorSchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
  data: z.unknown().optional(),
});

export interface XQueryIds {
  listTimeline: string;
  userTweets: string;
  userByScreenName: string;
  tweetDetail: string;
}

export interface XApiBackendConfig {
  authToken: string;
  ct0: string;
  bearerToken: string;
  baseUrl: string;
  queryIds: XQueryIds;
  pageSize: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

type Operation = "ListLatestTweetsTimeline" | "UserTweets" | "UserByScreenName" | "TweetDetail";

function loadFeatures(): Record<string, boolean> {
  return FeaturesSchema.parse(JSON.parse(readFileSync(FEATURES_PATH, "utf-8")));
}

/** Cookie-authenticated client for the GraphQL endpoints the X web app uses. */
export class XApiBackend implements FetchBackend {
  readonly kind = "api";
  private fetchImpl: typeof fetch;
  private features: Record<string, boolean>;
  private userIds = new Map<string, string>();

  constructor(private config: XApiBackendConfig) {
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.features = loadFeatures();
  }

  async fetchPage(target: Target, cursor: Cursor | null): Promise<FetchPage> {
    let response: unknown;
    switch (target.kind) {
      case "list":
        response = await this.request("ListLatestTweetsTimeline", this.config.queryIds.listTimeline, {
          listId: target.listId,
          count: this.config.pageSize,
          ...(cursor ? { cursor } : {}),
        });
        break;
      case "user": {
        const userId = await this.resolveUserId(target.user);
        response = await this.request("UserTweets", this.config.queryIds.userTweets, {
          userId,
          count: this.config.pageSize,
          includePromotedContent: false,
          withQuickPromoteEligibilityTweetFields: false,
          withVoice: true,
          withV2Timeline: true,
          ...(cursor ? { cursor } : {}),
        });
        break;
      }
      case "conversation":
        response = await this.tweetDetail(target.conversationId, cursor);
        break;
    }

    const { results, bottomCursor } = extractTimeline(response);
    // The timeline keeps handing out cursors after the last post; an empty page is the end.
    return {
      posts: results.map((payload): RawPost => ({ source: "api", payload })),
      nextCursor: results.length > 0 ? bottomCursor : null,
    };
  }

  async fetchConversation(postId: string): Promise<RawPost[]> {
    const posts: RawPost[] = [];
    let cursor: string | null = null;

    for (let page = 0; page < MAX_CONVERSATION_PAGES; page++) {
      const extraction = extractTimeline(await this.tweetDetail(postId, cursor));
      posts.push(...extraction.results.map((payload): RawPost => ({ source: "api", payload })));
      if (!extraction.bottomCursor || extraction.bottomCursor === cursor || extraction.results.length === 0) break;
      cursor = extraction.bottomCursor;
    }

    logger.debug({ postId, posts: posts.length }, "Fetched conversation");
    return posts;
  }

  async close(): Promise<void> {
    this.userIds.clear();
  }

  async resolveUserId(handle: string): Promise<string> {
    const key = handle.replace(/^@/, "").toLowerCase();
    const cached = this.userIds.get(key);
    if (cached) return cached;

    const response = await this.request("UserByScreenName", this.config.queryIds.userByScreenName, {
      screen_name: key,
    });
    const userId = extractUserId(response);
    if (!userId) {
      throw new NotFoundError(`Could not resolve user id for @${key}`, "USER_NOT_FOUND");
    }

    this.userIds.set(key, userId);
    return userId;
  }

  private tweetDetail(focalTweetId: string, cursor: string | null): Promise<unknown> {
    return this.request("TweetDetail", this.config.queryIds.tweetDetail, {
      focalTweetId,
      with_rux_injections: false,
      includePromotedContent: false,
      withCommunity: true,
      withVoice: true,
      withV2Timeline: true,
      referrer: "tweet",
      ...(cursor ? { cursor } : {}),
    });
  }

  private async request(operation: Operation, queryId: string, variables: Record<string, unknown>): Promise<unknown> {
    const params = new URLSearchParams({
      variables: JSON.stringify(variables),
      features: JSON.stringify(this.features),
    });
    const url = `${this.config.baseUrl.replace(/\/$/, "")}/${queryId}/${operation}?${params.toString()}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.headers(),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.config.timeoutMs}ms` : String(error);
      throw new BackendUnavailableError(`${operation} request failed: ${reason}`, "REQUEST_FAILED", error);
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`${operation} rejected the session cookies (HTTP ${response.status})`, "AUTH_REJECTED");
    }
    if (response.status === 429) {
      const reset = Number(response.headers.get("x-rate-limit-reset"));
      const retryAfterSeconds = Number.isFinite(reset) && reset > 0 ? Math.max(0, reset - Math.floor(Date.now() / 1000)) : undefined;
      throw new RateLimitError(`${operation} is rate limited`, "RATE_LIMITED", retryAfterSeconds);
    }
    if (!response.ok) {
      throw new BackendUnavailableError(`${operation} failed with HTTP ${response.status}`, "HTTP_ERROR");
    }

    const body: unknown = await response.json();
    const graphqlError = GraphqlErrorSchema.safeParse(body);
    if (graphqlError.success && graphqlError.data.data === undefined) {
      const message = graphqlError.data.errors.map((e) => e.message).join("; ");
      throw new BackendUnavailableError(`${operation} returned errors: ${message}`, "GRAPHQL_ERROR");
    }

    logger.trace({ operation, status: response.status }, "GraphQL response received");
    return body;
  }

  private headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.config.bearerToken}`,
      cookie: `auth_token=${this.config.authToken}; ct0=${this.config.ct0}`,
      "x-csrf-token": this.config.ct0,
      "x-twitter-auth-type": "OAuth2Session",
      "x-twitter-active-user": "yes",
      "content-type": "application/json",
    };
  }
}
