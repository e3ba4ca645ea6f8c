import { describe, it, expect } from "vitest";
import { XApiBackend, type XApiBackendConfig } from "../../src/platforms/x/api.backend";
import { AuthError, BackendUnavailableError, NotFoundError, RateLimitError } from "../../src/core/errors";
import { normalizePost } from "../../src/core/normalize";
import { tweetResult } from "../helpers/fixtures";

const createdAt = new Date("2024-11-22T20:08:47Z");

const tweetEntry = (id: string) => ({
  entryId: `tweet-${id}`,
  content: {
    entryType: "TimelineTimelineItem",
    itemContent: { itemType: "TimelineTweet", tweet_results: { result: tweetResult({ id, createdAt }) } },
  },
});

const bottomCursor = (value: string) => ({
  entryId: "cursor-bottom-0",
  content: { entryType: "TimelineTimelineCursor", cursorType: "Bottom", value },
});

const listResponse = (entries: unknown[]) => ({
  data: { list: { tweets_timeline: { timeline: { instructions: [{ type: "TimelineAddEntries", entries }] } } } },
});

const userTimelineResponse = (entries: unknown[]) => ({
  data: { user: { result: { timeline_v2: { timeline: { instructions: [{ entries }] } } } } },
});

const conversationResponse = (entries: unknown[]) => ({
  data: { threaded_conversation_with_injections_v2: { instructions: [{ type: "TimelineAddEntries", entries }] } },
});

const json = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" }, ...init });

interface RecordedRequest {
  url: URL;
  headers: Headers;
}

function stubFetch(...responses: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    requests.push({ url: new URL(String(input)), headers: new Headers(init?.headers) });
    const next = responses.shift();
    if (next === undefined) throw new Error("unexpected request");
    if (next instanceof Error) throw next;
    return next;
  };
  return { requests, fetchImpl };
}

function backend(fetchImpl: XApiBackendConfig["fetchImpl"]) {
  return new XApiBackend({
    authToken: "test-auth",
    ct0: "test-ct0",
    bearerToken: "test-bearer",
    baseUrl: "https://x.test/graphql/",
    queryIds: { listTimeline: "LQ", userTweets: "UQ", userByScreenName: "SQ", tweetDetail: "DQ" },
    pageSize: 20,
    timeoutMs: 5000,
    fetchImpl,
  });
}

const variablesOf = (request: RecordedRequest | undefined): unknown =>
  JSON.parse(request?.url.searchParams.get("variables") ?? "null");

describe("XApiBackend", () => {
  it("should fetch a list page with session headers", async () => {
    const { requests, fetchImpl } = stubFetch(json(listResponse([tweetEntry("3"), tweetEntry("2"), bottomCursor("NEXT")])));

    const page = await backend(fetchImpl).fetchPage({ kind: "list", listId: "5" }, null);

    expect(page.posts.map((raw) => normalizePost(raw).id)).toEqual(["3", "2"]);
    expect(page.nextCursor).toBe("NEXT");

    const [request] = requests;
    expect(request?.url.pathname).toBe("/graphql/LQ/ListLatestTweetsTimeline");
    expect(variablesOf(request)).toEqual({ listId: "5", count: 20 });
    expect(request?.headers.get("authorization")).toBe("Bearer test-bearer");
    expect(request?.headers.get("cookie")).toBe("auth_token=test-auth; ct0=test-ct0");
    expect(request?.headers.get("x-csrf-token")).toBe("test-ct0");
  });

  it("should pass the cursor along and end on an empty page", async () => {
    const { requests, fetchImpl } = stubFetch(json(listResponse([bottomCursor("STILL-MORE")])));

    const page = await backend(fetchImpl).fetchPage({ kind: "list", listId: "5" }, "NEXT");

    expect(page).toEqual({ posts: [], nextCursor: null });
    expect(variablesOf(requests[0])).toEqual({ listId: "5", count: 20, cursor: "NEXT" });
  });

  it("should resolve a handle once and reuse the user id", async () => {
    const { requests, fetchImpl } = stubFetch(
      json({ data: { user: { result: { rest_id: "42" } } } }),
      json(userTimelineResponse([tweetEntry("9")])),
      json(userTimelineResponse([tweetEntry("8")]))
    );
    const api = backend(fetchImpl);

    await api.fetchPage({ kind: "user", user: "@SomeOne" }, null);
    await api.fetchPage({ kind: "user", user: "someone" }, null);

    expect(requests.map((r) => r.url.pathname)).toEqual([
      "/graphql/SQ/UserByScreenName",
      "/graphql/UQ/UserTweets",
      "/graphql/UQ/UserTweets",
    ]);
    expect(variablesOf(requests[0])).toEqual({ screen_name: "someone" });
    expect(variablesOf(requests[2])).toMatchObject({ userId: "42" });
  });

  it("should report an unknown handle as not found", async () => {
    const { fetchImpl } = stubFetch(json({ data: { user: {} } }));

    const failure = backend(fetchImpl).fetchPage({ kind: "user", user: "nobody" }, null);

    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toMatchObject({ code: "USER_NOT_FOUND" });
  });

  it("should page through a conversation until the cursor runs out", async () => {
    const more = {
      entryId: "conversationthread-more",
      content: {
        entryType: "TimelineTimelineItem",
        itemContent: { itemType: "TimelineTimelineCursor", cursorType: "ShowMoreThreads", value: "MORE" },
      },
    };
    const { requests, fetchImpl } = stubFetch(
      json(conversationResponse([tweetEntry("1"), tweetEntry("2"), more])),
      json(conversationResponse([tweetEntry("3")]))
    );

    const posts = await backend(fetchImpl).fetchConversation("1");

    expect(posts.map((raw) => normalizePost(raw).id)).toEqual(["1", "2", "3"]);
    expect(requests).toHaveLength(2);
    expect(variablesOf(requests[1])).toMatchObject({ focalTweetId: "1", cursor: "MORE" });
  });

  describe("failures", () => {
    const list = { kind: "list", listId: "5" } as const;

    it("should treat 401 and 403 as rejected credentials", async () => {
      const { fetchImpl } = stubFetch(json({}, { status: 401 }), json({}, { status: 403 }));
      const api = backend(fetchImpl);

      await expect(api.fetchPage(list, null)).rejects.toBeInstanceOf(AuthError);
      await expect(api.fetchPage(list, null)).rejects.toMatchObject({ code: "AUTH_REJECTED" });
    });

    it("should surface rate limits with the time until reset", async () => {
      const reset = Math.floor(Date.now() / 1000) + 30;
      const { fetchImpl } = stubFetch(json({}, { status: 429, headers: { "x-rate-limit-reset": String(reset) } }));

      const error: unknown = await backend(fetchImpl).fetchPage(list, null).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      if (!(error instanceof RateLimitError)) return;
      expect(error.retryAfterSeconds).toBeGreaterThanOrEqual(29);
      expect(error.retryAfterSeconds).toBeLessThanOrEqual(30);
    });

    it("should map other HTTP failures, GraphQL errors and network errors to unavailability", async () => {
      const { fetchImpl } = stubFetch(
        json({}, { status: 503 }),
        json({ errors: [{ message: "Query: Unspecified" }] }),
        new TypeError("fetch failed")
      );
      const api = backend(fetchImpl);

      await expect(api.fetchPage(list, null)).rejects.toMatchObject({ code: "HTTP_ERROR" });
      await expect(api.fetchPage(list, null)).rejects.toMatchObject({
        code: "GRAPHQL_ERROR",
        message: "ListLatestTweetsTimeline returned errors: Query: Unspecified",
      });
      const network = api.fetchPage(list, null);
      await expect(network).rejects.toBeInstanceOf(BackendUnavailableError);
      await expect(network).rejects.toMatchObject({
        code: "REQUEST_FAILED",
        message: "ListLatestTweetsTimeline request failed: TypeError: fetch failed",
      });
    });
  });
});
