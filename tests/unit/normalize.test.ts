import { describe, it, expect } from "vitest";
import { normalizePost, parseLegacyDate, parseIsoDate } from "../../src/core/normalize";
import { MalformedPayloadError } from "../../src/core/errors";
import { tweetResult } from "../helpers/fixtures";

const createdAt = new Date("2024-11-22T20:08:47Z");

describe("parseLegacyDate", () => {
  it("should parse the timeline timestamp format as UTC", () => {
    expect(parseLegacyDate("Fri Nov 22 20:08:47 +0000 2024")?.toISOString()).toBe("2024-11-22T20:08:47.000Z");
  });

  it("should apply a non-zero offset", () => {
    expect(parseLegacyDate("Fri Nov 22 22:08:47 +0200 2024")?.toISOString()).toBe("2024-11-22T20:08:47.000Z");
  });

  it("should reject other formats", () => {
    expect(parseLegacyDate("2024-11-22 20:08:47")).toBeNull();
    expect(parseLegacyDate("Fri Foo 22 20:08:47 +0000 2024")).toBeNull();
  });
});

describe("parseIsoDate", () => {
  it("should accept ISO timestamps with a zone", () => {
    expect(parseIsoDate("2024-11-22T20:08:47.500Z")?.toISOString()).toBe("2024-11-22T20:08:47.500Z");
  });

  it("should reject timestamps without a zone", () => {
    expect(parseIsoDate("2024-11-22T20:08:47")).toBeNull();
  });
});

describe("normalizePost (api)", () => {
  it("should map a GraphQL tweet result onto a post", () => {
    const payload = tweetResult({
      id: "1859999999999999999",
      createdAt,
      authorId: "42",
      handle: "alice",
      text: "hello",
      conversationId: "1859999999999999000",
      inReplyToId: "1859999999999999000",
      inReplyToAuthorId: "42",
    });

    const post = normalizePost({ source: "api", payload });

    expect(post).toEqual({
      id: "1859999999999999999",
      createdAt: new Date("2024-11-22T20:08:47Z"),
      authorId: "42",
      authorHandle: "alice",
      text: "hello",
      conversationId: "1859999999999999000",
      inReplyToId: "1859999999999999000",
      inReplyToAuthorId: "42",
      isRetweet: false,
      isQuote: false,
      hasMedia: false,
      isSelfThread: false,
      raw: payload,
    });
  });

  it("should default the conversation id to the post id", () => {
    const post = normalizePost({ source: "api", payload: tweetResult({ id: "77", createdAt }) });
    expect(post.conversationId).toBe("77");
    expect(post.inReplyToId).toBeNull();
  });

  it("should unwrap TweetWithVisibilityResults", () => {
    const inner = tweetResult({ id: "88", createdAt, authorId: "9" });
    const post = normalizePost({ source: "api", payload: { __typename: "TweetWithVisibilityResults", tweet: inner } });
    expect(post.id).toBe("88");
    expect(post.authorId).toBe("9");
  });

  it("should prefer long-form note text and detect media and retweets", () => {
    const post = normalizePost({
      source: "api",
      payload: tweetResult({
        id: "90",
        createdAt,
        text: "short",
        noteText: "the whole long text",
        retweet: true,
        mediaCount: 1,
      }),
    });

    expect(post.text).toBe("the whole long text");
    expect(post.hasMedia).toBe(true);
    expect(post.isRetweet).toBe(true);
  });

  it("should reject tombstones", () => {
    expect(() => normalizePost({ source: "api", payload: { __typename: "TweetTombstone" } })).toThrow(
      MalformedPayloadError
    );
  });

  it("should reject payloads without an author", () => {
    const payload = { rest_id: "5", legacy: { id_str: "5", created_at: "Fri Nov 22 20:08:47 +0000 2024" } };
    expect(() => normalizePost({ source: "api", payload })).toThrow("Tweet 5 has no author");
  });

  it("should report the field of an unparsable timestamp", () => {
    const payload = { rest_id: "5", legacy: { id_str: "5", user_id_str: "1", created_at: "yesterday" } };
    try {
      normalizePost({ source: "api", payload });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedPayloadError);
      expect(error instanceof MalformedPayloadError ? error.field : null).toBe("created_at");
    }
  });
});

describe("normalizePost (dom)", () => {
  it("should fall back to the lowercased handle as author id and truncate to seconds", () => {
    const post = normalizePost({
      source: "dom",
      payload: { id: "123", authorHandle: "@Alice", createdAt: "2024-11-22T20:08:47.500Z", text: "hi", mediaCount: 2 },
    });

    expect(post.authorId).toBe("alice");
    expect(post.authorHandle).toBe("Alice");
    expect(post.createdAt.toISOString()).toBe("2024-11-22T20:08:47.000Z");
    expect(post.conversationId).toBe("123");
    expect(post.hasMedia).toBe(true);
  });

  it("should reject records without a handle", () => {
    expect(() =>
      normalizePost({ source: "dom", payload: { id: "123", authorHandle: "", createdAt: "2024-11-22T20:08:47Z" } })
    ).toThrow(MalformedPayloadError);
  });
});
