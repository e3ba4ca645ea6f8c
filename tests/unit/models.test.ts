import { describe, it, expect } from "vitest";
import { compareIds, comparePostsOldestFirst, describeTarget, targetKey, type Post } from "../../src/domain/models";

function post(id: string, iso: string): Post {
  return {
    id,
    createdAt: new Date(iso),
    authorId: "1",
    authorHandle: "a",
    text: "",
    conversationId: id,
    inReplyToId: null,
    inReplyToAuthorId: null,
    isRetweet: false,
    isQuote: false,
    hasMedia: false,
    isSelfThread: false,
    raw: null,
  };
}

describe("compareIds", () => {
  it("should order decimal ids numerically", () => {
    expect(compareIds("99", "100")).toBeLessThan(0);
    expect(compareIds("1859999999999999999", "1859999999999999998")).toBeGreaterThan(0);
    expect(compareIds("42", "42")).toBe(0);
  });
});

describe("comparePostsOldestFirst", () => {
  it("should break timestamp ties by id", () => {
    const sorted = [post("100", "2024-01-01T00:00:00Z"), post("99", "2024-01-01T00:00:00Z"), post("5", "2023-12-31T00:00:00Z")]
      .sort(comparePostsOldestFirst)
      .map((p) => p.id);
    expect(sorted).toEqual(["5", "99", "100"]);
  });
});

describe("targetKey", () => {
  it("should build stable keys", () => {
    expect(targetKey({ kind: "list", listId: "123" })).toBe("list:123");
    expect(targetKey({ kind: "user", user: "@Alice" })).toBe("user:alice");
    expect(targetKey({ kind: "conversation", conversationId: "9" })).toBe("conversation:9");
  });

  it("should describe targets for people", () => {
    expect(describeTarget({ kind: "user", user: "Alice" })).toBe("user @Alice");
  });
});
