import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { PostsRepository } from "../../src/db/repositories/posts.repo";
import type { RawPost } from "../../src/domain/models";
import { ThreadReconstructor } from "../../src/orchestration/thread-reconstructor";
import { ThreadExpansionError } from "../../src/core/errors";
import { FAST_RETRY, FakeBackend, apiTweet, createTestStore, makePost, minutesAfterBase } from "../helpers/fixtures";

const A = "100";
const B = "200";

/** A conversation post without the reply-author hint, the way scraped pages often arrive. */
function post(id: number, conversationId: number, authorId: string, inReplyTo?: number): RawPost {
  return apiTweet({
    id: String(id),
    createdAt: minutesAfterBase(id),
    authorId,
    conversationId: String(conversationId),
    inReplyToId: inReplyTo === undefined ? undefined : String(inReplyTo),
  });
}

describe("ThreadReconstructor", () => {
  let store: PostsRepository;
  let close: () => void;

  beforeEach(() => {
    const testStore = createTestStore();
    store = testStore.store;
    close = () => testStore.handle.sqlite.close();
  });

  afterEach(() => close());

  const reconstructor = (conversations: Record<string, RawPost[] | Error>) => {
    const backend = new FakeBackend([], conversations);
    return { backend, threads: new ThreadReconstructor(backend, store, { retry: FAST_RETRY }) };
  };

  describe("isSelfReply", () => {
    const threads = () => reconstructor({}).threads;

    it("should trust the reply author carried by the post", async () => {
      const reply = makePost({ id: "2", createdAt: minutesAfterBase(2), authorId: A, inReplyToId: "1", inReplyToAuthorId: A });
      const other = makePost({ id: "3", createdAt: minutesAfterBase(3), authorId: A, inReplyToId: "1", inReplyToAuthorId: B });

      expect(await threads().isSelfReply(reply)).toBe(true);
      expect(await threads().isSelfReply(other)).toBe(false);
    });

    it("should look the parent up among the run's posts and then the store", async () => {
      const parent = makePost({ id: "1", createdAt: minutesAfterBase(1), authorId: A });
      const reply = makePost({ id: "2", createdAt: minutesAfterBase(2), authorId: A, conversationId: "1", inReplyToId: "1" });

      expect(await threads().isSelfReply(reply, new Map([["1", parent]]))).toBe(true);

      await store.upsert(parent);
      expect(await threads().isSelfReply(reply)).toBe(true);
    });

    it("should fall back to the conversation root", async () => {
      await store.upsert(makePost({ id: "1", createdAt: minutesAfterBase(1), authorId: A }));
      const reply = makePost({ id: "5", createdAt: minutesAfterBase(5), authorId: A, conversationId: "1", inReplyToId: "4" });

      expect(await threads().isSelfReply(reply)).toBe(true);
    });

    it("should answer false without any knowledge of the parent", async () => {
      const reply = makePost({ id: "5", createdAt: minutesAfterBase(5), authorId: A, conversationId: "1", inReplyToId: "4" });
      const standalone = makePost({ id: "6", createdAt: minutesAfterBase(6), authorId: A });

      expect(await threads().isSelfReply(reply)).toBe(false);
      expect(await threads().isSelfReply(standalone)).toBe(false);
    });
  });

  describe("reconstruct", () => {
    it("should stop the chain where the author answers someone else", async () => {
      const { threads } = reconstructor({
        "1": [post(4, 1, A, 3), post(3, 1, B, 2), post(2, 1, A, 1), post(1, 1, A)],
      });

      const result = await threads.reconstruct("1", "list:9");

      expect(result.posts.map((p) => p.id)).toEqual(["1", "2", "3", "4"]);
      expect(result.chainIds).toEqual(["1", "2"]);
      expect(result.inserted.map((p) => p.id)).toEqual(["1", "2", "3", "4"]);
      expect(result.posts.map((p) => p.isSelfThread)).toEqual([true, true, false, false]);
      expect((await store.get("4"))?.isSelfThread).toBe(false);
      expect(await store.countFor({ kind: "list", listId: "9" })).toBe(4);
    });

    it("should not flag a lone post as a thread", async () => {
      const { threads } = reconstructor({ "1": [post(1, 1, A), post(2, 1, B, 1)] });

      const result = await threads.reconstruct("1");

      expect(result.chainIds).toEqual([]);
      expect((await store.get("1"))?.isSelfThread).toBe(false);
    });

    it("should mark a stored root the fetch no longer returns", async () => {
      await store.upsert(makePost({ id: "50", createdAt: minutesAfterBase(50), authorId: A }));
      const { threads } = reconstructor({ "50": [post(52, 50, A, 51), post(51, 50, A, 50)] });

      const result = await threads.reconstruct("50");

      expect(result.chainIds).toEqual(["50", "51", "52"]);
      expect(result.inserted.map((p) => p.id)).toEqual(["51", "52"]);
      expect((await store.get("50"))?.isSelfThread).toBe(true);
    });

    it("should skip duplicates and malformed records", async () => {
      const broken: RawPost = { source: "api", payload: { rest_id: "9" } };
      const { threads } = reconstructor({ "1": [post(1, 1, A), broken, post(2, 1, A, 1), post(2, 1, A, 1)] });

      const result = await threads.reconstruct("1");

      expect(result.malformed).toBe(1);
      expect(result.posts.map((p) => p.id)).toEqual(["1", "2"]);
    });

    it("should report a failed fetch as ThreadExpansionError after retrying", async () => {
      const { backend, threads } = reconstructor({ "1": new Error("rate limited") });

      const failure = threads.reconstruct("1");

      await expect(failure).rejects.toBeInstanceOf(ThreadExpansionError);
      await expect(failure).rejects.toMatchObject({
        conversationId: "1",
        message: "Could not fetch conversation 1: rate limited",
      });
      expect(backend.conversationCalls).toEqual(["1", "1", "1"]);
    });
  });
});
