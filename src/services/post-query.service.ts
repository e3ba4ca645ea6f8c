import type { Post, ReadOptions, Target } from "../domain/models";
import { describeTarget } from "../domain/models";
import type { PostStore, TargetRecord } from "../domain/store";
import { postsRepo } from "../db/repositories/posts.repo";
import { NotFoundError } from "../core/errors";
import { logger } from "../core/logger";

export interface TargetStats {
  target: TargetRecord;
  storedCount: number;
}

/** Offline reads over collected posts. Never touches a backend. */
export class PostQueryService {
  constructor(private store: PostStore = postsRepo) {}

  /**
   * Stored posts for a target, newest first unless asked otherwise. A target that
   * was never collected is NotFound; one collected with no posts reads as empty.
   */
  async view(target: Target, options: ReadOptions = {}): Promise<Post[]> {
    await this.requireTarget(target);
    const posts = await this.store.read(target, { order: "newest", ...options });
    logger.debug({ target: describeTarget(target), count: posts.length }, "Read stored posts");
    return posts;
  }

  /** A stored conversation, oldest first. */
  async thread(conversationId: string, options: { selfThreadOnly?: boolean } = {}): Promise<Post[]> {
    const posts = await this.store.read(
      { kind: "conversation", conversationId },
      { order: "oldest", selfThreadOnly: options.selfThreadOnly }
    );
    if (posts.length === 0 && !(await this.store.has(conversationId))) {
      throw new NotFoundError(`No stored posts for conversation ${conversationId}`);
    }
    return posts;
  }

  async stats(target: Target): Promise<TargetStats> {
    const record = await this.requireTarget(target);
    return { target: record, storedCount: await this.store.countFor(target) };
  }

  private async requireTarget(target: Target): Promise<TargetRecord> {
    const record = await this.store.findTarget(target);
    if (!record) {
      throw new NotFoundError(`${describeTarget(target)} has never been collected`);
    }
    return record;
  }
}

export const postQueryService = new PostQueryService();
