import { desc, eq, and, lt } from "drizzle-orm";
import type { CollectionRunRow, NewCollectionRunRow } from "../schema";
import { collectionRuns } from "../schema";
import { getDb, type Db } from "../client";
import { logger } from "../../core/logger";
import type { CollectionSummary } from "../../domain/collection-types";

export class RunsRepository {
  constructor(private db: Db = getDb()) {}

  async createRun(data: NewCollectionRunRow): Promise<CollectionRunRow> {
    const result = await this.db.insert(collectionRuns).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create collection run");
    }
    logger.info({ runId: result[0].id, targetKey: result[0].targetKey }, "Collection run created");
    return result[0];
  }

  async findById(id: number): Promise<CollectionRunRow | null> {
    const [result] = await this.db.select().from(collectionRuns).where(eq(collectionRuns.id, id)).limit(1);
    return result ?? null;
  }

  async listRecent(limit: number = 20, targetKey?: string): Promise<CollectionRunRow[]> {
    return this.db
      .select()
      .from(collectionRuns)
      .where(targetKey ? eq(collectionRuns.targetKey, targetKey) : undefined)
      .orderBy(desc(collectionRuns.startedAt), desc(collectionRuns.id))
      .limit(limit);
  }

  async finishRun(id: number, summary: CollectionSummary): Promise<CollectionRunRow | null> {
    const [result] = await this.db
      .update(collectionRuns)
      .set({
        endedAt: Math.floor(Date.now() / 1000),
        status: summary.status === "running" ? "incomplete" : summary.status,
        stopReason: summary.stopReason,
        pagesFetched: summary.pagesFetched,
        postsSeen: summary.postsSeen,
        postsNew: summary.postsNew,
        postsMalformed: summary.postsMalformed,
        threadPostsNew: summary.threadPostsNew,
        errorCode: summary.error?.code ?? null,
        errorDetail: summary.error?.message ?? null,
      })
      .where(eq(collectionRuns.id, id))
      .returning();
    logger.debug({ runId: id, status: result?.status }, "Collection run finished");
    return result ?? null;
  }

  /** Marks runs left in `running` by a crashed process as incomplete. */
  async recoverStaleRuns(olderThanSeconds: number): Promise<number> {
    const cutoff = Math.floor(Date.now() / 1000) - olderThanSeconds;
    const recovered = await this.db
      .update(collectionRuns)
      .set({
        status: "incomplete",
        endedAt: Math.floor(Date.now() / 1000),
        errorCode: "RUN_ABANDONED",
        errorDetail: `Run still marked running after ${olderThanSeconds}s`,
      })
      .where(and(eq(collectionRuns.status, "running"), lt(collectionRuns.startedAt, cutoff)))
      .returning({ id: collectionRuns.id });
    return recovered.length;
  }
}

export const runsRepo = new RunsRepository();
