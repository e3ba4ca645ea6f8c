import { eq } from "drizzle-orm";
import type { TargetRow } from "../schema";
import { targets } from "../schema";
import type { Db } from "../client";
import { logger } from "../../core/logger";
import type { Target } from "../../domain/models";
import { targetKey } from "../../domain/models";
import type { TargetRecord } from "../../domain/store";

function fromTargetRow(row: TargetRow): TargetRecord {
  return {
    key: row.key,
    kind: row.kind,
    label: row.label,
    firstCollectedAt: new Date(row.firstCollectedAt * 1000),
    lastCollectedAt: new Date(row.lastCollectedAt * 1000),
    newestPostId: row.newestPostId,
    oldestPostId: row.oldestPostId,
  };
}

/** Ledger of every target a run has been started for. Used through PostsRepository. */
export class TargetsRepository {
  constructor(private db: Db) {}

  record(target: Target, label: string): TargetRecord {
    const now = Math.floor(Date.now() / 1000);
    const key = targetKey(target);

    const [row] = this.db
      .insert(targets)
      .values({ key, kind: target.kind, label, firstCollectedAt: now, lastCollectedAt: now })
      .onConflictDoUpdate({ target: targets.key, set: { lastCollectedAt: now, label } })
      .returning()
      .all();

    if (!row) {
      throw new Error(`Failed to record target ${key}`);
    }
    logger.debug({ key, label }, "Target recorded");
    return fromTargetRow(row);
  }

  find(target: Target): TargetRecord | null {
    const row = this.db.select().from(targets).where(eq(targets.key, targetKey(target))).limit(1).get();
    return row ? fromTargetRow(row) : null;
  }

  setBounds(key: string, newestPostId: string | null, oldestPostId: string | null): void {
    this.db.update(targets).set({ newestPostId, oldestPostId }).where(eq(targets.key, key)).run();
  }
}
