import type { Post, Target } from "../domain/models";
import { targetKey } from "../domain/models";
import type { PostStore } from "../domain/store";
import type { CollectOptions, CollectionSummary } from "../domain/collection-types";
import type { FetchBackend } from "../platforms/backend";
import type { RunsRepository } from "../db/repositories/runs.repo";
import { logger } from "../core/logger";
import { TimelineCollector } from "./timeline-collector";

export interface CollectCoordinatorDeps {
  backend: FetchBackend;
  store: PostStore;
  runs: RunsRepository;
  /** Runs still `running` after this long, or after a crash, are closed as incomplete. */
  runTimeoutSeconds: number;
}

export interface CoordinatedCollectOptions extends CollectOptions {
  onPost?: (post: Post) => void | Promise<void>;
}

export interface CoordinatedCollectResult {
  runId: number;
  summary: CollectionSummary;
}

/**
 * Wraps one collection run with a row in the run ledger and a run-wide timeout.
 * The timeout stops the run between pages, like a cancellation.
 */
export class CollectCoordinator {
  constructor(private deps: CollectCoordinatorDeps) {}

  async run(target: Target, options: CoordinatedCollectOptions = {}): Promise<CoordinatedCollectResult> {
    const { backend, store, runs, runTimeoutSeconds } = this.deps;
    const key = targetKey(target);

    try {
      const recovered = await runs.recoverStaleRuns(runTimeoutSeconds);
      if (recovered > 0) {
        logger.warn({ recovered, timeoutSeconds: runTimeoutSeconds }, "Recovered stale running collection runs");
      }
    } catch (error) {
      logger.error({ error }, "Failed to recover stale collection runs");
    }

    const run = await runs.createRun({
      targetKey: key,
      backend: backend.kind,
      startedAt: Math.floor(Date.now() / 1000),
      status: "running",
    });

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, runTimeoutSeconds * 1000);

    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const { onPost, ...collectOptions } = options;
    const collection = new TimelineCollector(backend, store).collect(target, {
      ...collectOptions,
      signal: controller.signal,
    });

    try {
      for await (const post of collection) {
        await onPost?.(post);
      }
    } catch (error) {
      await runs.finishRun(run.id, collection.summary);
      throw error;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    const summary = collection.summary;
    if (timedOut && summary.stopReason === "cancelled") {
      summary.stopReason = "timed_out";
      summary.error = { code: "RUN_TIMEOUT", message: `Run exceeded ${runTimeoutSeconds}s` };
    }

    await runs.finishRun(run.id, summary);
    logger.info({ runId: run.id, targetKey: key, status: summary.status, stopReason: summary.stopReason }, "Run recorded");

    return { runId: run.id, summary };
  }
}
