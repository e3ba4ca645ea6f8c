import type { Command } from "commander";
import { z } from "zod";
import { parseTargetUrl, createBackend } from "../../platforms/x";
import { CollectCoordinator } from "../../orchestration/collect-coordinator";
import { DEFAULT_COLLECT_RETRY } from "../../orchestration/timeline-collector";
import { postsRepo } from "../../db/repositories/posts.repo";
import { runsRepo } from "../../db/repositories/runs.repo";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";
import { env } from "../../core/config";
import { parseDuration, parsePositiveInt } from "../options";
import { formatPostJson } from "../output";

const ScrapeOptionsSchema = z.object({
  limit: z.number().int().positive().optional(),
  old: z.number().int().positive().optional(),
  maxPages: z.number().int().positive().optional(),
  expandThreads: z.boolean().default(false),
  backend: z.enum(["api", "browser"]).optional(),
  pretty: z.boolean().default(false),
});

export const commands = (program: Command) => {
  program
    .command("scrape")
    .description("Collect new posts from a list, profile or conversation URL")
    .argument("<url>", "x.com list, profile or status URL (or @handle)")
    .option("--limit <n>", "Stop after this many new posts", parsePositiveInt)
    .option("--old <duration>", "Only collect posts newer than this (7d, 24h, 30m)", parseDuration)
    .option("--max-pages <n>", "Stop after this many pages", parsePositiveInt)
    .option("--expand-threads", "Fetch whole self-threads when a self-reply is seen")
    .option("--backend <kind>", "api or browser (default FETCH_BACKEND)")
    .option("--pretty", "Indent JSON output")
    .action(async (url: string, rawOptions: unknown) => {
      const options = ScrapeOptionsSchema.parse(rawOptions);
      const { target, label } = parseTargetUrl(url);
      const backend = createBackend(options.backend ?? env.FETCH_BACKEND, env);

      const coordinator = new CollectCoordinator({
        backend,
        store: postsRepo,
        runs: runsRepo,
        runTimeoutSeconds: env.RUN_TIMEOUT_SECONDS,
      });

      const controller = new AbortController();
      const onSigint = () => {
        logger.warn("Interrupted, stopping after the current page");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const { runId, summary } = await coordinator.run(target, {
          maxCount: options.limit,
          maxAgeMs: options.old,
          maxPages: options.maxPages,
          expandThreads: options.expandThreads,
          retry: {
            ...DEFAULT_COLLECT_RETRY,
            maxAttempts: env.FETCH_RETRY_ATTEMPTS,
            baseDelayMs: env.FETCH_RETRY_BASE_DELAY_MS,
            maxDelayMs: env.FETCH_RETRY_MAX_DELAY_MS,
            maxRateLimitWaitMs: env.FETCH_RATE_LIMIT_MAX_WAIT_MS,
          },
          threadDelay: { minMs: env.THREAD_EXPANSION_DELAY_MIN_MS, maxMs: env.THREAD_EXPANSION_DELAY_MAX_MS },
          label,
          signal: controller.signal,
          onPost: (post) => {
            process.stdout.write(`${formatPostJson(post, options.pretty)}\n`);
          },
          onWarning: (warning) => logger.warn({ warning }, "Collection warning"),
        });

        logger.info(
          {
            runId,
            target: summary.targetKey,
            status: summary.status,
            stopReason: summary.stopReason,
            pages: summary.pagesFetched,
            newPosts: summary.postsNew,
            threadPosts: summary.threadPostsNew,
            malformed: summary.postsMalformed,
            error: summary.error,
          },
          "Scrape finished"
        );

        process.exitCode = summary.status === "complete" ? 0 : 1;
      } finally {
        process.removeListener("SIGINT", onSigint);
        await backend.close();
        closeDb();
      }
    });
};
