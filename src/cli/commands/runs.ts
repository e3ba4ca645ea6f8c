import type { Command } from "commander";
import { z } from "zod";
import { runsRepo } from "../../db/repositories/runs.repo";
import { targetKey } from "../../domain/models";
import { parseTargetUrl } from "../../platforms/x/url-parser";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";
import { parsePositiveInt } from "../options";

const RunsListOptionsSchema = z.object({
  limit: z.number().int().positive().default(20),
  target: z.string().optional(),
});

export const commands = (program: Command) => {
  const runsCmd = program.command("runs").description("Inspect the collection run ledger");

  runsCmd
    .command("list")
    .option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
    .option("--target <url>", "Only runs for this target")
    .action(async (rawOptions: unknown) => {
      const options = RunsListOptionsSchema.parse(rawOptions);
      const key = options.target ? targetKey(parseTargetUrl(options.target).target) : undefined;

      try {
        const runs = await runsRepo.listRecent(options.limit, key);
        logger.info({ count: runs.length }, "Recent collection runs");

        for (const run of runs) {
          const statusIcon = run.status === "complete" ? "✓" : run.status === "incomplete" ? "✗" : "○";
          const reason = run.stopReason ? ` (${run.stopReason})` : "";
          console.log(
            `  ${statusIcon} [${run.id}] ${run.targetKey} via ${run.backend} - ${run.status}${reason} - ${new Date(run.startedAt * 1000).toISOString()}`
          );
          console.log(
            `      ${run.pagesFetched} pages, ${run.postsSeen} seen, ${run.postsNew} new, ${run.threadPostsNew} thread, ${run.postsMalformed} malformed`
          );
          if (run.errorCode) {
            console.log(`      ${run.errorCode}: ${run.errorDetail ?? ""}`);
          }
        }
      } finally {
        closeDb();
      }
    });
};
