import type { Command } from "commander";
import { z } from "zod";
import { parseTargetUrl } from "../../platforms/x/url-parser";
import { postQueryService } from "../../services/post-query.service";
import { ReadOrderSchema } from "../../domain/models";
import { closeDb } from "../../db/client";
import { parsePositiveInt } from "../options";
import { formatPosts } from "../output";

const FormatSchema = z.enum(["json", "pretty", "text"]);

const ViewOptionsSchema = z.object({
  limit: z.number().int().positive().optional(),
  order: ReadOrderSchema.default("newest"),
  retweets: z.boolean().default(true),
  conversation: z.string().regex(/^\d+$/, "conversation must be a numeric post id").optional(),
  threadOnly: z.boolean().default(false),
  format: FormatSchema.default("json"),
});

const ThreadOptionsSchema = z.object({
  threadOnly: z.boolean().default(false),
  format: FormatSchema.default("json"),
});

function print(output: string): void {
  if (output.length > 0) process.stdout.write(`${output}\n`);
}

export const commands = (program: Command) => {
  program
    .command("view")
    .description("Print stored posts for a target without touching the network")
    .argument("<url>", "x.com list, profile or status URL (or @handle)")
    .option("--limit <n>", "Maximum posts to print", parsePositiveInt)
    .option("--order <order>", "newest or oldest", "newest")
    .option("--no-retweets", "Leave out retweets")
    .option("--conversation <id>", "Only posts from this conversation")
    .option("--thread-only", "Only posts marked as part of a self-thread")
    .option("--format <format>", "json, pretty or text", "json")
    .action(async (url: string, rawOptions: unknown) => {
      const options = ViewOptionsSchema.parse(rawOptions);
      const { target } = parseTargetUrl(url);
      try {
        const posts = await postQueryService.view(target, {
          order: options.order,
          limit: options.limit,
          excludeRetweets: !options.retweets,
          conversationId: options.conversation,
          selfThreadOnly: options.threadOnly,
        });
        print(formatPosts(posts, options.format));
      } finally {
        closeDb();
      }
    });

  program
    .command("thread")
    .description("Print a stored conversation, oldest first")
    .argument("<id>", "conversation root post id")
    .option("--thread-only", "Only the author's self-thread")
    .option("--format <format>", "json, pretty or text", "json")
    .action(async (id: string, rawOptions: unknown) => {
      const options = ThreadOptionsSchema.parse(rawOptions);
      const conversationId = z.string().regex(/^\d+$/, "id must be a numeric post id").parse(id);
      try {
        const posts = await postQueryService.thread(conversationId, { selfThreadOnly: options.threadOnly });
        print(formatPosts(posts, options.format));
      } finally {
        closeDb();
      }
    });

  program
    .command("stats")
    .description("Show what is stored for a target")
    .argument("<url>", "x.com list, profile or status URL (or @handle)")
    .action(async (url: string) => {
      const { target } = parseTargetUrl(url);
      try {
        const { target: record, storedCount } = await postQueryService.stats(target);
        console.log(`${record.key} (${record.label})`);
        console.log(`  stored posts:   ${storedCount}`);
        console.log(`  first collected: ${record.firstCollectedAt.toISOString()}`);
        console.log(`  last collected:  ${record.lastCollectedAt.toISOString()}`);
        console.log(`  newest id:      ${record.newestPostId ?? "-"}`);
        console.log(`  oldest id:      ${record.oldestPostId ?? "-"}`);
      } finally {
        closeDb();
      }
    });
};
