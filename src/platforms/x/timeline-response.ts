import { z } from "zod";

const ItemContentSchema = z.object({
  itemType: z.string().optional(),
  __typename: z.string().optional(),
  tweet_results: z.object({ result: z.unknown().optional() }).optional(),
  cursorType: z.string().optional(),
  value: z.string().optional(),
});
type ItemContent = z.infer<typeof ItemContentSchema>;

const ModuleItemSchema = z.object({
  entryId: z.string().optional(),
  item: z.object({ itemContent: ItemContentSchema.optional() }).optional(),
  itemContent: ItemContentSchema.optional(),
});

const EntrySchema = z.object({
  entryId: z.string().default(""),
  content: z
    .object({
      entryType: z.string().optional(),
      __typename: z.string().optional(),
      itemContent: ItemContentSchema.optional(),
      items: z.array(ModuleItemSchema).optional(),
      cursorType: z.string().optional(),
      value: z.string().optional(),
    })
    .optional(),
});
type Entry = z.infer<typeof EntrySchema>;

const InstructionSchema = z.object({
  type: z.string().optional(),
  entries: z.array(z.unknown()).optional(),
  entry: z.unknown().optional(),
});

const TypenameSchema = z.object({ __typename: z.string().optional() });

const UserByScreenNameSchema = z.object({
  data: z.object({
    user: z.object({ result: z.object({ rest_id: z.string() }).optional() }).optional(),
  }),
});

// Where each GraphQL operation keeps its timeline instructions.
const INSTRUCTION_PATHS: readonly (readonly string[])[] = [
  ["data", "list", "tweets_timeline", "timeline", "instructions"],
  ["data", "user", "result", "timeline_v2", "timeline", "instructions"],
  ["data", "user", "result", "timeline", "timeline", "instructions"],
  ["data", "user", "result", "timeline", "instructions"],
  ["data", "threaded_conversation_with_injections_v2", "instructions"],
];

export interface TimelineExtraction {
  /** Tweet results in response order, wrappers left in place for the normalizer. */
  results: unknown[];
  bottomCursor: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function valueAt(root: unknown, path: readonly string[]): unknown {
  let current = root;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function findInstructions(response: unknown): unknown[] {
  for (const path of INSTRUCTION_PATHS) {
    const instructions = valueAt(response, path);
    if (Array.isArray(instructions) && instructions.length > 0) return instructions;
  }
  return [];
}

function isTombstone(result: unknown): boolean {
  const parsed = TypenameSchema.safeParse(result);
  return parsed.success && parsed.data.__typename === "TweetTombstone";
}

function tweetResultOf(itemContent: ItemContent | undefined): unknown {
  if (!itemContent) return undefined;
  const type = itemContent.itemType ?? itemContent.__typename;
  if (type !== "TimelineTweet") return undefined;
  const result = itemContent.tweet_results?.result;
  return result === undefined || isTombstone(result) ? undefined : result;
}

function bottomCursorOf(entry: Entry): string | null {
  const content = entry.content;
  if (!content) return null;
  if (entry.entryId.startsWith("cursor-bottom") || content.cursorType === "Bottom") {
    return content.value ?? null;
  }
  const item = content.itemContent;
  if (item?.cursorType === "Bottom" || item?.cursorType === "ShowMoreThreads") {
    return item.value ?? null;
  }
  return null;
}

function entriesOf(instruction: unknown): Entry[] {
  const parsed = InstructionSchema.safeParse(instruction);
  if (!parsed.success) return [];
  const raw = [...(parsed.data.entries ?? []), ...(parsed.data.entry !== undefined ? [parsed.data.entry] : [])];

  const entries: Entry[] = [];
  for (const candidate of raw) {
    const entry = EntrySchema.safeParse(candidate);
    if (entry.success) entries.push(entry.data);
  }
  return entries;
}

/**
 * Pulls tweet results and the bottom cursor out of a list, user or TweetDetail
 * timeline response. Promoted entries and tombstones are left out.
 */
export function extractTimeline(response: unknown): TimelineExtraction {
  const results: unknown[] = [];
  let bottomCursor: string | null = null;

  for (const instruction of findInstructions(response)) {
    for (const entry of entriesOf(instruction)) {
      const cursor = bottomCursorOf(entry);
      if (cursor !== null) {
        bottomCursor = cursor;
        continue;
      }
      if (entry.entryId.startsWith("cursor-") || entry.entryId.startsWith("promoted-")) continue;

      const content = entry.content;
      if (!content) continue;

      const contentType = content.entryType ?? content.__typename;
      if (contentType === "TimelineTimelineModule") {
        for (const item of content.items ?? []) {
          const itemContent = item.item?.itemContent ?? item.itemContent;
          const itemCursor = itemContent?.cursorType === "ShowMoreThreads" ? itemContent.value : undefined;
          if (itemCursor) bottomCursor = itemCursor;
          const result = tweetResultOf(itemContent);
          if (result !== undefined) results.push(result);
        }
        continue;
      }

      const result = tweetResultOf(content.itemContent);
      if (result !== undefined) results.push(result);
    }
  }

  return { results, bottomCursor };
}

export function extractUserId(response: unknown): string | null {
  const parsed = UserByScreenNameSchema.safeParse(response);
  return parsed.success ? parsed.data.data.user?.result?.rest_id ?? null : null;
}

const OPERATION_RE = /\/graphql\/[^/]+\/([^/?]+)/;

/** `https://x.com/i/api/graphql/<queryId>/UserTweets?...` → `UserTweets`. */
export function graphqlOperation(url: string): string | null {
  return OPERATION_RE.exec(url)?.[1] ?? null;
}
