import { z } from "zod";
import type { Post, PostSource, RawPost } from "../domain/models";
import { MalformedPayloadError } from "./errors";

const MONTHS: Record<string, number> = {
  Jan: 0,
  Feb: 1,
  Mar: 2,
  Apr: 3,
  May: 4,
  Jun: 5,
  Jul: 6,
  Aug: 7,
  Sep: 8,
  Oct: 9,
  Nov: 10,
  Dec: 11,
};

// e.g. "Fri Nov 22 20:08:47 +0000 2024"
const LEGACY_DATE_RE = /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export function parseLegacyDate(value: string): Date | null {
  const m = LEGACY_DATE_RE.exec(value.trim());
  if (!m) return null;
  const [, monthName, day, hh, mm, ss, sign, offH, offM, year] = m;
  const month = monthName ? MONTHS[monthName] : undefined;
  if (month === undefined) return null;

  const utc = Date.UTC(Number(year), month, Number(day), Number(hh), Number(mm), Number(ss));
  const offsetMinutes = (Number(offH) * 60 + Number(offM)) * (sign === "-" ? -1 : 1);
  const date = new Date(utc - offsetMinutes * 60_000);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_RE.test(value.trim())) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

// Stored timestamps have second resolution; truncating here keeps in-memory and stored ordering identical.
function toWholeSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

const idString = z.union([z.string(), z.number().int()]).transform((v) => String(v));

const UserResultSchema = z.object({
  rest_id: idString.optional(),
  core: z.object({ screen_name: z.string().optional() }).optional(),
  legacy: z.object({ screen_name: z.string().optional() }).optional(),
});

const LegacyTweetSchema = z.object({
  id_str: idString.optional(),
  created_at: z.string().optional(),
  full_text: z.string().optional(),
  user_id_str: idString.optional(),
  conversation_id_str: idString.nullish(),
  in_reply_to_status_id_str: idString.nullish(),
  in_reply_to_user_id_str: idString.nullish(),
  is_quote_status: z.boolean().optional(),
  retweeted_status_result: z.unknown().optional(),
  extended_entities: z.object({ media: z.array(z.unknown()).optional() }).optional(),
});

const GraphqlTweetSchema = z.object({
  __typename: z.string().optional(),
  rest_id: idString.optional(),
  core: z.object({ user_results: z.object({ result: UserResultSchema.optional() }).optional() }).optional(),
  legacy: LegacyTweetSchema.optional(),
  note_tweet: z
    .object({
      note_tweet_results: z.object({ result: z.object({ text: z.string().optional() }).optional() }).optional(),
    })
    .optional(),
});

const VisibilityWrapperSchema = z.object({
  __typename: z.literal("TweetWithVisibilityResults"),
  tweet: z.unknown(),
});

const DomPostSchema = z.object({
  id: idString,
  authorHandle: z.string().min(1),
  authorId: idString.optional(),
  createdAt: z.string(),
  text: z.string().optional(),
  url: z.string().optional(),
  conversationId: idString.nullish(),
  inReplyToId: idString.nullish(),
  inReplyToAuthorId: idString.nullish(),
  isRetweet: z.boolean().optional(),
  isQuote: z.boolean().optional(),
  mediaCount: z.number().int().nonnegative().optional(),
});

export function unwrapTweetResult(payload: unknown): unknown {
  const wrapped = VisibilityWrapperSchema.safeParse(payload);
  return wrapped.success ? wrapped.data.tweet : payload;
}

function normalizeApiPost(payload: unknown): Post {
  const parsed = GraphqlTweetSchema.safeParse(unwrapTweetResult(payload));
  if (!parsed.success) {
    throw new MalformedPayloadError(`Unrecognized tweet payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const tweet = parsed.data;
  if (tweet.__typename === "TweetTombstone") {
    throw new MalformedPayloadError("Tweet is a tombstone", "MALFORMED_PAYLOAD", "__typename");
  }

  const legacy: z.infer<typeof LegacyTweetSchema> = tweet.legacy ?? {};
  const user = tweet.core?.user_results?.result;

  const id = legacy.id_str ?? tweet.rest_id;
  if (!id) throw new MalformedPayloadError("Tweet has no id", "MALFORMED_PAYLOAD", "id");

  const authorId = user?.rest_id ?? legacy.user_id_str;
  if (!authorId) throw new MalformedPayloadError(`Tweet ${id} has no author`, "MALFORMED_PAYLOAD", "author");

  const createdAt = legacy.created_at ? parseLegacyDate(legacy.created_at) : null;
  if (!createdAt) {
    throw new MalformedPayloadError(`Tweet ${id} has no parsable created_at`, "MALFORMED_PAYLOAD", "created_at");
  }

  const noteText = tweet.note_tweet?.note_tweet_results?.result?.text;

  return {
    id,
    createdAt: toWholeSeconds(createdAt),
    authorId,
    authorHandle: user?.core?.screen_name ?? user?.legacy?.screen_name ?? "",
    text: noteText || legacy.full_text || "",
    conversationId: legacy.conversation_id_str ?? id,
    inReplyToId: legacy.in_reply_to_status_id_str ?? null,
    inReplyToAuthorId: legacy.in_reply_to_user_id_str ?? null,
    isRetweet: legacy.retweeted_status_result !== undefined,
    isQuote: legacy.is_quote_status ?? false,
    hasMedia: (legacy.extended_entities?.media?.length ?? 0) > 0,
    isSelfThread: false,
    raw: payload,
  };
}

function normalizeDomPost(payload: unknown): Post {
  const parsed = DomPostSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedPayloadError(
      `Unrecognized scraped post: ${issue?.message ?? "invalid"}`,
      "MALFORMED_PAYLOAD",
      issue?.path.join(".")
    );
  }

  const data = parsed.data;
  const createdAt = parseIsoDate(data.createdAt) ?? parseLegacyDate(data.createdAt);
  if (!createdAt) {
    throw new MalformedPayloadError(`Post ${data.id} has no parsable created_at`, "MALFORMED_PAYLOAD", "created_at");
  }

  const handle = data.authorHandle.replace(/^@/, "");

  return {
    id: data.id,
    createdAt: toWholeSeconds(createdAt),
    authorId: data.authorId ?? handle.toLowerCase(),
    authorHandle: handle,
    text: data.text ?? "",
    conversationId: data.conversationId ?? data.id,
    inReplyToId: data.inReplyToId ?? null,
    inReplyToAuthorId: data.inReplyToAuthorId ?? null,
    isRetweet: data.isRetweet ?? false,
    isQuote: data.isQuote ?? false,
    hasMedia: (data.mediaCount ?? 0) > 0,
    isSelfThread: false,
    raw: payload,
  };
}

const normalizers: Record<PostSource, (payload: unknown) => Post> = {
  api: normalizeApiPost,
  dom: normalizeDomPost,
};

/** Converts one backend payload into a canonical post. Throws MalformedPayloadError. */
export function normalizePost(raw: RawPost): Post {
  return normalizers[raw.source](raw.payload);
}
