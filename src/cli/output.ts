import type { Post } from "../domain/models";

export type OutputFormat = "json" | "pretty" | "text";

export function postToJson(post: Post): Record<string, unknown> {
  return {
    id: post.id,
    created_at: post.createdAt.toISOString(),
    author_id: post.authorId,
    author_handle: post.authorHandle,
    text: post.text,
    conversation_id: post.conversationId,
    in_reply_to_id: post.inReplyToId,
    in_reply_to_author_id: post.inReplyToAuthorId,
    is_retweet: post.isRetweet,
    is_quote: post.isQuote,
    has_media: post.hasMedia,
    is_self_thread: post.isSelfThread,
    raw: post.raw,
  };
}

export function formatPostJson(post: Post, pretty = false): string {
  return JSON.stringify(postToJson(post), null, pretty ? 2 : undefined);
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

/**
 * Plain-text digest for reading or pasting into a summarizer. Posts that share a
 * conversation with another listed post link to the conversation root.
 */
export function formatTextDigest(posts: readonly Post[]): string {
  const perConversation = new Map<string, number>();
  for (const post of posts) {
    perConversation.set(post.conversationId, (perConversation.get(post.conversationId) ?? 0) + 1);
  }

  return posts
    .map((post) => {
      const handle = post.authorHandle || post.authorId;
      const inThread = (perConversation.get(post.conversationId) ?? 0) > 1;
      const url = `https://x.com/${handle}/status/${inThread ? post.conversationId : post.id}`;
      const header = `@${handle} @ ${formatTimestamp(post.createdAt)} - ${inThread ? "[thread] " : ""}${url}`;
      return `${header}\n${post.text}`;
    })
    .join("\n\n------\n\n");
}

export function formatPosts(posts: readonly Post[], format: OutputFormat): string {
  if (format === "text") return formatTextDigest(posts);
  return posts.map((post) => formatPostJson(post, format === "pretty")).join("\n");
}
