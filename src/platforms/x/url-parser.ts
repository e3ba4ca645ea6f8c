import type { Target } from "../../domain/models";
import { TargetParseError } from "../../core/errors";

const SUPPORTED_HOSTS = new Set(["x.com", "twitter.com", "www.x.com", "www.twitter.com", "mobile.x.com", "mobile.twitter.com"]);

// Top-level paths that are app routes, not profiles.
const RESERVED_PATHS = new Set([
  "i",
  "home",
  "explore",
  "search",
  "notifications",
  "messages",
  "settings",
  "compose",
  "intent",
]);

const LIST_PATH_RE = /^\/i\/lists\/(\d+)\/?$/;
const STATUS_PATH_RE = /^\/(?:i\/web|i|@?[A-Za-z0-9_]{1,15})\/status(?:es)?\/(\d+)(?:\/.*)?$/;
const USER_PATH_RE = /^\/@?([A-Za-z0-9_]{1,15})(?:\/(?:with_replies)?)?$/;
const HANDLE_RE = /^@([A-Za-z0-9_]{1,15})$/;

export interface ParsedTarget {
  target: Target;
  /** The input the target was parsed from, kept as the ledger label. */
  label: string;
}

/**
 * Resolves an X URL (list, profile or status) or an `@handle` into a target.
 * Throws TargetParseError for anything else.
 */
export function parseTargetUrl(input: string): ParsedTarget {
  const label = input.trim();

  const handle = HANDLE_RE.exec(label);
  if (handle?.[1]) {
    return { target: { kind: "user", user: handle[1] }, label };
  }

  let url: URL;
  try {
    url = new URL(/^https?:\/\//i.test(label) ? label : `https://${label}`);
  } catch {
    throw new TargetParseError(`Not a URL: ${input}`);
  }

  if (!SUPPORTED_HOSTS.has(url.hostname.toLowerCase())) {
    throw new TargetParseError(`Unsupported domain: ${url.hostname}`, "UNSUPPORTED_DOMAIN");
  }

  const path = url.pathname;

  const list = LIST_PATH_RE.exec(path);
  if (list?.[1]) {
    return { target: { kind: "list", listId: list[1] }, label };
  }

  const status = STATUS_PATH_RE.exec(path);
  if (status?.[1]) {
    return { target: { kind: "conversation", conversationId: status[1] }, label };
  }

  const user = USER_PATH_RE.exec(path);
  if (user?.[1] && !RESERVED_PATHS.has(user[1].toLowerCase())) {
    return { target: { kind: "user", user: user[1] }, label };
  }

  throw new TargetParseError(`Unsupported or unrecognized X timeline URL: ${input}`);
}
