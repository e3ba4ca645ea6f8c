import type { Env } from "../../core/config";
import { ConfigError } from "../../core/errors";
import type { BackendKind, FetchBackend } from "../backend";
import { XApiBackend } from "./api.backend";
import { XBrowserBackend } from "./browser.backend";

export { XApiBackend } from "./api.backend";
export { XBrowserBackend } from "./browser.backend";
export { parseTargetUrl, type ParsedTarget } from "./url-parser";

type BackendEnv = Pick<
  Env,
  | "X_AUTH_TOKEN"
  | "X_CT0"
  | "X_BEARER_TOKEN"
  | "X_GRAPHQL_BASE_URL"
  | "X_QUERY_ID_LIST_TIMELINE"
  | "X_QUERY_ID_USER_TWEETS"
  | "X_QUERY_ID_USER_BY_SCREEN_NAME"
  | "X_QUERY_ID_TWEET_DETAIL"
  | "X_PAGE_SIZE"
  | "FETCH_TIMEOUT_MS"
  | "BROWSER_PROFILE_DIR"
  | "PLAYWRIGHT_HEADLESS"
  | "PLAYWRIGHT_SLOW_MO"
  | "PROXY_URL"
>;

function required(name: string, value: string | undefined): string {
  if (!value) throw new ConfigError(`${name} must be set to use the api backend`);
  return value;
}

/** Builds a backend from explicit configuration; nothing is launched or requested yet. */
export function createBackend(kind: BackendKind, config: BackendEnv): FetchBackend {
  if (kind === "browser") {
    return new XBrowserBackend({
      profileDir: config.BROWSER_PROFILE_DIR,
      headless: config.PLAYWRIGHT_HEADLESS,
      slowMo: config.PLAYWRIGHT_SLOW_MO,
      proxyUrl: config.PROXY_URL,
      navigationTimeoutMs: config.FETCH_TIMEOUT_MS,
      scrollDelay: { minMs: 2500, maxMs: 4500 },
      maxIdleScrolls: 5,
    });
  }

  return new XApiBackend({
    authToken: required("X_AUTH_TOKEN", config.X_AUTH_TOKEN),
    ct0: required("X_CT0", config.X_CT0),
    bearerToken: required("X_BEARER_TOKEN", config.X_BEARER_TOKEN),
    baseUrl: config.X_GRAPHQL_BASE_URL,
    queryIds: {
      listTimeline: required("X_QUERY_ID_LIST_TIMELINE", config.X_QUERY_ID_LIST_TIMELINE),
      userTweets: required("X_QUERY_ID_USER_TWEETS", config.X_QUERY_ID_USER_TWEETS),
      userByScreenName: required("X_QUERY_ID_USER_BY_SCREEN_NAME", config.X_QUERY_ID_USER_BY_SCREEN_NAME),
      tweetDetail: required("X_QUERY_ID_TWEET_DETAIL", config.X_QUERY_ID_TWEET_DETAIL),
    },
    pageSize: config.X_PAGE_SIZE,
    timeoutMs: config.FETCH_TIMEOUT_MS,
  });
}
