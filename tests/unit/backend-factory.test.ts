import { describe, it, expect } from "vitest";
import { createBackend, XApiBackend, XBrowserBackend } from "../../src/platforms/x";
import { detectBlockChallenge } from "../../src/services/browser-session";
import { AuthError, ConfigError } from "../../src/core/errors";
import { loginRequiredError } from "../../src/platforms/x/browser.backend";

const apiConfig = {
  X_AUTH_TOKEN: "test-auth",
  X_CT0: "test-ct0",
  X_BEARER_TOKEN: "test-bearer",
  X_GRAPHQL_BASE_URL: "https://x.test/graphql",
  X_QUERY_ID_LIST_TIMELINE: "LQ",
  X_QUERY_ID_USER_TWEETS: "UQ",
  X_QUERY_ID_USER_BY_SCREEN_NAME: "SQ",
  X_QUERY_ID_TWEET_DETAIL: "DQ",
  X_PAGE_SIZE: 40,
  FETCH_TIMEOUT_MS: 30000,
  BROWSER_PROFILE_DIR: "./data/test-profile",
  PLAYWRIGHT_HEADLESS: true,
  PLAYWRIGHT_SLOW_MO: 0,
  PROXY_URL: undefined,
};

describe("createBackend", () => {
  it("should build the api backend from complete settings", () => {
    const backend = createBackend("api", apiConfig);
    expect(backend).toBeInstanceOf(XApiBackend);
    expect(backend.kind).toBe("api");
  });

  it("should name the first missing api setting", () => {
    expect(() => createBackend("api", { ...apiConfig, X_CT0: undefined })).toThrow(ConfigError);
    expect(() => createBackend("api", { ...apiConfig, X_QUERY_ID_TWEET_DETAIL: undefined })).toThrow(
      "X_QUERY_ID_TWEET_DETAIL must be set to use the api backend"
    );
  });

  it("should build the browser backend without credentials and without launching anything", () => {
    const backend = createBackend("browser", { ...apiConfig, X_AUTH_TOKEN: undefined });
    expect(backend).toBeInstanceOf(XBrowserBackend);
    expect(backend.kind).toBe("browser");
  });
});

describe("detectBlockChallenge", () => {
  it("should flag account access and challenge pages", () => {
    expect(detectBlockChallenge("https://x.com/account/access")).toEqual({
      isBlocked: true,
      reason: "BLOCK_DETECTED:url_pattern:/account/access",
    });
    expect(detectBlockChallenge("https://x.com/i/flow/login").isBlocked).toBe(true);
  });

  it("should let timelines through", () => {
    expect(detectBlockChallenge("https://x.com/i/lists/123")).toEqual({ isBlocked: false, reason: null });
  });
});

describe("loginRequiredError", () => {
  it("should point a never-used profile at the login command", () => {
    const error = loginRequiredError("./data/test-profile", true);
    expect(error).toBeInstanceOf(AuthError);
    expect(error.code).toBe("PROFILE_NOT_LOGGED_IN");
    expect(error.message).toBe(
      "Browser profile at ./data/test-profile has never been logged in; run `timeline-harvester login` first"
    );
  });

  it("should report an expired session on a used profile", () => {
    const error = loginRequiredError("./data/test-profile", false);
    expect(error.code).toBe("LOGIN_REQUIRED");
    expect(error.message).toBe(
      "X login required; run `timeline-harvester login` to sign in again with the profile at ./data/test-profile"
    );
  });
});
