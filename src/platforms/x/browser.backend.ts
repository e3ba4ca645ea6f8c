import type { BrowserContext, Page, Response } from "playwright-core";
import type { RawPost, Target } from "../../domain/models";
import { targetKey } from "../../domain/models";
import type { Cursor, FetchBackend, FetchPage } from "../backend";
import { AuthError, BackendUnavailableError } from "../../core/errors";
import { actionDelay, type DelayRange } from "../../core/cooldown";
import { logger } from "../../core/logger";
import {
  closeContextSafely,
  detectBlockChallenge,
  isLoginRequired,
  launchPersistentContext,
} from "../../services/browser-session";
import { extractTimeline, graphqlOperation, type TimelineExtraction } from "./timeline-response";

const LIST_OPERATIONS = new Set(["ListLatestTweetsTimeline", "ListTimeline"]);
const USER_OPERATIONS = new Set(["UserTweets", "UserTweetsAndReplies"]);
const CONVERSATION_OPERATIONS = new Set(["TweetDetail"]);

export interface XBrowserBackendConfig {
  profileDir: string;
  headless: boolean;
  slowMo?: number;
  proxyUrl?: string;
  navigationTimeoutMs: number;
  /** Pause after each scroll while waiting for the next timeline response. */
  scrollDelay: DelayRange;
  /** Scrolls without a new response before the timeline counts as exhausted. */
  maxIdleScrolls: number;
}

interface TimelineSession {
  key: string;
  page: Page;
  pending: TimelineExtraction[];
  lastCursor: string | null;
}

/** Shape of a post scraped from a rendered article; see the `dom` normalizer. */
interface ScrapedArticle {
  id: string;
  authorHandle: string;
  createdAt: string;
  text: string;
  url: string;
  mediaCount: number;
  isRetweet: boolean;
}

function timelineUrl(target: Target): string {
  switch (target.kind) {
    case "list":
      return `https://x.com/i/lists/${target.listId}`;
    case "user":
      return `https://x.com/${target.user.replace(/^@/, "")}`;
    case "conversation":
      return `https://x.com/i/status/${target.conversationId}`;
  }
}

function operationsFor(target: Target): Set<string> {
  switch (target.kind) {
    case "list":
      return LIST_OPERATIONS;
    case "user":
      return USER_OPERATIONS;
    case "conversation":
      return CONVERSATION_OPERATIONS;
  }
}

/** A profile Chrome has never run with cannot hold a session yet. */
export function loginRequiredError(profileDir: string, freshProfile: boolean): AuthError {
  if (freshProfile) {
    return new AuthError(
      `Browser profile at ${profileDir} has never been logged in; run \`timeline-harvester login\` first`,
      "PROFILE_NOT_LOGGED_IN"
    );
  }
  return new AuthError(
    `X login required; run \`timeline-harvester login\` to sign in again with the profile at ${profileDir}`,
    "LOGIN_REQUIRED"
  );
}

function toRawPosts(results: unknown[]): RawPost[] {
  return results.map((payload): RawPost => ({ source: "api", payload }));
}

/**
 * Drives a logged-in Chrome profile and reads the GraphQL responses the X web
 * app fetches for itself. One intercepted timeline response is one page; the
 * cursor is that response's bottom cursor and is only valid for the open tab.
 */
export class XBrowserBackend implements FetchBackend {
  readonly kind = "browser";
  private context: BrowserContext | null = null;
  private freshProfile = false;
  private session: TimelineSession | null = null;

  constructor(private config: XBrowserBackendConfig) {}

  async fetchPage(target: Target, cursor: Cursor | null): Promise<FetchPage> {
    const key = targetKey(target);

    if (cursor === null) {
      await this.closeSession();
      this.session = await this.openSession(target);
    } else if (!this.session || this.session.key !== key || this.session.lastCursor !== cursor) {
      throw new BackendUnavailableError(
        `Cursor for ${key} belongs to a browser tab that is no longer open`,
        "CURSOR_EXPIRED"
      );
    }

    const session = this.session;
    if (!session) {
      throw new BackendUnavailableError(`No browser tab open for ${key}`, "SESSION_MISSING");
    }

    const extraction = await this.nextExtraction(session);
    if (!extraction || extraction.results.length === 0) {
      session.lastCursor = null;
      return { posts: [], nextCursor: null };
    }

    session.lastCursor = extraction.bottomCursor ?? `${key}:${Date.now()}`;
    return { posts: toRawPosts(extraction.results), nextCursor: session.lastCursor };
  }

  async fetchConversation(postId: string): Promise<RawPost[]> {
    const context = await this.ensureContext();
    const page = await context.newPage();
    const captured: TimelineExtraction[] = [];

    page.on("response", (response) => {
      this.capture(response, CONVERSATION_OPERATIONS, captured).catch((error: unknown) =>
        logger.warn({ error, postId }, "Failed to read conversation response")
      );
    });

    try {
      await this.navigate(page, `https://x.com/i/status/${postId}`, CONVERSATION_OPERATIONS);
      await actionDelay(this.config.scrollDelay);

      const results = captured.flatMap((extraction) => extraction.results);
      if (results.length > 0) return toRawPosts(results);

      logger.info({ postId }, "No TweetDetail response captured, reading rendered articles");
      const articles = await this.scrapeArticles(page);
      // Ancestors render above the focal post, so the first article is the root.
      const conversationId = articles[0]?.id ?? postId;
      return articles.map((article, index): RawPost => ({
        source: "dom",
        payload: {
          ...article,
          conversationId,
          inReplyToId: index > 0 ? articles[index - 1]?.id ?? null : null,
        },
      }));
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.closeSession();
    await closeContextSafely(this.context);
    this.context = null;
  }

  private async ensureContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    const { context, isNew } = await launchPersistentContext({
      profileDir: this.config.profileDir,
      headless: this.config.headless,
      slowMo: this.config.slowMo,
      proxyUrl: this.config.proxyUrl,
    });
    this.context = context;
    this.freshProfile = isNew;
    return context;
  }

  private async openSession(target: Target): Promise<TimelineSession> {
    const context = await this.ensureContext();
    const page = await context.newPage();
    const session: TimelineSession = { key: targetKey(target), page, pending: [], lastCursor: null };
    const operations = operationsFor(target);

    page.on("response", (response) => {
      this.capture(response, operations, session.pending).catch((error: unknown) =>
        logger.warn({ error, targetKey: session.key }, "Failed to read timeline response")
      );
    });

    try {
      await this.navigate(page, timelineUrl(target), operations);
    } catch (error) {
      await page.close();
      throw error;
    }
    return session;
  }

  private async navigate(page: Page, url: string, operations: Set<string>): Promise<void> {
    // Resolves to the wait's failure, or null once a matching response arrived.
    const firstResponse = page
      .waitForResponse(
        (response) => {
          const operation = graphqlOperation(response.url());
          return operation !== null && operations.has(operation);
        },
        { timeout: this.config.navigationTimeoutMs }
      )
      .then(
        () => null,
        (error: unknown) => error
      );

    await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.config.navigationTimeoutMs });

    const block = detectBlockChallenge(page.url());
    if (block.isBlocked && this.freshProfile) {
      throw loginRequiredError(this.config.profileDir, true);
    }
    if (block.isBlocked) {
      throw new AuthError(`Browser was redirected away from ${url} (${block.reason})`, "BLOCKED");
    }

    const failure = await firstResponse;
    if (failure === null) return;

    if (await isLoginRequired(page)) {
      throw loginRequiredError(this.config.profileDir, this.freshProfile);
    }
    throw new BackendUnavailableError(`No timeline response from ${url}`, "NAVIGATION_TIMEOUT", failure);
  }

  private async capture(response: Response, operations: Set<string>, sink: TimelineExtraction[]): Promise<void> {
    const operation = graphqlOperation(response.url());
    if (!operation || !operations.has(operation)) return;
    if (!response.ok()) {
      logger.warn({ operation, status: response.status() }, "Timeline response was not OK");
      return;
    }
    const body: unknown = await response.json();
    sink.push(extractTimeline(body));
  }

  private async nextExtraction(session: TimelineSession): Promise<TimelineExtraction | null> {
    let idleScrolls = 0;
    while (session.pending.length === 0 && idleScrolls < this.config.maxIdleScrolls) {
      if (session.lastCursor !== null || idleScrolls > 0) {
        await session.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      }
      await actionDelay(this.config.scrollDelay);
      idleScrolls++;
    }
    return session.pending.shift() ?? null;
  }

  private async scrapeArticles(page: Page): Promise<ScrapedArticle[]> {
    return page.$$eval('article[data-testid="tweet"]', (articles) => {
      const scraped: ScrapedArticle[] = [];
      for (const article of articles) {
        const time = article.querySelector("time");
        const link = time?.closest("a");
        const href = link?.getAttribute("href") ?? "";
        const match = /^\/([^/]+)\/status\/(\d+)/.exec(href);
        const createdAt = time?.getAttribute("datetime");
        if (!match || !match[1] || !match[2] || !createdAt) continue;

        scraped.push({
          id: match[2],
          authorHandle: match[1],
          createdAt,
          text: article.querySelector('[data-testid="tweetText"]')?.textContent ?? "",
          url: `https://x.com${href}`,
          mediaCount: article.querySelectorAll('[data-testid="tweetPhoto"], [data-testid="videoPlayer"]').length,
          isRetweet: article.querySelector('[data-testid="socialContext"]')?.textContent?.includes("reposted") ?? false,
        });
      }
      return scraped;
    });
  }

  private async closeSession(): Promise<void> {
    if (!this.session) return;
    const { page } = this.session;
    this.session = null;
    await page.close();
  }
}
