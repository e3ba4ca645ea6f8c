import { chromium, type BrowserContext, type Page } from "playwright-core";
import { mkdir, access } from "fs/promises";
import { join } from "path";
import { logger } from "../core/logger";

export interface BrowserSessionOptions {
  profileDir: string;
  headless: boolean;
  slowMo?: number;
  proxyUrl?: string;
}

export interface PersistentContextResult {
  context: BrowserContext;
  profileDir: string;
  isNew: boolean;
}

export async function ensureProfileDir(dir: string): Promise<void> {
  try {
    await access(dir);
  } catch {
    await mkdir(dir, { recursive: true });
    logger.debug({ profileDir: dir }, "Created persistent browser profile directory");
  }
}

export async function profileExists(dir: string): Promise<boolean> {
  try {
    await access(dir);
    return true;
  } catch {
    return false;
  }
}

const BLOCK_CHALLENGE_PATTERNS = [
  /\/i\/flow\/login/i,
  /\/login/i,
  /\/account\/access/i,
  /\/account\/suspended/i,
  /\/challenge\//i,
  /suspended/i,
  /restricted/i,
];

export function detectBlockChallenge(url: string): { isBlocked: boolean; reason: string | null } {
  for (const pattern of BLOCK_CHALLENGE_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
    }
  }
  return { isBlocked: false, reason: null };
}

const LOGGED_IN_SELECTORS = [
  '[data-testid="SideNav_NewTweet_Button"]',
  '[data-testid="AppTabBar_Profile_Link"]',
  '[aria-label="Account menu"]',
];
const LOGIN_WALL_SELECTOR = '[data-testid="sheetDialog"], [data-testid="loginButton"]';

/** True only when a login wall is visible and no logged-in navigation is. */
export async function isLoginRequired(page: Page): Promise<boolean> {
  for (const selector of LOGGED_IN_SELECTORS) {
    if (await page.$(selector)) return false;
  }
  return (await page.$(LOGIN_WALL_SELECTOR)) !== null;
}

/**
 * Launches Chrome on a persistent profile so a session logged in by hand once
 * is reused by every later run.
 */
export async function launchPersistentContext(options: BrowserSessionOptions): Promise<PersistentContextResult> {
  const { profileDir } = options;
  await ensureProfileDir(profileDir);

  const isNew = !(await profileExists(join(profileDir, "Default")));

  const context = await chromium.launchPersistentContext(profileDir, {
    channel: "chrome",
    headless: options.headless,
    slowMo: options.slowMo,
    viewport: null,
    locale: "en-US",
    proxy: options.proxyUrl ? { server: options.proxyUrl } : undefined,
    args: ["--disable-blink-features=AutomationControlled"],
  });

  logger.info({ profileDir, isNew, proxy: options.proxyUrl !== undefined }, "Launched persistent browser context");

  return { context, profileDir, isNew };
}

export async function closeContextSafely(context: BrowserContext | null): Promise<void> {
  if (!context) return;

  try {
    for (const page of context.pages()) {
      await page.close();
    }
    await context.close();
  } catch (error) {
    logger.debug({ error }, "Error closing browser context (non-fatal)");
  }
}

export const DEFAULT_LOGIN_URL = "https://x.com/login";

/** The parts of a persistent context an interactive login touches. */
export interface LoginContext {
  once(event: "close", listener: () => void): unknown;
  newPage(): Promise<{ goto(url: string): Promise<unknown> }>;
}

export interface LoginOptions {
  profileDir: string;
  url?: string;
  slowMo?: number;
  proxyUrl?: string;
}

/**
 * Opens the profile in a visible window at the login page and waits until the
 * user closes the browser. The session then lives in the profile directory.
 */
export async function interactiveLogin(
  options: LoginOptions,
  launch: (options: BrowserSessionOptions) => Promise<{ context: LoginContext; isNew: boolean }> = launchPersistentContext
): Promise<void> {
  const { profileDir, url = DEFAULT_LOGIN_URL } = options;
  const { context, isNew } = await launch({
    profileDir,
    headless: false,
    slowMo: options.slowMo,
    proxyUrl: options.proxyUrl,
  });

  const closed = new Promise<void>((resolve) => {
    context.once("close", () => resolve());
  });

  const page = await context.newPage();
  try {
    await page.goto(url);
  } catch (error) {
    logger.warn({ error, url }, "Could not open the login page; navigate to it by hand");
  }

  logger.info({ profileDir, isNew, url }, "Log in to X in the browser window, then close the window");
  await closed;
  logger.info({ profileDir }, "Browser closed, login session kept in the profile");
}

