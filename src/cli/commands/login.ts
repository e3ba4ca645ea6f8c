import type { Command } from "commander";
import { z } from "zod";
import { DEFAULT_LOGIN_URL, interactiveLogin } from "../../services/browser-session";
import { env } from "../../core/config";

const LoginOptionsSchema = z.object({
  url: z.string().url().default(DEFAULT_LOGIN_URL),
});

export const commands = (program: Command) => {
  program
    .command("login")
    .description("Open the browser profile in a window to log in to X; close the window when done")
    .option("--url <url>", "Page to open", DEFAULT_LOGIN_URL)
    .action(async (rawOptions: unknown) => {
      const options = LoginOptionsSchema.parse(rawOptions);
      await interactiveLogin({
        profileDir: env.BROWSER_PROFILE_DIR,
        url: options.url,
        slowMo: env.PLAYWRIGHT_SLOW_MO,
        proxyUrl: env.PROXY_URL,
      });
    });
};
