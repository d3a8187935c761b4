import { Telegraf, Telegram } from "telegraf";
import { useConfig } from "./config.ts";
import { errorMessage, log, maskToken } from "./helpers.ts";

const bots: Record<string, Telegraf> = {};

export function useBot(bot_token?: string) {
  bot_token = bot_token || useConfig().auth.bot_token;
  if (!bots[bot_token]) {
    bots[bot_token] = new Telegraf(bot_token);
  }
  return bots[bot_token];
}

/** Checks a token with getMe, returns the bot username when Telegram accepts it. */
export async function validateBotToken(
  token: string,
  telegram: Pick<Telegram, "getMe"> = new Telegram(token),
): Promise<{ username: string } | undefined> {
  try {
    const me = await telegram.getMe();
    log({ msg: `Token ${maskToken(token)} belongs to @${me.username}` });
    return { username: me.username };
  } catch (e) {
    log({ msg: `Token ${maskToken(token)} validation failed: ${errorMessage(e)}`, logLevel: "warn" });
    return undefined;
  }
}
