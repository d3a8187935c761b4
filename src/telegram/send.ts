import type { Telegram } from "telegraf";
import type { Message } from "telegraf/types";
import telegramifyMarkdown from "telegramify-markdown";
import { errorMessage, log } from "../helpers.ts";
import { splitBigMessage } from "../utils/text.ts";

interface TelegramError extends Error {
  response?: {
    error_code: number;
    description: string;
  };
}

function isTelegramError(e: unknown): e is TelegramError {
  return e instanceof Error && "response" in e;
}

/**
 * Sends markdown text as MarkdownV2, split into Telegram-sized chunks.
 * A chunk Telegram refuses to parse is sent again as plain text.
 */
export async function sendTelegramMessage(
  telegram: Telegram,
  chatId: number,
  text: string,
  botName?: string,
): Promise<Message.TextMessage | undefined> {
  let response: Message.TextMessage | undefined;
  const processedText = telegramifyMarkdown(text, "escape");

  for (const msg of splitBigMessage(processedText)) {
    try {
      response = await telegram.sendMessage(chatId, msg, { parse_mode: "MarkdownV2" });
    } catch (e: unknown) {
      if (isTelegramError(e) && e.response?.error_code === 403) {
        log({
          msg: `User ${chatId} blocked the bot: ${e.response.description}`,
          botName,
          logLevel: "warn",
        });
        return response;
      }
      log({
        msg: `Error sending message to ${chatId}: ${errorMessage(e)}, retry as plain text`,
        botName,
        logLevel: "warn",
      });
      response = await telegram.sendMessage(chatId, msg);
    }
  }

  return response;
}
