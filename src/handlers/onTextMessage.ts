import type { Context } from "telegraf";
import type { BotMotherAgent } from "../agent.ts";
import { errorMessage, log } from "../helpers.ts";
import { sendTelegramMessage } from "../telegram/send.ts";

// Free text goes to the agent, commands are handled before this
export default async function onTextMessage(ctx: Context, agent: BotMotherAgent, botName?: string) {
  const text = ctx.text;
  const chatId = ctx.chat?.id;
  if (!text || !chatId || !ctx.from) return;

  const userId = String(ctx.from.id);
  if (text.startsWith("/")) {
    await ctx.reply("Unknown command. Try /help");
    return;
  }

  log({ msg: text, userId, botName });
  try {
    await ctx.sendChatAction("typing");
    const answer = await agent.answer(userId, text);
    await sendTelegramMessage(ctx.telegram, chatId, answer, botName);
  } catch (e) {
    log({ msg: `Agent failed: ${errorMessage(e)}`, userId, botName, logLevel: "error" });
    await ctx.reply("Sorry, something went wrong while processing your request. Please try again.");
  }
}
