import type OpenAI from "openai";
import type { Context } from "telegraf";
import { message } from "telegraf/filters";
import { errorMessage, log } from "../helpers.ts";
import { sendTelegramMessage } from "../telegram/send.ts";
import type { AiConfigType, PersonalityType } from "../types.ts";
import { TelegrafChildBot, type TelegrafFactory } from "./childBot.ts";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export type PersonalityBotOptions = {
  name: string;
  token: string;
  personality: PersonalityType;
  ai: AiConfigType;
  api: OpenAI;
  telegrafFactory?: TelegrafFactory;
};

/** Child bot answering with an LLM in the voice of one personality preset. */
export class PersonalityBot extends TelegrafChildBot {
  private readonly personality: PersonalityType;
  private readonly ai: AiConfigType;
  private readonly api: OpenAI;
  private history = new Map<number, ChatMessage[]>();

  constructor({ name, token, personality, ai, api, telegrafFactory }: PersonalityBotOptions) {
    super(name, token, telegrafFactory);
    this.personality = personality;
    this.ai = ai;
    this.api = api;
  }

  protected commands() {
    return [
      { command: "start", description: "Say hello" },
      { command: "help", description: "What I can do" },
      { command: "reset", description: "Forget our conversation" },
    ];
  }

  protected setupHandlers() {
    this.bot.start((ctx) =>
      ctx.reply(`Hi! I'm ${this.name}, a ${this.personality.name} bot. ${this.personality.description}.`),
    );
    this.bot.help((ctx) =>
      ctx.reply(`Just write to me and I'll answer.\n/reset - forget our conversation`),
    );
    this.bot.command("reset", (ctx) => {
      this.resetHistory(ctx.message.chat.id);
      return ctx.reply("OK, I forgot our conversation.");
    });
    this.bot.on(message("text"), (ctx) => this.handleText(ctx));
  }

  async handleText(ctx: Context) {
    const chatId = ctx.chat?.id;
    const text = ctx.text;
    if (!chatId || !text) return;

    try {
      await ctx.sendChatAction("typing");
      const answer = await this.answer(chatId, text);
      await sendTelegramMessage(ctx.telegram, chatId, answer, this.name);
    } catch (e) {
      log({ msg: `Answer failed: ${errorMessage(e)}`, botName: this.name, logLevel: "error" });
      await ctx.reply("Sorry, I can't answer right now. Please try again later.");
    }
  }

  async answer(chatId: number, text: string): Promise<string> {
    const history = this.getHistory(chatId);
    history.push({ role: "user", content: text });

    const completion = await this.api.chat.completions.create({
      model: this.ai.model,
      temperature: this.ai.temperature,
      messages: [{ role: "system", content: this.personality.prompt }, ...history],
    });
    const answer = completion.choices[0]?.message.content || "...";

    history.push({ role: "assistant", content: answer });
    this.trimHistory(chatId);
    this.messageCount++;
    return answer;
  }

  getHistory(chatId: number): ChatMessage[] {
    let history = this.history.get(chatId);
    if (!history) {
      history = [];
      this.history.set(chatId, history);
    }
    return history;
  }

  resetHistory(chatId: number) {
    this.history.delete(chatId);
  }

  private trimHistory(chatId: number) {
    const limit = this.ai.history_limit || 20;
    const history = this.getHistory(chatId);
    if (history.length > limit) {
      history.splice(0, history.length - limit);
    }
  }
}
