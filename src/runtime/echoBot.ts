import type { Context } from "telegraf";
import { message } from "telegraf/filters";
import { log } from "../helpers.ts";
import { TelegrafChildBot, type TelegrafFactory } from "./childBot.ts";

export class EchoBot extends TelegrafChildBot {
  constructor(
    name: string,
    token: string,
    private readonly createdBy?: string,
    telegrafFactory?: TelegrafFactory,
  ) {
    super(name, token, telegrafFactory);
  }

  protected commands() {
    return [
      { command: "start", description: "Show the welcome message" },
      { command: "help", description: "How to use this bot" },
      { command: "stats", description: "Echo statistics" },
    ];
  }

  protected setupHandlers() {
    this.bot.start((ctx) => this.handleStart(ctx));
    this.bot.help((ctx) => this.handleHelp(ctx));
    this.bot.command("stats", (ctx) => this.handleStats(ctx));
    this.bot.on(message("text"), (ctx) => this.handleText(ctx));
    this.bot.on("message", (ctx) => this.handleNonText(ctx));
  }

  async handleStart(ctx: Context) {
    const createdBy = this.createdBy ? `\nCreated by: ${this.createdBy}` : "";
    await ctx.reply(
      `Hello from ${this.name}!\n\n` +
        `I'm a simple echo bot: send me any text and I'll repeat it back.\n\n` +
        `/help - how to use me\n/stats - my statistics${createdBy}`,
    );
  }

  async handleHelp(ctx: Context) {
    await ctx.reply(
      `${this.name} help\n\n` +
        `Send me any text message and I'll answer with "Echo: <your text>".\n` +
        `Commands: /start, /help, /stats`,
    );
  }

  async handleStats(ctx: Context) {
    const { messageCount, startedAt } = this.getStats();
    const since = startedAt ? startedAt.toISOString() : "not started";
    await ctx.reply(`Messages echoed: ${messageCount}\nRunning since: ${since}`);
  }

  async handleText(ctx: Context) {
    const text = ctx.text || "";
    if (text.startsWith("/")) {
      await ctx.reply("Unknown command. Try /help");
      return;
    }
    this.messageCount++;
    log({ msg: `echo #${this.messageCount}`, botName: this.name, userId: ctx.from?.id, logLevel: "debug" });
    await ctx.reply(`Echo: ${text}`);
  }

  async handleNonText(ctx: Context) {
    await ctx.reply("I can only echo text messages. Send me some text!");
  }
}
