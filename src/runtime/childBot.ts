import { Telegraf } from "telegraf";
import { errorMessage, log } from "../helpers.ts";
import type { BotCommandType, ChildBotStats } from "../types.ts";

export interface ChildBot {
  readonly name: string;
  /** Resolves once the bot is polling. */
  start(): Promise<{ username: string }>;
  stop(reason?: string): Promise<void>;
  isRunning(): boolean;
  getStats(): ChildBotStats;
  /** Called when polling ends without a stop() call, with the error when it failed. */
  onStopped?: (error?: unknown) => void;
}

export type TelegrafFactory = (token: string) => Telegraf;

export const createTelegraf: TelegrafFactory = (token) => new Telegraf(token);

/** Shared lifecycle of child bots polling with Telegraf. */
export abstract class TelegrafChildBot implements ChildBot {
  protected readonly bot: Telegraf;
  protected messageCount = 0;
  onStopped?: (error?: unknown) => void;
  private running = false;
  private stopRequested = false;
  private launches = 0;
  private handlersReady = false;
  private startedAt?: Date;

  constructor(
    readonly name: string,
    token: string,
    telegrafFactory: TelegrafFactory = createTelegraf,
  ) {
    this.bot = telegrafFactory(token);
  }

  protected abstract setupHandlers(): void;

  protected abstract commands(): BotCommandType[];

  async start(): Promise<{ username: string }> {
    if (this.running) {
      return { username: this.bot.botInfo?.username || "" };
    }

    if (!this.handlersReady) {
      this.setupHandlers();
      this.bot.catch((err, ctx) => {
        log({
          msg: `Unhandled error for update ${ctx.update.update_id}: ${errorMessage(err)}`,
          botName: this.name,
          logLevel: "error",
        });
      });
      this.handlersReady = true;
    }

    let resolveReady: (() => void) | undefined;
    let rejectReady: ((error: unknown) => void) | undefined;
    const ready = new Promise<void>((resolve, reject) => {
      resolveReady = resolve;
      rejectReady = reject;
    });

    this.stopRequested = false;
    const launch = ++this.launches;
    let launched = false;
    this.bot
      .launch({ dropPendingUpdates: true }, () => {
        launched = true;
        resolveReady?.();
      })
      .then(
        () => this.pollingEnded(launch),
        (error: unknown) => {
          log({
            msg: `Polling stopped with error: ${errorMessage(error)}`,
            botName: this.name,
            logLevel: "error",
          });
          if (launched) {
            this.pollingEnded(launch, error);
          } else {
            rejectReady?.(error);
          }
        },
      );

    await ready;
    if (this.stopRequested) {
      this.bot.stop("stopped while starting");
      throw new Error(`Bot '${this.name}' was stopped while starting`);
    }
    this.running = true;
    this.startedAt = new Date();

    try {
      await this.bot.telegram.setMyCommands(this.commands());
    } catch (e) {
      log({ msg: `setMyCommands failed: ${errorMessage(e)}`, botName: this.name, logLevel: "warn" });
    }

    const username = this.bot.botInfo?.username || (await this.bot.telegram.getMe()).username;
    log({ msg: `bot started: @${username}`, botName: this.name });
    return { username };
  }

  // a bot still starting stops itself once polling is up
  async stop(reason = "stop") {
    this.stopRequested = true;
    if (!this.running) return;
    this.running = false;
    this.bot.stop(reason);
    log({ msg: `bot stopped: ${reason}`, botName: this.name });
  }

  isRunning() {
    return this.running;
  }

  private pollingEnded(launch: number, error?: unknown) {
    // polling of an earlier start ends late after a quick restart
    if (launch !== this.launches) return;
    this.running = false;
    if (this.stopRequested) return;
    this.onStopped?.(error);
  }

  getStats(): ChildBotStats {
    return { messageCount: this.messageCount, startedAt: this.startedAt };
  }
}
