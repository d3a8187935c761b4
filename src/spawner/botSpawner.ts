import type { TokenMinter } from "../botfather/automation.ts";
import { errorMessage, log } from "../helpers.ts";
import type { TokenPoolManager } from "../pool/tokenPoolManager.ts";
import type { ChildBot } from "../runtime/childBot.ts";
import type { BotCommandType, BotInstance, ChildBotStats, PoolStats } from "../types.ts";

export type ChildBotFactory = (bot: BotInstance) => ChildBot;

export type TokenValidator = (token: string) => Promise<{ username: string } | undefined>;

export type SpawnerOptions = {
  pool: TokenPoolManager;
  createChildBot: ChildBotFactory;
  minter?: TokenMinter;
  validateToken?: TokenValidator;
  mintedBotCommands?: BotCommandType[];
  maxBotsPerUser?: number;
  resumeBots?: boolean;
  cleanupOnStartup?: boolean;
};

export type CreateBotRequest = {
  name: string;
  userId: string;
  personality?: string;
};

export type SpawnerResult =
  | { success: true; bot: BotInstance; message: string; autoCreated?: boolean }
  | { success: false; error: string };

export type BotStatusInfo = {
  bot: BotInstance;
  running: boolean;
  stats?: ChildBotStats;
};

export type SpawnerStats = PoolStats & {
  runningRuntimes: number;
  botfatherAutomation: boolean;
};

export type InitializeSummary = {
  cleaned: number;
  resumed: number;
  stopped: number;
};

const ORPHAN_STATUSES = new Set(["starting", "running", "stopping"]);

export function botLink(bot: BotInstance) {
  return bot.username ? `https://t.me/${bot.username}` : "";
}

/**
 * Starts and stops child bots on top of the token pool. The pool decides who
 * owns a token, the spawner keeps the runtimes in step with it.
 */
export class BotSpawner {
  private readonly pool: TokenPoolManager;
  private readonly createChildBot: ChildBotFactory;
  private readonly minter?: TokenMinter;
  private readonly validateToken?: TokenValidator;
  private readonly mintedBotCommands: BotCommandType[];
  private readonly maxBotsPerUser: number;
  private readonly resumeBots: boolean;
  private readonly cleanupOnStartup: boolean;
  private readonly running = new Map<string, ChildBot>();

  constructor(options: SpawnerOptions) {
    this.pool = options.pool;
    this.createChildBot = options.createChildBot;
    this.minter = options.minter;
    this.validateToken = options.validateToken;
    this.mintedBotCommands = options.mintedBotCommands || [];
    this.maxBotsPerUser = options.maxBotsPerUser ?? 0;
    this.resumeBots = options.resumeBots ?? true;
    this.cleanupOnStartup = options.cleanupOnStartup ?? true;
  }

  /** Reclaims bots left over from a previous process. */
  async initialize(): Promise<InitializeSummary> {
    const cleaned = this.cleanupOnStartup ? this.pool.cleanupStoppedBots() : 0;
    let resumed = 0;
    let stopped = 0;

    for (const bot of this.pool.getActiveBots()) {
      if (this.running.has(bot.token) || !ORPHAN_STATUSES.has(bot.status)) continue;

      if (!this.resumeBots) {
        this.pool.updateBotStatus(bot.token, "stopped");
        stopped++;
        continue;
      }

      this.pool.updateBotStatus(bot.token, "starting");
      const result = await this.launch(bot);
      if (result.success) resumed++;
    }

    log({ msg: `BotSpawner ready: ${resumed} resumed, ${stopped} stopped, ${cleaned} cleaned up` });
    return { cleaned, resumed, stopped };
  }

  async createBot({ name, userId, personality }: CreateBotRequest): Promise<SpawnerResult> {
    name = name.trim();
    if (!name) return { success: false, error: "Bot name is required" };

    if (this.pool.getBotByName(name)) {
      return { success: false, error: `A bot named '${name}' already exists` };
    }
    if (this.maxBotsPerUser > 0 && this.pool.getBotsByUser(userId).length >= this.maxBotsPerUser) {
      return {
        success: false,
        error: `You already have ${this.maxBotsPerUser} bots, stop one before creating another`,
      };
    }

    let token = this.pool.getAvailableToken();
    let autoCreated = false;
    if (!token) {
      const minted = await this.mintToken(name);
      if ("error" in minted) return { success: false, error: minted.error };
      token = minted.token;
      autoCreated = true;
    }

    const allocation = this.pool.allocateToken(token, name, userId, personality);
    if (!allocation.ok) {
      this.pool.releaseToken(token);
      return { success: false, error: `Token already allocated to bot '${allocation.owner}'` };
    }

    const result = await this.launch(allocation.bot);
    if (!result.success) return result;

    const kind = personality ? `AI bot (${personality})` : "Echo bot";
    const link = botLink(result.bot);
    return {
      success: true,
      bot: result.bot,
      autoCreated,
      message:
        `${kind} '${name}' created successfully!` +
        (link ? ` ${link}` : "") +
        (autoCreated ? " (new bot token created automatically)" : ""),
    };
  }

  async stopBot(name: string, userId?: string): Promise<SpawnerResult> {
    const bot = this.findBot(name, userId);
    if (!bot) return { success: false, error: `Bot '${name}' not found in your bot list` };

    this.pool.updateBotStatus(bot.token, "stopping");
    // also covers a runtime that is still starting
    const child = this.running.get(bot.token);
    this.running.delete(bot.token);
    if (child) await this.stopChild(child, "stop requested");
    this.pool.updateBotStatus(bot.token, "stopped");
    this.pool.deallocateToken(bot.token);

    return { success: true, bot, message: `Bot '${bot.name}' stopped` };
  }

  async restartBot(name: string, userId?: string): Promise<SpawnerResult> {
    const bot = this.findBot(name, userId);
    if (!bot) return { success: false, error: `Bot '${name}' not found in your bot list` };

    const child = this.running.get(bot.token);
    if (child?.isRunning()) {
      return { success: true, bot, message: `Bot '${bot.name}' is already running` };
    }
    if (child) {
      return { success: false, error: `Bot '${bot.name}' is still starting` };
    }

    this.pool.updateBotStatus(bot.token, "starting");
    const result = await this.launch(bot);
    if (!result.success) return result;
    return { success: true, bot, message: `Bot '${bot.name}' started ${botLink(bot)}`.trim() };
  }

  listBots(userId?: string): BotInstance[] {
    const bots = userId ? this.pool.getBotsByUser(userId) : this.pool.getActiveBots();
    return [...bots].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /** Without `userId` any bot is visible, as for admins. */
  getBotStatus(name: string, userId?: string): BotStatusInfo | undefined {
    const bot = this.findBot(name, userId);
    if (!bot) return undefined;
    const child = this.running.get(bot.token);
    return {
      bot,
      running: Boolean(child?.isRunning()),
      stats: child?.getStats(),
    };
  }

  isRunning(token: string) {
    return Boolean(this.running.get(token)?.isRunning());
  }

  getStats(): SpawnerStats {
    return {
      ...this.pool.getPoolStats(),
      runningRuntimes: [...this.running.values()].filter((c) => c.isRunning()).length,
      botfatherAutomation: Boolean(this.minter),
    };
  }

  /** Stops every runtime; bots stay allocated as `stopping` and resume on the next start. */
  async shutdown() {
    log({ msg: "Shutting down BotSpawner..." });
    this.pool.stopAllBots();
    const children = [...this.running.values()];
    this.running.clear();
    await Promise.all(children.map((child) => this.stopChild(child, "shutdown")));
  }

  private findBot(name: string, userId?: string) {
    const bot = this.pool.getBotByName(name);
    if (!bot) return undefined;
    if (userId && bot.userId !== userId) return undefined;
    return bot;
  }

  // the pool entry may be gone or handed to another bot while a runtime was starting
  private owns(bot: BotInstance) {
    const current = this.pool.getBotByToken(bot.token);
    return current?.name === bot.name && current.createdAt.getTime() === bot.createdAt.getTime();
  }

  private async stopChild(child: ChildBot, reason: string) {
    try {
      await child.stop(reason);
    } catch (e) {
      log({ msg: `Error while stopping: ${errorMessage(e)}`, botName: child.name, logLevel: "warn" });
    }
  }

  private async launch(bot: BotInstance): Promise<SpawnerResult> {
    let child: ChildBot | undefined;
    try {
      const created = this.createChildBot(bot);
      child = created;
      created.onStopped = (error) => this.childStopped(bot, created, error);
      this.running.set(bot.token, created);

      const { username } = await created.start();
      if (this.running.get(bot.token) !== created || !this.owns(bot)) {
        await this.stopChild(created, "stopped while starting");
        return { success: false, error: `Bot '${bot.name}' was stopped while starting` };
      }
      this.pool.updateBotStatus(bot.token, "running", username);
      return { success: true, bot, message: `Bot '${bot.name}' is running` };
    } catch (e) {
      // stopBot or shutdown already took the runtime away
      const removed = child !== undefined && this.running.get(bot.token) !== child;
      if (child && !removed) this.running.delete(bot.token);
      if (removed || !this.owns(bot)) {
        return { success: false, error: `Bot '${bot.name}' was stopped while starting` };
      }
      log({ msg: `Failed to start: ${errorMessage(e)}`, botName: bot.name, logLevel: "error" });
      this.pool.updateBotStatus(bot.token, "error");
      return { success: false, error: `Failed to start bot '${bot.name}': ${errorMessage(e)}` };
    }
  }

  private childStopped(bot: BotInstance, child: ChildBot, error?: unknown) {
    if (this.running.get(bot.token) !== child) return;
    this.running.delete(bot.token);
    if (!this.owns(bot)) return;
    const status = error === undefined ? "stopped" : "error";
    log({
      msg: `Polling ended unexpectedly${error === undefined ? "" : `: ${errorMessage(error)}`}`,
      botName: bot.name,
      logLevel: "error",
    });
    this.pool.updateBotStatus(bot.token, status);
  }

  private async mintToken(name: string): Promise<{ token: string } | { error: string }> {
    if (!this.minter) {
      return { error: "No available bot tokens. All tokens are in use." };
    }

    log({ msg: "No available tokens, creating a new bot via BotFather" });
    const minted = await this.minter.createBot(name);
    if (!minted.success) {
      return { error: `Failed to create new bot: ${minted.error}` };
    }

    if (this.validateToken) {
      const validation = await this.validateToken(minted.token);
      if (!validation) {
        return { error: "Created new bot but token validation failed" };
      }
    }

    if (this.mintedBotCommands.length) {
      const configured = await this.minter.configureCommands(minted.username, this.mintedBotCommands);
      if (!configured.success) {
        log({ msg: `Command setup failed: ${configured.error}`, logLevel: "warn" });
      }
    }

    return { token: minted.token };
  }
}
