import { errorMessage, log, maskToken } from "../helpers.ts";
import type { AllocationResult, BotInstance, BotStatus, PoolStats } from "../types.ts";
import { readPoolFile, writePoolFile } from "./poolStore.ts";
import { seedTokens, type SeedEnv } from "./seedTokens.ts";
import { isValidTokenFormat } from "./tokenFormat.ts";

export type TokenPoolOptions = {
  poolFile: string;
  env?: SeedEnv;
  configTokens?: string[];
  // return deallocated tokens to the pool instead of retiring them
  recycleTokens?: boolean;
};

/**
 * Owns the token pool and the registry of bots using its tokens.
 * Every mutation is written to `poolFile` before the method returns.
 */
export class TokenPoolManager {
  readonly poolFile: string;
  private readonly recycleTokens: boolean;
  private availableTokens: string[] = [];
  private activeBots = new Map<string, BotInstance>();
  private allocatedTokens = new Set<string>();

  constructor({ poolFile, env = process.env, configTokens, recycleTokens = false }: TokenPoolOptions) {
    this.poolFile = poolFile;
    this.recycleTokens = recycleTokens;
    this.loadPool(env, configTokens);
  }

  private loadPool(env: SeedEnv, configTokens?: string[]) {
    try {
      const snapshot = readPoolFile(this.poolFile);
      if (!snapshot) {
        log({ msg: `No token pool file at ${this.poolFile}, initializing from environment` });
        this.availableTokens = seedTokens(env, configTokens);
        return;
      }

      this.activeBots = snapshot.activeBots;
      this.allocatedTokens = new Set(snapshot.activeBots.keys());
      this.availableTokens = snapshot.availableTokens.filter((token) => {
        if (!this.activeBots.has(token)) return true;
        log({
          msg: `Token ${maskToken(token)} is both available and active in ${this.poolFile}, keeping it active`,
          logLevel: "warn",
        });
        return false;
      });
      log({
        msg: `Loaded token pool: ${this.availableTokens.length} available, ${this.activeBots.size} active bots`,
      });
    } catch (e) {
      log({ msg: `Failed to load token pool: ${errorMessage(e)}`, logLevel: "error" });
      this.activeBots = new Map();
      this.allocatedTokens = new Set();
      this.availableTokens = seedTokens(env, configTokens);
    }
  }

  private savePool() {
    try {
      writePoolFile(this.poolFile, {
        availableTokens: this.availableTokens,
        activeBots: this.activeBots,
      });
      log({ msg: `Saved token pool to ${this.poolFile}`, logLevel: "debug" });
    } catch (e) {
      // in-memory state stays as is, the next successful save catches up
      log({ msg: `Failed to save token pool: ${errorMessage(e)}`, logLevel: "error" });
    }
  }

  /** Reserves the first free token. Returns undefined when the pool is exhausted. */
  getAvailableToken(): string | undefined {
    const token = this.availableTokens.find(
      (t) => !this.allocatedTokens.has(t) && !this.activeBots.has(t),
    );
    if (!token) {
      log({ msg: "No available tokens in pool", logLevel: "warn" });
      return undefined;
    }
    this.allocatedTokens.add(token);
    log({ msg: `Reserved token: ${maskToken(token)}` });
    return token;
  }

  /** Drops a reservation from getAvailableToken() that never became a bot. */
  releaseToken(token: string): boolean {
    if (this.activeBots.has(token) || !this.allocatedTokens.has(token)) return false;
    this.allocatedTokens.delete(token);
    log({ msg: `Released token: ${maskToken(token)}` });
    return true;
  }

  allocateToken(
    token: string,
    botName: string,
    userId?: string,
    personalityType?: string,
  ): AllocationResult {
    const owner = this.activeBots.get(token);
    if (owner) {
      log({
        msg: `Token ${maskToken(token)} already allocated to bot: ${owner.name}`,
        logLevel: "warn",
      });
      return { ok: false, reason: "already_allocated", owner: owner.name };
    }

    const bot: BotInstance = {
      token,
      name: botName,
      status: "starting",
      createdAt: new Date(),
      userId,
      personalityType,
    };
    this.activeBots.set(token, bot);
    this.allocatedTokens.add(token);
    this.availableTokens = this.availableTokens.filter((t) => t !== token);
    this.savePool();

    log({ msg: `Allocated token to bot '${botName}'`, userId });
    return { ok: true, bot };
  }

  deallocateToken(token: string): boolean {
    const bot = this.activeBots.get(token);
    if (!bot) {
      log({ msg: `Token not found in active bots: ${maskToken(token)}`, logLevel: "warn" });
      return false;
    }

    this.activeBots.delete(token);
    this.allocatedTokens.delete(token);
    if (this.recycleTokens && !this.availableTokens.includes(token)) {
      this.availableTokens.push(token);
    }
    this.savePool();

    log({ msg: `Deallocated token from bot '${bot.name}'` });
    return true;
  }

  updateBotStatus(token: string, status: BotStatus, username?: string): boolean {
    const bot = this.activeBots.get(token);
    if (!bot) {
      log({ msg: `Cannot update status for unknown token: ${maskToken(token)}`, logLevel: "warn" });
      return false;
    }

    bot.status = status;
    if (username) bot.username = username;
    this.savePool();

    log({ msg: `Updated bot '${bot.name}' status to '${status}'`, logLevel: "debug" });
    return true;
  }

  getActiveBots(): BotInstance[] {
    return [...this.activeBots.values()];
  }

  getRunningBots(): BotInstance[] {
    return this.getActiveBots().filter((bot) => bot.status === "running");
  }

  getBotByName(name: string): BotInstance | undefined {
    const lower = name.toLowerCase();
    return this.getActiveBots().find((bot) => bot.name.toLowerCase() === lower);
  }

  getBotByToken(token: string): BotInstance | undefined {
    return this.activeBots.get(token);
  }

  getBotsByUser(userId: string): BotInstance[] {
    return this.getActiveBots().filter((bot) => bot.userId === userId);
  }

  getAvailableTokens(): string[] {
    return [...this.availableTokens];
  }

  isAllocated(token: string) {
    return this.allocatedTokens.has(token);
  }

  stopAllBots(): number {
    let marked = 0;
    for (const bot of this.activeBots.values()) {
      if (bot.status === "running") {
        bot.status = "stopping";
        marked++;
      }
    }
    this.savePool();
    log({ msg: `Marked ${marked} bots as stopping` });
    return marked;
  }

  getPoolStats(): PoolStats {
    const statusBreakdown: PoolStats["statusBreakdown"] = {};
    for (const bot of this.activeBots.values()) {
      statusBreakdown[bot.status] = (statusBreakdown[bot.status] || 0) + 1;
    }

    return {
      totalTokens: this.availableTokens.length + this.activeBots.size,
      availableTokens: this.availableTokens.filter((t) => !this.allocatedTokens.has(t)).length,
      allocatedTokens: this.allocatedTokens.size,
      activeBots: this.activeBots.size,
      statusBreakdown,
    };
  }

  /** Deallocates bots in stopped or error status, returns how many were removed. */
  cleanupStoppedBots(): number {
    const stopped = this.getActiveBots().filter(
      (bot) => bot.status === "stopped" || bot.status === "error",
    );
    for (const bot of stopped) {
      this.deallocateToken(bot.token);
    }
    log({ msg: `Cleaned up ${stopped.length} stopped bots` });
    return stopped.length;
  }

  addToken(token: string): boolean {
    if (!isValidTokenFormat(token)) {
      log({ msg: `Invalid token format: ${maskToken(token)}`, logLevel: "error" });
      return false;
    }
    if (this.availableTokens.includes(token)) {
      log({ msg: `Token already in pool: ${maskToken(token)}`, logLevel: "warn" });
      return false;
    }
    if (this.allocatedTokens.has(token) || this.activeBots.has(token)) {
      log({ msg: `Token already allocated: ${maskToken(token)}`, logLevel: "warn" });
      return false;
    }

    this.availableTokens.push(token);
    this.savePool();
    log({ msg: `Added new token to pool: ${maskToken(token)}` });
    return true;
  }

  removeToken(token: string): boolean {
    if (this.allocatedTokens.has(token) || this.activeBots.has(token)) {
      log({ msg: `Cannot remove allocated token: ${maskToken(token)}`, logLevel: "error" });
      return false;
    }
    if (!this.availableTokens.includes(token)) {
      log({ msg: `Token not found in pool: ${maskToken(token)}`, logLevel: "warn" });
      return false;
    }

    this.availableTokens = this.availableTokens.filter((t) => t !== token);
    this.savePool();
    log({ msg: `Removed token from pool: ${maskToken(token)}` });
    return true;
  }
}
