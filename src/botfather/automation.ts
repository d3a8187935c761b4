import { errorMessage, log, maskToken } from "../helpers.ts";
import { extractToken } from "../pool/tokenFormat.ts";
import type { BotCommandType } from "../types.ts";

export const BOTFATHER_USERNAME = "BotFather";

/** A user-account chat with BotFather. */
export interface BotFatherSession {
  sendMessage(text: string): Promise<void>;
  /** Newest first. */
  getRecentMessages(limit: number): Promise<string[]>;
  close(): Promise<void>;
}

export type BotFatherSessionFactory = () => Promise<BotFatherSession>;

export type MintResult =
  | { success: true; token: string; username: string; displayName: string }
  | { success: false; error: string; errorCode: "BOTFATHER_ERROR" | "AMBIGUOUS_RESPONSE" | "CLIENT_ERROR" };

export type ConfigureResult = { success: boolean; error?: string };

export interface TokenMinter {
  createBot(requestedName: string): Promise<MintResult>;
  configureCommands(username: string, commands: BotCommandType[]): Promise<ConfigureResult>;
}

const MINT_ERROR_INDICATORS = ["sorry", "invalid", "taken", "error", "bad"];
const CONFIGURE_SUCCESS_INDICATORS = ["success", "updated", "done"];
const CONFIGURE_ERROR_INDICATORS = ["error", "invalid", "wrong"];

type AutomationOptions = {
  openSession: BotFatherSessionFactory;
  responseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  random?: () => number;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function generateDisplayName(requestedName: string, now: Date) {
  const safe = requestedName.replace(/[^\p{L}\p{N} _-]/gu, "").trim().slice(0, 20).trim();
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp = `${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `${safe || "GeneratedBot"} ${stamp}`;
}

export function generateUsername(requestedName: string, random: () => number) {
  const base = requestedName.replace(/[^A-Za-z0-9]/g, "").toLowerCase().slice(0, 15) || "generated";
  const alphabet = "abcdefghijklmnopqrstuvwxyz0123456789";
  let suffix = "";
  for (let i = 0; i < 6; i++) {
    suffix += alphabet[Math.floor(random() * alphabet.length)];
  }
  return `${base}_${suffix}_bot`;
}

/**
 * Registers new bots by chatting with BotFather the way a human would:
 * /newbot, the display name, the username, then reading the reply.
 */
export class BotFatherAutomation implements TokenMinter {
  private readonly openSession: BotFatherSessionFactory;
  private readonly responseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor({
    openSession,
    responseDelayMs = 2000,
    sleep = defaultSleep,
    now = () => new Date(),
    random = Math.random,
  }: AutomationOptions) {
    this.openSession = openSession;
    this.responseDelayMs = responseDelayMs;
    this.sleep = sleep;
    this.now = now;
    this.random = random;
  }

  async createBot(requestedName: string): Promise<MintResult> {
    const displayName = generateDisplayName(requestedName, this.now());
    const username = generateUsername(requestedName, this.random);
    log({ msg: `Creating new bot via @${BOTFATHER_USERNAME}: ${displayName} (@${username})` });

    let session: BotFatherSession | undefined;
    try {
      session = await this.openSession();
      await this.say(session, "/newbot");
      await this.say(session, displayName);
      await session.sendMessage(username);
      // token replies take longer than the other steps
      await this.sleep(this.responseDelayMs * 1.5);

      for (const text of await session.getRecentMessages(3)) {
        const token = extractToken(text);
        if (token) {
          log({ msg: `Bot created via BotFather, token ${maskToken(token)}` });
          return { success: true, token, username, displayName };
        }
        const lower = text.toLowerCase();
        if (MINT_ERROR_INDICATORS.some((indicator) => lower.includes(indicator))) {
          log({ msg: `BotFather rejected bot creation: ${text}`, logLevel: "warn" });
          return { success: false, error: `BotFather rejected: ${text}`, errorCode: "BOTFATHER_ERROR" };
        }
      }

      log({ msg: "Ambiguous response from BotFather", logLevel: "warn" });
      return { success: false, error: "Unclear response from BotFather", errorCode: "AMBIGUOUS_RESPONSE" };
    } catch (e) {
      log({ msg: `BotFather automation failed: ${errorMessage(e)}`, logLevel: "error" });
      return {
        success: false,
        error: `BotFather automation failed: ${errorMessage(e)}`,
        errorCode: "CLIENT_ERROR",
      };
    } finally {
      await this.closeSession(session);
    }
  }

  async configureCommands(username: string, commands: BotCommandType[]): Promise<ConfigureResult> {
    let session: BotFatherSession | undefined;
    try {
      session = await this.openSession();
      await this.say(session, "/setcommands");
      await this.say(session, `@${username.replace(/^@/, "")}`);
      await this.say(session, commands.map((c) => `${c.command} - ${c.description}`).join("\n"));

      for (const text of await session.getRecentMessages(3)) {
        const lower = text.toLowerCase();
        if (CONFIGURE_SUCCESS_INDICATORS.some((indicator) => lower.includes(indicator))) {
          return { success: true };
        }
        if (CONFIGURE_ERROR_INDICATORS.some((indicator) => lower.includes(indicator))) {
          return { success: false, error: `BotFather rejected command configuration: ${text}` };
        }
      }
      // BotFather stays silent on some accepted updates
      return { success: true };
    } catch (e) {
      log({ msg: `Failed to set commands for @${username}: ${errorMessage(e)}`, logLevel: "error" });
      return { success: false, error: `Failed to set commands: ${errorMessage(e)}` };
    } finally {
      await this.closeSession(session);
    }
  }

  // a failed disconnect must not hide a token BotFather already issued
  private async closeSession(session: BotFatherSession | undefined) {
    try {
      await session?.close();
    } catch (e) {
      log({ msg: `Failed to close BotFather session: ${errorMessage(e)}`, logLevel: "warn" });
    }
  }

  private async say(session: BotFatherSession, text: string) {
    await session.sendMessage(text);
    await this.sleep(this.responseDelayMs);
  }
}
