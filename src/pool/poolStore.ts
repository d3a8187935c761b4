import { existsSync, readFileSync, renameSync, writeFileSync } from "fs";
import { z } from "zod";
import { ensureDirectoryExists } from "../helpers.ts";
import { BOT_STATUSES, type BotInstance } from "../types.ts";

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "created_at is not a valid timestamp");

const persistedBotSchema = z.object({
  token: z.string(),
  name: z.string(),
  username: z.string().nullish(),
  status: z.enum(BOT_STATUSES).default("starting"),
  created_at: isoTimestamp,
  user_id: z.union([z.string(), z.number()]).nullish(),
  personality_type: z.string().nullish(),
});

export const persistedPoolSchema = z.object({
  available_tokens: z.array(z.string()).default([]),
  active_bots: z.record(persistedBotSchema).default({}),
});

export type PersistedBot = z.input<typeof persistedBotSchema>;
export type PersistedPool = z.input<typeof persistedPoolSchema>;

export type PoolSnapshot = {
  availableTokens: string[];
  activeBots: Map<string, BotInstance>;
};

export function botFromPersisted(data: z.output<typeof persistedBotSchema>): BotInstance {
  return {
    token: data.token,
    name: data.name,
    username: data.username ?? undefined,
    status: data.status,
    createdAt: new Date(data.created_at),
    userId: data.user_id === null || data.user_id === undefined ? undefined : String(data.user_id),
    personalityType: data.personality_type ?? undefined,
  };
}

export function botToPersisted(bot: BotInstance): PersistedBot {
  return {
    token: bot.token,
    name: bot.name,
    username: bot.username ?? null,
    status: bot.status,
    created_at: bot.createdAt.toISOString(),
    user_id: bot.userId ?? null,
    personality_type: bot.personalityType ?? null,
  };
}

export function serializePool(snapshot: PoolSnapshot): PersistedPool {
  const active_bots: Record<string, PersistedBot> = {};
  for (const [token, bot] of snapshot.activeBots) {
    active_bots[token] = botToPersisted(bot);
  }
  return { available_tokens: [...snapshot.availableTokens], active_bots };
}

/**
 * Parses a pool document. Throws on invalid JSON or an unexpected shape,
 * the caller decides how to recover.
 */
export function parsePool(raw: string): PoolSnapshot {
  const data = persistedPoolSchema.parse(JSON.parse(raw));
  const activeBots = new Map<string, BotInstance>();
  for (const [token, botData] of Object.entries(data.active_bots)) {
    // the map key is authoritative, the inner token is informational
    activeBots.set(token, { ...botFromPersisted(botData), token });
  }
  return { availableTokens: data.available_tokens, activeBots };
}

/** Returns undefined when the file does not exist. */
export function readPoolFile(file: string): PoolSnapshot | undefined {
  if (!existsSync(file)) return undefined;
  return parsePool(readFileSync(file, "utf8"));
}

export function writePoolFile(file: string, snapshot: PoolSnapshot) {
  ensureDirectoryExists(file);
  const tmpFile = `${file}.tmp`;
  writeFileSync(tmpFile, JSON.stringify(serializePool(snapshot), null, 2));
  renameSync(tmpFile, file);
}
