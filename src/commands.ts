import type { Context, Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import type { BotMotherAgent } from "./agent.ts";
import onTextMessage from "./handlers/onTextMessage.ts";
import { errorMessage, log, maskToken } from "./helpers.ts";
import type { TokenPoolManager } from "./pool/tokenPoolManager.ts";
import type { BotSpawner, SpawnerResult } from "./spawner/botSpawner.ts";
import type { BotCommandType, ConfigType } from "./types.ts";
import { formatBotList, formatBotStatus, formatPoolStats } from "./utils/format.ts";
import { commandArgs } from "./utils/text.ts";

export type CommandDeps = {
  config: ConfigType;
  pool: TokenPoolManager;
  spawner: BotSpawner;
  agent: BotMotherAgent;
};

export const userCommands: BotCommandType[] = [
  { command: "/create_bot", description: "Create an echo bot: /create_bot <name>" },
  { command: "/create_ai_bot", description: "Create an AI bot: /create_ai_bot <name> [personality]" },
  { command: "/list_bots", description: "Your bots" },
  { command: "/stop_bot", description: "Stop a bot: /stop_bot <name>" },
  { command: "/restart_bot", description: "Start a stopped runtime again: /restart_bot <name>" },
  { command: "/bot_status", description: "Bot details: /bot_status <name>" },
  { command: "/personalities", description: "AI bot personalities" },
  { command: "/help", description: "Help" },
];

export const adminCommands: BotCommandType[] = [
  { command: "/pool_stats", description: "Token pool statistics" },
  { command: "/add_token", description: "Add a token to the pool: /add_token <token>" },
  { command: "/remove_token", description: "Remove an unused token: /remove_token <token>" },
  { command: "/cleanup", description: "Release stopped and failed bots" },
];

function formatCommands(commands: BotCommandType[]) {
  return commands.map((c) => `${c.command} - ${c.description}`).join("\n");
}

export function getUserId(ctx: Context) {
  return ctx.from ? String(ctx.from.id) : undefined;
}

/** `adminUsers` holds Telegram usernames, with or without the leading @. */
export function isAdmin(ctx: Context, config: ConfigType) {
  const username = ctx.from?.username?.toLowerCase();
  if (!username || !config.adminUsers) return false;
  return config.adminUsers.some((admin) => admin.replace(/^@/, "").toLowerCase() === username);
}

function resultText(result: SpawnerResult) {
  return result.success ? result.message : `❌ ${result.error}`;
}

export async function handleStart(ctx: Context, { config }: CommandDeps) {
  await ctx.reply(
    `Hi! I'm ${config.bot_name}, I create Telegram bots for you.\n\n` +
      `Tell me what bot you want, or use the commands:\n${formatCommands(userCommands)}`,
  );
}

export async function handleHelp(ctx: Context, { config }: CommandDeps) {
  let text = formatCommands(userCommands);
  if (isAdmin(ctx, config)) {
    text += `\n\nAdmin:\n${formatCommands(adminCommands)}`;
  }
  await ctx.reply(text);
}

export async function handleCreateBot(ctx: Context, { spawner }: CommandDeps) {
  const userId = getUserId(ctx);
  const name = commandArgs(ctx.text).join(" ");
  if (!userId) return;
  if (!name) {
    await ctx.reply("Usage: /create_bot <name>");
    return;
  }
  await ctx.reply(`Creating echo bot '${name}'...`);
  await ctx.reply(resultText(await spawner.createBot({ name, userId })));
}

export async function handleCreateAiBot(ctx: Context, { spawner, config }: CommandDeps) {
  const userId = getUserId(ctx);
  const [name, ...rest] = commandArgs(ctx.text);
  if (!userId) return;
  if (!name) {
    await ctx.reply("Usage: /create_ai_bot <name> [personality]");
    return;
  }
  const personality = rest.join(" ") || config.personalities[0]?.name || "friendly";
  await ctx.reply(`Creating AI bot '${name}' (${personality})...`);
  await ctx.reply(resultText(await spawner.createBot({ name, userId, personality })));
}

export async function handleListBots(ctx: Context, { spawner }: CommandDeps) {
  const userId = getUserId(ctx);
  if (!userId) return;
  await ctx.reply(formatBotList(spawner.listBots(userId)));
}

export async function handleStopBot(ctx: Context, { spawner, config }: CommandDeps) {
  const name = commandArgs(ctx.text).join(" ");
  if (!name) {
    await ctx.reply("Usage: /stop_bot <name>");
    return;
  }
  // admins may stop any bot
  const owner = isAdmin(ctx, config) ? undefined : getUserId(ctx);
  await ctx.reply(resultText(await spawner.stopBot(name, owner)));
}

export async function handleRestartBot(ctx: Context, { spawner, config }: CommandDeps) {
  const name = commandArgs(ctx.text).join(" ");
  if (!name) {
    await ctx.reply("Usage: /restart_bot <name>");
    return;
  }
  const owner = isAdmin(ctx, config) ? undefined : getUserId(ctx);
  await ctx.reply(resultText(await spawner.restartBot(name, owner)));
}

export async function handleBotStatus(ctx: Context, { spawner, config }: CommandDeps) {
  const userId = getUserId(ctx);
  const name = commandArgs(ctx.text).join(" ");
  if (!userId) return;
  if (!name) {
    await ctx.reply("Usage: /bot_status <name>");
    return;
  }
  const info = spawner.getBotStatus(name, isAdmin(ctx, config) ? undefined : userId);
  if (!info) {
    await ctx.reply(`Bot '${name}' not found in your bot list`);
    return;
  }
  await ctx.reply(formatBotStatus(info));
}

export async function handlePersonalities(ctx: Context, { config }: CommandDeps) {
  if (!config.personalities.length) {
    await ctx.reply("No personalities configured, any short description works");
    return;
  }
  const lines = config.personalities.map((p) => `${p.name} - ${p.description}`);
  await ctx.reply(`Personalities:\n${lines.join("\n")}\n\nUsage: /create_ai_bot <name> <personality>`);
}

export async function handlePoolStats(ctx: Context, { spawner }: CommandDeps) {
  await ctx.reply(formatPoolStats(spawner.getStats()));
}

export async function handleAddToken(ctx: Context, { pool }: CommandDeps) {
  const [token] = commandArgs(ctx.text);
  if (!token) {
    await ctx.reply("Usage: /add_token <token>");
    return;
  }
  await deleteTokenMessage(ctx);
  const added = pool.addToken(token);
  await ctx.reply(
    added
      ? `Token ${maskToken(token)} added to pool`
      : `Token ${maskToken(token)} was not added: invalid format or already known`,
  );
}

export async function handleRemoveToken(ctx: Context, { pool }: CommandDeps) {
  const [token] = commandArgs(ctx.text);
  if (!token) {
    await ctx.reply("Usage: /remove_token <token>");
    return;
  }
  await deleteTokenMessage(ctx);
  const removed = pool.removeToken(token);
  await ctx.reply(
    removed
      ? `Token ${maskToken(token)} removed from pool`
      : `Token ${maskToken(token)} was not removed: unknown or in use`,
  );
}

export async function handleCleanup(ctx: Context, { pool }: CommandDeps) {
  const cleaned = pool.cleanupStoppedBots();
  await ctx.reply(`Cleaned up ${cleaned} stopped bots`);
}

// tokens should not stay in the chat history
async function deleteTokenMessage(ctx: Context) {
  try {
    await ctx.deleteMessage();
  } catch (e) {
    log({ msg: `Cannot delete token message: ${errorMessage(e)}`, logLevel: "warn" });
  }
}

type Handler = (ctx: Context, deps: CommandDeps) => Promise<void>;

function adminOnly(handler: Handler): Handler {
  return async (ctx, deps) => {
    if (!isAdmin(ctx, deps.config)) {
      log({ msg: `Admin command denied for @${ctx.from?.username}`, userId: ctx.from?.id, logLevel: "warn" });
      await ctx.reply("This command is for admins only");
      return;
    }
    await handler(ctx, deps);
  };
}

export async function initCommands(bot: Telegraf, deps: CommandDeps) {
  const bind = (handler: Handler) => (ctx: Context) => handler(ctx, deps);

  bot.start(bind(handleStart));
  bot.help(bind(handleHelp));
  bot.command("create_bot", bind(handleCreateBot));
  bot.command("create_ai_bot", bind(handleCreateAiBot));
  bot.command("list_bots", bind(handleListBots));
  bot.command("stop_bot", bind(handleStopBot));
  bot.command("restart_bot", bind(handleRestartBot));
  bot.command("bot_status", bind(handleBotStatus));
  bot.command("personalities", bind(handlePersonalities));

  bot.command("pool_stats", bind(adminOnly(handlePoolStats)));
  bot.command("add_token", bind(adminOnly(handleAddToken)));
  bot.command("remove_token", bind(adminOnly(handleRemoveToken)));
  bot.command("cleanup", bind(adminOnly(handleCleanup)));

  bot.on(message("text"), (ctx) => onTextMessage(ctx, deps.agent, deps.config.bot_name));

  await bot.telegram.setMyCommands(userCommands);
}
