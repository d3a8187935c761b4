import type { BotStatusInfo, SpawnerStats } from "../spawner/botSpawner.ts";
import type { BotInstance, BotStatus } from "../types.ts";

const statusIcons: Record<BotStatus, string> = {
  starting: "🟡",
  running: "🟢",
  stopping: "🟠",
  stopped: "⚪",
  error: "🔴",
};

function botKind(bot: BotInstance) {
  return bot.personalityType ? `AI (${bot.personalityType})` : "echo";
}

export function formatBotLine(bot: BotInstance) {
  const username = bot.username ? ` @${bot.username}` : "";
  return `${statusIcons[bot.status]} ${bot.name}${username}: ${bot.status}, ${botKind(bot)}`;
}

export function formatBotList(bots: BotInstance[]) {
  if (!bots.length) return "You have no bots yet. Create one with /create_bot <name>";
  return [`Your bots (${bots.length}):`, ...bots.map(formatBotLine)].join("\n");
}

export function formatBotStatus({ bot, running, stats }: BotStatusInfo) {
  const lines = [
    `Bot: ${bot.name}`,
    `Username: ${bot.username ? `@${bot.username}` : "unknown"}`,
    `Status: ${bot.status}`,
    `Type: ${botKind(bot)}`,
    `Created: ${bot.createdAt.toISOString()}`,
    `Runtime: ${running ? "polling" : "not running"}`,
  ];
  if (stats) lines.push(`Messages handled: ${stats.messageCount}`);
  return lines.join("\n");
}

export function formatPoolStats(stats: SpawnerStats) {
  const breakdown = Object.entries(stats.statusBreakdown)
    .map(([status, count]) => `${status}: ${count}`)
    .join(", ");
  return [
    "Token pool:",
    `Total tokens: ${stats.totalTokens}`,
    `Available: ${stats.availableTokens}`,
    `Allocated: ${stats.allocatedTokens}`,
    `Active bots: ${stats.activeBots}${breakdown ? ` (${breakdown})` : ""}`,
    `Running runtimes: ${stats.runningRuntimes}`,
    `BotFather automation: ${stats.botfatherAutomation ? "enabled" : "disabled"}`,
  ].join("\n");
}
