import type { AIFunctionsProvider } from "@agentic/core";
import type { BotSpawner } from "../spawner/botSpawner.ts";
import * as botStatus from "../tools/bot_status.ts";
import * as createBot from "../tools/create_bot.ts";
import * as listBots from "../tools/list_bots.ts";
import * as poolStats from "../tools/pool_stats.ts";
import * as stopBot from "../tools/stop_bot.ts";

/** Who is asking, tools act on behalf of this user. */
export type ToolContext = {
  spawner: BotSpawner;
  userId: string;
};

export type ChatToolType = {
  name: string;
  module: {
    description: string;
    call: (ctx: ToolContext) => AIFunctionsProvider;
  };
};

const tools: ChatToolType[] = [
  { name: "create_bot", module: createBot },
  { name: "list_bots", module: listBots },
  { name: "stop_bot", module: stopBot },
  { name: "bot_status", module: botStatus },
  { name: "pool_stats", module: poolStats },
];

export default function useTools(): ChatToolType[] {
  return tools;
}
