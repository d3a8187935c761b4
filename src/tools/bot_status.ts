import { aiFunction, AIFunctionsProvider } from "@agentic/core";
import { z } from "zod";
import type { ToolContext } from "../helpers/useTools.ts";
import type { ToolResponse } from "../types.ts";
import { formatBotStatus } from "../utils/format.ts";

export const description = "Show detailed status of one of the user's bots";

export class BotStatusClient extends AIFunctionsProvider {
  protected readonly ctx: ToolContext;

  constructor(ctx: ToolContext) {
    super();
    this.ctx = ctx;
  }

  @aiFunction({
    name: "bot_status",
    description,
    inputSchema: z.object({
      name: z.string().describe("Bot name"),
    }),
  })
  async bot_status({ name }: { name: string }): Promise<ToolResponse> {
    const info = this.ctx.spawner.getBotStatus(name, this.ctx.userId);
    if (!info) {
      return { content: `Bot '${name}' not found in your bot list` };
    }
    return { content: formatBotStatus(info) };
  }
}

export function call(ctx: ToolContext) {
  return new BotStatusClient(ctx);
}
