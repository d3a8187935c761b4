import { aiFunction, AIFunctionsProvider } from "@agentic/core";
import { z } from "zod";
import type { ToolContext } from "../helpers/useTools.ts";
import type { ToolResponse } from "../types.ts";

export const description = "Stop one of the user's bots and release it";

export class StopBotClient extends AIFunctionsProvider {
  protected readonly ctx: ToolContext;

  constructor(ctx: ToolContext) {
    super();
    this.ctx = ctx;
  }

  @aiFunction({
    name: "stop_bot",
    description,
    inputSchema: z.object({
      name: z.string().describe("Name of the bot to stop"),
    }),
  })
  async stop_bot({ name }: { name: string }): Promise<ToolResponse> {
    const result = await this.ctx.spawner.stopBot(name, this.ctx.userId);
    return { content: result.success ? result.message : result.error };
  }
}

export function call(ctx: ToolContext) {
  return new StopBotClient(ctx);
}
