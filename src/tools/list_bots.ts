import { aiFunction, AIFunctionsProvider } from "@agentic/core";
import { z } from "zod";
import type { ToolContext } from "../helpers/useTools.ts";
import type { ToolResponse } from "../types.ts";
import { formatBotList } from "../utils/format.ts";

export const description = "List the bots created by the user with their status";

export class ListBotsClient extends AIFunctionsProvider {
  protected readonly ctx: ToolContext;

  constructor(ctx: ToolContext) {
    super();
    this.ctx = ctx;
  }

  @aiFunction({
    name: "list_bots",
    description,
    inputSchema: z.object({}),
  })
  async list_bots(): Promise<ToolResponse> {
    return { content: formatBotList(this.ctx.spawner.listBots(this.ctx.userId)) };
  }
}

export function call(ctx: ToolContext) {
  return new ListBotsClient(ctx);
}
