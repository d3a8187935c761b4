import { aiFunction, AIFunctionsProvider } from "@agentic/core";
import { z } from "zod";
import type { ToolContext } from "../helpers/useTools.ts";
import type { ToolResponse } from "../types.ts";
import { formatPoolStats } from "../utils/format.ts";

export const description = "Show token pool statistics: available tokens and running bots";

export class PoolStatsClient extends AIFunctionsProvider {
  protected readonly ctx: ToolContext;

  constructor(ctx: ToolContext) {
    super();
    this.ctx = ctx;
  }

  @aiFunction({
    name: "pool_stats",
    description,
    inputSchema: z.object({}),
  })
  async pool_stats(): Promise<ToolResponse> {
    return { content: formatPoolStats(this.ctx.spawner.getStats()) };
  }
}

export function call(ctx: ToolContext) {
  return new PoolStatsClient(ctx);
}
