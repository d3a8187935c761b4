import { aiFunction, AIFunctionsProvider } from "@agentic/core";
import { z } from "zod";
import type { ToolContext } from "../helpers/useTools.ts";
import type { ToolResponse } from "../types.ts";

export const description =
  "Create a new Telegram bot for the user. Without personality it is an echo bot, with personality it answers with AI";

export class CreateBotClient extends AIFunctionsProvider {
  protected readonly ctx: ToolContext;

  constructor(ctx: ToolContext) {
    super();
    this.ctx = ctx;
  }

  @aiFunction({
    name: "create_bot",
    description,
    inputSchema: z.object({
      name: z.string().describe("Bot name, unique among running bots"),
      personality: z
        .string()
        .optional()
        .describe("Personality preset name or a short free-form personality for an AI bot"),
    }),
  })
  async create_bot({ name, personality }: { name: string; personality?: string }): Promise<ToolResponse> {
    const result = await this.ctx.spawner.createBot({
      name,
      userId: this.ctx.userId,
      personality: personality?.trim() || undefined,
    });
    if (!result.success) return { content: `Failed to create bot: ${result.error}` };
    return { content: result.message };
  }
}

export function call(ctx: ToolContext) {
  return new CreateBotClient(ctx);
}
