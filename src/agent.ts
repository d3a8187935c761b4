import type { AIFunctionsProvider } from "@agentic/core";
import type OpenAI from "openai";
import { errorMessage, log } from "./helpers.ts";
import useTools from "./helpers/useTools.ts";
import type { BotSpawner } from "./spawner/botSpawner.ts";
import type { AiConfigType, PersonalityType, ToolResponse } from "./types.ts";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

export type AgentOptions = {
  api: OpenAI;
  spawner: BotSpawner;
  ai: AiConfigType;
  personalities: PersonalityType[];
  now?: () => Date;
};

function toToolResponse(value: unknown): ToolResponse {
  if (typeof value === "object" && value !== null && "content" in value && typeof value.content === "string") {
    return { content: value.content };
  }
  return { content: JSON.stringify(value) };
}

/**
 * Answers free-text requests to BotMother, letting the model call the
 * bot management tools on behalf of the user.
 */
export class BotMotherAgent {
  private readonly api: OpenAI;
  private readonly spawner: BotSpawner;
  private readonly ai: AiConfigType;
  private readonly personalities: PersonalityType[];
  private readonly now: () => Date;
  private threads = new Map<string, ChatMessage[]>();

  constructor({ api, spawner, ai, personalities, now = () => new Date() }: AgentOptions) {
    this.api = api;
    this.spawner = spawner;
    this.ai = ai;
    this.personalities = personalities;
    this.now = now;
  }

  getSystemMessage() {
    const date = this.now().toISOString();
    let systemMessage = (this.ai.system_message || "").replace(/\{date\}/g, date);
    if (this.personalities.length) {
      const presets = this.personalities.map((p) => `- ${p.name}: ${p.description}`).join("\n");
      systemMessage += `\n\nPersonality presets for AI bots:\n${presets}`;
    }
    return systemMessage;
  }

  async answer(userId: string, text: string): Promise<string> {
    const thread = this.getThread(userId);
    thread.push({ role: "user", content: text });

    const providers = useTools().map((tool) => tool.module.call({ spawner: this.spawner, userId }));
    const tools = providers.flatMap(
      (p) => p.functions.toolSpecs,
    ) as OpenAI.Chat.Completions.ChatCompletionTool[];
    const maxRounds = this.ai.max_tool_rounds ?? 3;

    let answer: string | undefined;
    for (let round = 0; round <= maxRounds; round++) {
      // the last round goes without tools so the model has to answer
      const withTools = round < maxRounds && tools.length > 0;
      const completion = await this.api.chat.completions.create({
        model: this.ai.model,
        temperature: this.ai.temperature,
        messages: [{ role: "system", content: this.getSystemMessage() }, ...thread],
        ...(withTools ? { tools } : {}),
      });
      const message = completion.choices[0]?.message;
      const toolCalls = message?.tool_calls || [];
      if (!message || !toolCalls.length || !withTools) {
        answer = message?.content || undefined;
        break;
      }

      thread.push({ role: "assistant", content: message.content, tool_calls: toolCalls });
      for (const toolCall of toolCalls) {
        const res = await this.callTool(providers, toolCall, userId);
        thread.push({ role: "tool", tool_call_id: toolCall.id, content: res.content });
      }
    }

    const result = answer || "...";
    thread.push({ role: "assistant", content: result });
    this.trimThread(thread);
    return result;
  }

  forget(userId: string) {
    this.threads.delete(userId);
  }

  getThread(userId: string): ChatMessage[] {
    let thread = this.threads.get(userId);
    if (!thread) {
      thread = [];
      this.threads.set(userId, thread);
    }
    return thread;
  }

  private async callTool(
    providers: AIFunctionsProvider[],
    toolCall: ToolCall,
    userId: string,
  ): Promise<ToolResponse> {
    const name = toolCall.function.name;
    const args = toolCall.function.arguments || "{}";
    for (const provider of providers) {
      const fn = provider.functions.get(name);
      if (!fn) continue;
      log({ msg: `Tool call: ${name}(${args})`, userId });
      try {
        return toToolResponse(await fn(args));
      } catch (e) {
        log({ msg: `Tool ${name} failed: ${errorMessage(e)}`, userId, logLevel: "error" });
        return { content: `Tool ${name} failed: ${errorMessage(e)}` };
      }
    }
    return { content: `Tool not found: ${name}` };
  }

  // history starts at a user message, tool results never lose their call
  private trimThread(thread: ChatMessage[]) {
    const limit = this.ai.history_limit || 20;
    if (thread.length <= limit) return;
    thread.splice(0, thread.length - limit);
    const firstUser = thread.findIndex((m) => m.role === "user");
    thread.splice(0, firstUser === -1 ? thread.length : firstUser);
  }
}
