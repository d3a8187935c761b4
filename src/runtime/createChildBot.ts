import type OpenAI from "openai";
import type { ChildBotFactory } from "../spawner/botSpawner.ts";
import type { AiConfigType, PersonalityType } from "../types.ts";
import type { TelegrafFactory } from "./childBot.ts";
import { EchoBot } from "./echoBot.ts";
import { PersonalityBot } from "./personalityBot.ts";

/** A preset by name, or an ad-hoc personality built from the free-form description. */
export function findPersonality(personalities: PersonalityType[], name: string): PersonalityType {
  const lower = name.toLowerCase();
  const preset = personalities.find((p) => p.name.toLowerCase() === lower);
  if (preset) return preset;
  return {
    name,
    description: name,
    prompt: `You are ${name}. Stay in character and keep your answers helpful and brief.`,
  };
}

export function createChildBotFactory({
  ai,
  personalities,
  api,
  telegrafFactory,
}: {
  ai: AiConfigType;
  personalities: PersonalityType[];
  api: () => OpenAI;
  telegrafFactory?: TelegrafFactory;
}): ChildBotFactory {
  return (bot) => {
    if (!bot.personalityType) {
      return new EchoBot(bot.name, bot.token, bot.userId, telegrafFactory);
    }
    return new PersonalityBot({
      name: bot.name,
      token: bot.token,
      personality: findPersonality(personalities, bot.personalityType),
      ai,
      api: api(),
      telegrafFactory,
    });
  };
}
