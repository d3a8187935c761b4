import OpenAI from "openai";
import { ProxyAgent } from "undici";
import { useConfig } from "../config.ts";

let api: OpenAI | undefined;

export function useApi(): OpenAI {
  if (!api) {
    const config = useConfig();
    const proxyAgent = config.auth.proxy_url ? new ProxyAgent(config.auth.proxy_url) : undefined;
    api = new OpenAI({
      apiKey: config.auth.chatgpt_api_key,
      ...(proxyAgent ? { fetchOptions: { dispatcher: proxyAgent } } : {}),
    });
  }
  return api;
}
