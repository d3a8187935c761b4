export type ConfigType = {
  bot_name: string;
  auth: {
    bot_token: string;
    chatgpt_api_key: string;
    proxy_url?: string;
  };
  adminUsers?: string[];
  pool: PoolConfigType;
  botfather: BotFatherConfigType;
  ai: AiConfigType;
  personalities: PersonalityType[];
  http: HttpConfigType;
  logLevel?: LogLevel;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type PoolConfigType = {
  file?: string;
  tokens?: string[];
  recycle_tokens?: boolean;
  resume_bots?: boolean;
  cleanup_on_startup?: boolean;
  max_bots_per_user?: number;
};

export type BotFatherConfigType = {
  enabled: boolean;
  api_id?: number;
  api_hash?: string;
  session?: string;
  response_delay_ms?: number;
  commands?: BotCommandType[];
};

export type AiConfigType = {
  model: string;
  temperature?: number;
  history_limit?: number;
  system_message?: string;
  max_tool_rounds?: number;
};

export type PersonalityType = {
  name: string;
  description: string;
  prompt: string;
};

export type HttpConfigType = {
  port?: number;
};

export type BotCommandType = {
  command: string;
  description: string;
};

export type BotStatus = "starting" | "running" | "stopping" | "stopped" | "error";

export const BOT_STATUSES = ["starting", "running", "stopping", "stopped", "error"] as const;

export interface BotInstance {
  token: string;
  name: string;
  username?: string;
  status: BotStatus;
  createdAt: Date;
  userId?: string;
  personalityType?: string;
}

export type AllocationResult =
  | { ok: true; bot: BotInstance }
  | { ok: false; reason: "already_allocated"; owner: string };

export type PoolStats = {
  totalTokens: number;
  availableTokens: number;
  allocatedTokens: number;
  activeBots: number;
  statusBreakdown: Partial<Record<BotStatus, number>>;
};

export type ChildBotKind = "echo" | "ai";

export type ChildBotStats = {
  messageCount: number;
  startedAt?: Date;
};

export interface ToolResponse {
  content: string;
}
