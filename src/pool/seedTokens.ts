import { log } from "../helpers.ts";

export type SeedEnv = Record<string, string | undefined>;

export const BULK_TOKENS_VAR = "BOT_TOKEN_POOL";
export const NUMBERED_TOKEN_PREFIX = "BOT_TOKEN_";

function parseBulkTokens(raw: string): string[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }
  if (Array.isArray(parsed) && parsed.every((t): t is string => typeof t === "string")) {
    return parsed;
  }
  log({
    msg: `${BULK_TOKENS_VAR} is not a JSON array of strings, falling back to individual tokens`,
    logLevel: "warn",
  });
  return undefined;
}

/**
 * Tokens for a fresh pool, in priority order: the bulk env list, the bulk
 * list from config, then BOT_TOKEN_1..N until the sequence breaks.
 */
export function seedTokens(env: SeedEnv, configTokens: string[] = []): string[] {
  const bulkRaw = env[BULK_TOKENS_VAR];
  if (bulkRaw) {
    const bulk = parseBulkTokens(bulkRaw);
    if (bulk) {
      log({ msg: `Initialized ${bulk.length} tokens from ${BULK_TOKENS_VAR}` });
      return unique(bulk);
    }
  }

  if (configTokens.length) {
    log({ msg: `Initialized ${configTokens.length} tokens from config pool.tokens` });
    return unique(configTokens);
  }

  const tokens: string[] = [];
  for (let i = 1; ; i++) {
    const token = env[`${NUMBERED_TOKEN_PREFIX}${i}`];
    if (!token) break;
    tokens.push(token);
  }
  log({ msg: `Initialized ${tokens.length} tokens from ${NUMBERED_TOKEN_PREFIX}X variables` });
  return unique(tokens);
}

function unique(tokens: string[]) {
  return [...new Set(tokens)];
}
