const MIN_TOKEN_LENGTH = 10;
const MIN_SECRET_LENGTH = 5;

// Matches tokens inside free text, e.g. a BotFather reply
export const TOKEN_PATTERN = /(\d+:[A-Za-z0-9_-]+)/;

/** Structural check for `<numeric-id>:<secret>`, nothing is verified remotely. */
export function isValidTokenFormat(token: string): boolean {
  if (!token || token.length < MIN_TOKEN_LENGTH) return false;
  const parts = token.split(":");
  if (parts.length !== 2) return false;
  const [botId, secret] = parts;
  if (!/^\d+$/.test(botId)) return false;
  return secret.length >= MIN_SECRET_LENGTH;
}

export function extractToken(text: string): string | undefined {
  return text.match(TOKEN_PATTERN)?.[1];
}
