export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function splitBigMessage(text: string, sizeLimit = TELEGRAM_MESSAGE_LIMIT) {
  const msgs: string[] = [];
  let msg = "";

  for (const line of text.split("\n")) {
    if (line.length >= sizeLimit) {
      if (msg) {
        msgs.push(msg.slice(0, -1));
        msg = "";
      }
      for (let i = 0; i < line.length; i += sizeLimit) {
        msgs.push(line.slice(i, i + sizeLimit));
      }
    } else if (msg.length + line.length + 1 > sizeLimit) {
      msgs.push(msg.slice(0, -1));
      msg = line + "\n";
    } else {
      msg += line + "\n";
    }
  }

  const rest = msg.endsWith("\n") ? msg.slice(0, -1) : msg;
  if (rest) msgs.push(rest);

  return msgs;
}

/** Parses `/command arg1 arg2` into its arguments, dropping the command itself. */
export function commandArgs(text: string | undefined): string[] {
  if (!text) return [];
  return text.trim().split(/\s+/).slice(1);
}
