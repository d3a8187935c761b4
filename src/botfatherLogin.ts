import readline from "readline/promises";
import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { useConfig } from "./config.ts";

// Interactive login for the BotFather user account, prints the string session for botfather.session
async function login() {
  const { botfather } = useConfig();
  if (!botfather.api_id || !botfather.api_hash) {
    console.error("Set botfather.api_id and botfather.api_hash in config first");
    process.exit(1);
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const session = new StringSession("");
  const client = new TelegramClient(session, botfather.api_id, botfather.api_hash, {
    connectionRetries: 3,
  });

  await client.start({
    phoneNumber: () => rl.question("Enter your phone number: "),
    password: () => rl.question("Enter your 2FA password: "),
    phoneCode: () => rl.question("Enter the verification code: "),
    onError: (err) => console.error(err),
  });

  console.log("Put this into botfather.session:");
  console.log(session.save());
  rl.close();
  await client.disconnect();
}

login().catch((error: unknown) => {
  console.error("Login failed:", error);
  process.exit(1);
});
