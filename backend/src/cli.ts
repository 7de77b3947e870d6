/**
 * cli.ts
 *
 * Interactive terminal chat with the map agent. Keeps the conversation until `reset`;
 * `exit` (or Ctrl-D) quits.
 */

import { stdin as input, stdout as output } from "node:process";
import readline from "node:readline/promises";
import { bootstrap } from "./bootstrap";
import { ConfigError, describeError } from "./errors";
import { logEvent } from "./logger";

const EXAMPLES = [
  "Where is Times Square in New York City?",
  "What's at coordinates 33.8980915, 35.5649815?",
  "How do I get from Times Square to Central Park by walking?",
  "What are my most frequently visited places of all time?",
  "Show me my travel statistics for March.",
  "What's the weather like in Beirut today?",
  "What's the air quality like in Beirut today?",
  "When does the sun set in Beirut today?",
];

async function main() {
  const { config, newAgent } = bootstrap();
  if (!newAgent) throw new ConfigError("OPENAI_API_KEY is required for the chat loop");
  const agent = newAgent();

  const rule = "=".repeat(60);
  console.log(rule);
  console.log(`Map Agent (model: ${config.openai.model})`);
  console.log("Type 'exit' to quit, 'reset' to start a new conversation.");
  console.log(rule);
  console.log("Example queries:");
  for (const q of EXAMPLES) console.log(`  ${q}`);
  console.log(rule);

  const rl = readline.createInterface({ input, output });
  rl.on("close", () => console.log("\nExited."));

  try {
    for (;;) {
      const line = (await rl.question("\nUser: ")).trim();
      if (!line) continue;

      const command = line.toLowerCase();
      if (command === "exit") break;
      if (command === "reset") {
        agent.reset();
        console.log("\nConversation reset.");
        continue;
      }

      try {
        const reply = await agent.chat(line);
        console.log(`\nAgent: ${reply.answer}`);
      } catch (err) {
        logEvent("error", "chat_failed", { error: describeError(err) });
        console.log("\nAgent: Something went wrong talking to the model. Please try again.");
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  logEvent("error", "cli_failed", { error: describeError(err) });
  process.exitCode = 1;
});
