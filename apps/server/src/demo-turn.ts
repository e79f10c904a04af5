/**
 * Demo: send one message to a fresh browser session and print what happened.
 * Usage: npm run demo:turn -- "go to example.com and take a screenshot"
 */
import { config } from "./config.js";
import { initWeave, ensureWeaveOps } from "./weave.js";
import { stagehandSessionFactory } from "./sessions.js";

async function main() {
  const text = process.argv.slice(2).join(" ").trim();
  if (!text) {
    console.error('Usage: npm run demo:turn -- "<message>"');
    process.exit(1);
  }
  if (config.WANDB_API_KEY) {
    await initWeave();
    await ensureWeaveOps();
  }

  const factory = stagehandSessionFactory();
  const { session, close } = await factory({
    conversationId: "demo",
    model: config.CUA_MODEL,
    emit: (e) => {
      if (e.type === "action_executed") {
        console.log("  ", e.type, JSON.stringify(e.payload.action), "->", e.payload.output);
      } else {
        console.log("  ", e.type);
      }
    },
  });

  try {
    const result = await session.sendMessage(text, { stream: true });
    console.log("\n--- Result ---");
    console.log("status=%s halt=%s", result.status, result.halt ?? "-");
    if (result.error) console.log("error:", result.error);
    for (const m of session.messages) {
      if (m.role === "user") continue;
      console.log(`[${m.role}] ${m.text}${m.image ? " (screenshot attached)" : ""}`);
    }
  } finally {
    await close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
