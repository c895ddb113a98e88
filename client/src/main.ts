import "dotenv/config";
import { loadConfigFromEnv, parseFeedSymbols } from "./config/env.js";
import { createStreamingClient } from "./streaming-client.js";
import { createLogger, errorMessage } from "./utils/logger.js";

const log = createLogger("main");

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const client = createStreamingClient(config);
  const feed = client.feed();

  feed.on("event", (event) => {
    process.stdout.write(JSON.stringify(event) + "\n");
  });
  feed.on("state", (state) => log.info("Feed state", { state }));

  const shutdown = () => {
    log.info("Shutting down");
    client.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  feed.start();
  const symbols = parseFeedSymbols(process.env.FEED_SYMBOLS);
  if (symbols.length === 0) {
    log.warn("FEED_SYMBOLS is empty; nothing to subscribe");
    return;
  }
  const { subscribed, failed } = await feed.subscribe(symbols);
  log.info("Subscriptions ready", {
    subscribed: subscribed.map((ref) => ref.displayLabel),
    failed: failed.map((err) => err.label),
  });
}

main().catch((err: unknown) => {
  log.error("Fatal error", { error: errorMessage(err) });
  process.exitCode = 1;
});
