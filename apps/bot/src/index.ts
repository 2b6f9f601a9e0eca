import { errorMessage } from "@tradeguard/core";
import { TradeGuardBot } from "./bot.js";

const bot = new TradeGuardBot();

const shutdown = (): void => {
  bot.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    },
  );
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

bot.start().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
