import { CONFIG } from "@core/config";
import { TelegramBridge, createBridgeBot, registerBridgeHandlers } from "@core/bridge";
import { getNotifier, getStore } from "@core/runtime";
import { ExpirySweeper } from "@core/sweeper";

type Background = {
  bridge: TelegramBridge | null;
  sweeper: ExpirySweeper;
};

const globalForBackground = global as unknown as { adminBackground?: Background };

/** Starts the Telegram bridge and the expiry sweeper once per admin process. */
export function startBackground(): Background {
  const existing = globalForBackground.adminBackground;
  if (existing) return existing;

  const store = getStore();
  const sweeper = new ExpirySweeper(store);
  sweeper.start();

  let bridge: TelegramBridge | null = null;
  if (CONFIG.BOT_TOKEN) {
    const bot = createBridgeBot();
    registerBridgeHandlers(bot, { store, adminIds: CONFIG.ADMIN_TELEGRAM_IDS });
    getNotifier(bot.api);
    bridge = new TelegramBridge(bot);
    bridge.start();
    if (CONFIG.ADMIN_TELEGRAM_IDS.length === 0) {
      console.warn("⚠️ ADMIN_TELEGRAM_IDS is empty, every bot update will be ignored");
    }
  } else {
    console.warn("⚠️ BOT_TOKEN is not set, Telegram bridge disabled");
  }

  const background: Background = { bridge, sweeper };
  globalForBackground.adminBackground = background;

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, stopping background tasks`);
    Promise.all([bridge?.stop(), sweeper.stop()]).catch((error: unknown) => {
      console.error("❌ Background shutdown failed", error);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return background;
}
