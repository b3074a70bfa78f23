import os from "node:os";
import path from "node:path";

// Seeded before src/config.ts is imported by any test file.
process.env.BOT_TOKEN = "";
process.env.ADMIN_USER = "admin";
process.env.ADMIN_PASS = "test-secret";
process.env.ADMIN_TELEGRAM_IDS = "999";
process.env.DATA_FILE = path.join(os.tmpdir(), `booking-test-${process.pid}.json`);
process.env.DEFAULT_BONUS_PERCENT = "5";
process.env.ORDER_TTL_MS = "3600000";
process.env.CRYPTO_WALLET_TRC20 = "TTestTrc20Address";
process.env.CRYPTO_WALLET_BTC = "bc1-test-btc-address";
