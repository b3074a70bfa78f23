import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const getEnv = (key: string, defaultVal?: string): string => {
    const val = process.env[key] || defaultVal;
    if (!val) {
        throw new Error(`Missing environment variable: ${key}`);
    }
    return val;
};

const getEnvNumber = (key: string, defaultVal?: string): number => {
    const raw = getEnv(key, defaultVal);
    const num = Number.parseInt(raw, 10);
    if (!Number.isFinite(num)) {
        throw new Error(`Invalid numeric environment variable: ${key}`);
    }
    return num;
};

const getEnvIdList = (key: string): number[] => {
    const raw = process.env[key]?.trim() || "";
    return raw
        .split(",")
        .map((item) => item.trim())
        .filter((item) => /^-?\d+$/.test(item))
        .map((item) => Number.parseInt(item, 10));
};

/** Reads a variable at call time, for values tests or operators may rotate. */
export function readEnv(name: string): string | undefined {
    const value = process.env[name];
    return value && value.trim() ? value.trim() : undefined;
}

export const WALLET_TYPES = [
    "trc20",
    "erc20",
    "bnb",
    "btc",
    "eth",
    "ltc",
    "usdt_bep20",
    "usdc_erc20",
    "doge",
    "dash",
] as const;

const walletsFromEnv = (): Record<string, string> => {
    const wallets: Record<string, string> = {};
    for (const type of WALLET_TYPES) {
        const address = process.env[`CRYPTO_WALLET_${type.toUpperCase()}`]?.trim();
        if (address) wallets[type] = address;
    }
    return wallets;
};

export const CONFIG = {
    BOT_TOKEN: process.env.BOT_TOKEN?.trim() || "",
    ADMIN_TELEGRAM_IDS: getEnvIdList("ADMIN_TELEGRAM_IDS"),

    DATA_FILE: path.resolve(process.cwd(), getEnv("DATA_FILE", "data/data.json")),
    SESSIONS_FILE: path.resolve(process.cwd(), getEnv("SESSIONS_FILE", "data/sessions.json")),
    CACHE_TTL_MS: getEnvNumber("CACHE_TTL_MS", "5000"),

    ORDER_TTL_MS: getEnvNumber("ORDER_TTL_MS", "3600000"),
    SWEEP_INTERVAL_MS: getEnvNumber("SWEEP_INTERVAL_MS", "60000"),
    DEFAULT_BONUS_PERCENT: getEnvNumber("DEFAULT_BONUS_PERCENT", "5"),

    POLL_TIMEOUT_SECONDS: getEnvNumber("POLL_TIMEOUT_SECONDS", "30"),
    POLL_ERROR_BACKOFF_MS: getEnvNumber("POLL_ERROR_BACKOFF_MS", "5000"),
    SHUTDOWN_GRACE_MS: getEnvNumber("SHUTDOWN_GRACE_MS", "5000"),

    WALLETS: walletsFromEnv(),
};
