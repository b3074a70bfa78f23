import { Api } from "grammy";
import { CONFIG } from "./config";
import { DocumentStore } from "./db";
import { AdminNotifier } from "./notifier";
import { FileSessionDirectory, type SessionDirectory } from "./sessions";

type Runtime = {
    store?: DocumentStore;
    notifier?: AdminNotifier;
    sessions?: SessionDirectory;
};

// Survives Next.js dev reloads, one set per process.
const globalForRuntime = global as unknown as { bookingRuntime?: Runtime };
const runtime: Runtime = globalForRuntime.bookingRuntime ?? {};
globalForRuntime.bookingRuntime = runtime;

export function getStore(): DocumentStore {
    runtime.store ??= new DocumentStore({
        filePath: CONFIG.DATA_FILE,
        cacheTtlMs: CONFIG.CACHE_TTL_MS,
    });
    return runtime.store;
}

/** Uses the given API (the bridge's, in the admin process) or one built from BOT_TOKEN. */
export function getNotifier(api?: Api): AdminNotifier {
    if (!runtime.notifier || api) {
        const client = api ?? (CONFIG.BOT_TOKEN ? new Api(CONFIG.BOT_TOKEN) : null);
        runtime.notifier = new AdminNotifier(client, CONFIG.ADMIN_TELEGRAM_IDS, getStore());
    }
    return runtime.notifier;
}

export function getSessionDirectory(): SessionDirectory {
    runtime.sessions ??= new FileSessionDirectory(CONFIG.SESSIONS_FILE);
    return runtime.sessions;
}
