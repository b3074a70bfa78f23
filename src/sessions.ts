import fs from "node:fs/promises";
import { hasErrorCode } from "./db";

/** The authenticated caller behind a session cookie. */
export type SessionUser = {
    telegramUserId: string;
    firstName: string;
    username: string;
};

/**
 * Session lookup owned by the user-identity subsystem. The booking core only
 * asks who a session token belongs to.
 */
export interface SessionDirectory {
    resolve(token: string): Promise<SessionUser | null>;
}

type JsonObject = Record<string, unknown>;

function asRecord(input: unknown): JsonObject | null {
    if (!input || typeof input !== "object" || Array.isArray(input)) return null;
    return Object.fromEntries(Object.entries(input));
}

function text(input: unknown): string {
    if (typeof input === "string") return input.trim();
    if (typeof input === "number" && Number.isFinite(input)) return String(input);
    return "";
}

/**
 * Reads the session table the identity service keeps next to the data file:
 *
 *     { "<session id>": { "telegram_id": 42, "user_data": { "first_name": "…", "username": "…" },
 *                         "expires_at": "2024-05-01T12:00:00.000Z" } }
 *
 * The file is read on every lookup so sessions issued or revoked by the other
 * service apply at once. A missing file means nobody is signed in.
 */
export class FileSessionDirectory implements SessionDirectory {
    constructor(
        readonly filePath: string,
        private readonly now: () => number = Date.now,
    ) {}

    async resolve(token: string): Promise<SessionUser | null> {
        const table = await this.readTable();
        if (!table || !Object.prototype.hasOwnProperty.call(table, token)) return null;

        const entry = asRecord(table[token]);
        if (!entry) return null;

        const expiresAt = Date.parse(text(entry.expires_at));
        if (Number.isNaN(expiresAt) || expiresAt <= this.now()) return null;

        const telegramUserId = text(entry.telegram_id);
        if (!telegramUserId) return null;

        const userData = asRecord(entry.user_data) ?? {};
        return {
            telegramUserId,
            firstName: text(userData.first_name),
            username: text(userData.username),
        };
    }

    private async readTable(): Promise<JsonObject | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf-8");
        } catch (error) {
            if (hasErrorCode(error, "ENOENT")) return null;
            throw error;
        }

        try {
            return asRecord(JSON.parse(raw));
        } catch (error) {
            console.error(`❌ Error loading sessions from ${this.filePath}`, error);
            return null;
        }
    }
}
