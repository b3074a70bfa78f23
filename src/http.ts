import { NextResponse } from "next/server";
import type { AttachmentInput } from "./chats";
import { DomainError } from "./db";

const STATUS_BY_CODE: Record<string, number> = {
    INVALID_JSON: 400,
    INVALID_ID: 400,
    INVALID_AMOUNT: 400,
    UNKNOWN_WALLET: 400,
    INVALID_PROFILE: 400,
    INVALID_COMMENT: 400,
    INVALID_SETTINGS: 400,
    EMPTY_MESSAGE: 400,
    UNAUTHORIZED: 401,
    TRANSACTION_REQUIRED: 403,
    PROFILE_NOT_FOUND: 404,
    CHAT_NOT_FOUND: 404,
    ORDER_NOT_FOUND: 404,
    STORE_CONFLICT: 409,
};

export type JsonBody = Record<string, unknown>;

export function errorResponse(error: unknown, label: string): NextResponse {
    if (error instanceof DomainError) {
        const status = STATUS_BY_CODE[error.code];
        if (status) {
            if (status === 409) console.warn(`⚠️ ${label}: ${error.message}`);
            return NextResponse.json({ error: error.message, code: error.code }, { status });
        }
    }
    console.error(`❌ ${label} failed`, error);
    return NextResponse.json({ error: "Internal server error" }, { status: 500 });
}

export async function readJson(req: Request): Promise<JsonBody> {
    let payload: unknown;
    try {
        payload = await req.json();
    } catch {
        throw new DomainError("INVALID_JSON", "Invalid JSON body");
    }
    if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
        throw new DomainError("INVALID_JSON", "Invalid JSON body");
    }
    return Object.fromEntries(Object.entries(payload));
}

export function parseId(raw: string | null | undefined, label = "id"): number {
    const value = String(raw ?? "").trim();
    if (!/^\d+$/.test(value)) throw new DomainError("INVALID_ID", `Invalid ${label}`);
    return Number.parseInt(value, 10);
}

export function textField(body: JsonBody, key: string): string {
    const value = body[key];
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return "";
}

/** `undefined` when absent or blank, `NaN` when present but not numeric. */
export function numberField(body: JsonBody, key: string): number | undefined {
    const value = body[key];
    if (value === undefined || value === null || value === "") return undefined;
    return typeof value === "number" ? value : Number(value);
}

export function queryNumber(params: URLSearchParams, key: string): number | undefined {
    const raw = params.get(key)?.trim();
    if (!raw) return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
}

/** An already stored upload: `{ url, name }`, the name defaulting to the URL's last segment. */
export function attachmentFrom(value: unknown): AttachmentInput | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== "object" || Array.isArray(value)) {
        throw new DomainError("EMPTY_MESSAGE", "attachment must be an object");
    }
    const raw: JsonBody = Object.fromEntries(Object.entries(value));
    const url = textField(raw, "url").trim();
    if (!url) throw new DomainError("EMPTY_MESSAGE", "attachment.url is required");
    const name = textField(raw, "name").trim() || url.split("/").pop() || "file";
    return { url, name };
}
