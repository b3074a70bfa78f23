import { CONFIG } from "./config";

export type Sender = "user" | "admin" | "system";
export type FileKind = "image" | "video" | "file";
export type OrderStatus = "unpaid" | "booked";

export interface Profile {
    id: number;
    name: string;
    age: number | null;
    gender: string;
    nationality: string;
    city: string;
    travel_cities: string[];
    description: string;
    height: number | null;
    weight: number | null;
    chest: number | null;
    photos: string[];
    visible: boolean;
    created_at: string;
}

export interface Chat {
    id: number;
    profile_id: number;
    profile_name: string;
    /** Null on legacy chats created before per-user isolation. */
    telegram_user_id: string | null;
    created_at: string;
    last_read_message_id: number;
}

export interface Attachment {
    file_url: string;
    file_type: FileKind;
    file_name: string;
}

export interface Message {
    id: number;
    chat_id: number;
    sender: Sender;
    text: string;
    created_at: string;
    is_read: boolean;
    file_url?: string;
    file_type?: FileKind;
    file_name?: string;
}

export interface Order {
    id: number;
    order_number: string;
    profile_id: number;
    telegram_user_id: string | null;
    amount: number;
    bonus_percentage: number;
    bonus_amount: number;
    total_amount: number;
    crypto_type: string;
    currency: string;
    status: OrderStatus;
    created_at: string;
    expires_at: string;
    booked_at: string | null;
}

export interface Comment {
    id: number;
    profile_id: number;
    user_name: string;
    telegram_username: string;
    telegram_user_id: string | null;
    promo_code: string | null;
    text: string;
    created_at: string;
}

export interface Promocode {
    id: number;
    code: string;
    discount: number;
    is_active: boolean;
}

export interface Banner {
    text: string;
    link: string;
    link_text: string;
    visible: boolean;
}

export interface Settings {
    crypto_wallets: Record<string, string>;
    bonus_percentage: number;
    banner: Banner;
    vip_catalogs: Record<string, unknown>;
}

/** Where an admin-side Telegram notification points back to. */
export interface ReplyRoute {
    admin_chat_id: number;
    message_id: number;
    profile_id: number;
    telegram_user_id: string | null;
    created_at: string;
}

export interface AppDocument {
    version: number;
    profiles: Profile[];
    chats: Chat[];
    messages: Message[];
    orders: Order[];
    comments: Comment[];
    promocodes: Promocode[];
    settings: Settings;
    reply_routes: ReplyRoute[];
}

type JsonObject = Record<string, unknown>;

function asRecord(input: unknown): JsonObject | null {
    if (!input || typeof input !== "object" || Array.isArray(input)) return null;
    return Object.fromEntries(Object.entries(input));
}

function asArray(input: unknown): unknown[] {
    return Array.isArray(input) ? input : [];
}

function toStr(input: unknown, fallback = ""): string {
    if (typeof input === "string") return input;
    if (typeof input === "number" && Number.isFinite(input)) return String(input);
    return fallback;
}

function toNullableStr(input: unknown): string | null {
    const value = toStr(input).trim();
    return value ? value : null;
}

function toNum(input: unknown, fallback = 0): number {
    const numeric = typeof input === "number" ? input : Number(input);
    return Number.isFinite(numeric) ? numeric : fallback;
}

function toNullableNum(input: unknown): number | null {
    if (input === null || input === undefined || input === "") return null;
    const numeric = Number(input);
    return Number.isFinite(numeric) ? numeric : null;
}

function toBool(input: unknown, fallback: boolean): boolean {
    return typeof input === "boolean" ? input : fallback;
}

function toStrList(input: unknown): string[] {
    return asArray(input).filter((item): item is string => typeof item === "string");
}

function toFileKind(input: unknown): FileKind | undefined {
    return input === "image" || input === "video" || input === "file" ? input : undefined;
}

export function createDefaultSettings(): Settings {
    return {
        crypto_wallets: { ...CONFIG.WALLETS },
        bonus_percentage: CONFIG.DEFAULT_BONUS_PERCENT,
        banner: { text: "", link: "", link_text: "", visible: false },
        vip_catalogs: {},
    };
}

export function createEmptyDocument(): AppDocument {
    return {
        version: 0,
        profiles: [],
        chats: [],
        messages: [],
        orders: [],
        comments: [],
        promocodes: [],
        settings: createDefaultSettings(),
        reply_routes: [],
    };
}

function parseProfile(input: unknown): Profile | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    if (!Number.isInteger(id)) return null;
    return {
        id,
        name: toStr(raw.name),
        age: toNullableNum(raw.age),
        gender: toStr(raw.gender),
        nationality: toStr(raw.nationality),
        city: toStr(raw.city),
        travel_cities: toStrList(raw.travel_cities),
        description: toStr(raw.description),
        height: toNullableNum(raw.height),
        weight: toNullableNum(raw.weight),
        chest: toNullableNum(raw.chest),
        photos: toStrList(raw.photos),
        visible: toBool(raw.visible, true),
        created_at: toStr(raw.created_at),
    };
}

function parseChat(input: unknown): Chat | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    const profileId = toNum(raw.profile_id, NaN);
    if (!Number.isInteger(id) || !Number.isInteger(profileId)) return null;
    return {
        id,
        profile_id: profileId,
        profile_name: toStr(raw.profile_name),
        telegram_user_id: toNullableStr(raw.telegram_user_id),
        created_at: toStr(raw.created_at),
        last_read_message_id: toNum(raw.last_read_message_id),
    };
}

function parseSender(raw: JsonObject): Sender {
    const sender = raw.sender;
    if (sender === "user" || sender === "admin" || sender === "system") return sender;
    if (raw.is_system === true) return "system";
    if (raw.is_from_user === true) return "user";
    return "admin";
}

function parseMessage(input: unknown): Message | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    const chatId = toNum(raw.chat_id, NaN);
    if (!Number.isInteger(id) || !Number.isInteger(chatId)) return null;
    const message: Message = {
        id,
        chat_id: chatId,
        sender: parseSender(raw),
        text: toStr(raw.text),
        created_at: toStr(raw.created_at),
        is_read: toBool(raw.is_read, false),
    };
    const fileUrl = toNullableStr(raw.file_url);
    if (fileUrl) {
        message.file_url = fileUrl;
        message.file_type = toFileKind(raw.file_type) ?? "file";
        message.file_name = toStr(raw.file_name);
    }
    return message;
}

function parseOrder(input: unknown): Order | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    const profileId = toNum(raw.profile_id, NaN);
    if (!Number.isInteger(id) || !Number.isInteger(profileId)) return null;
    const amount = toNum(raw.amount);
    const bonus = toNum(raw.bonus_amount);
    return {
        id,
        order_number: toStr(raw.order_number, String(id)),
        profile_id: profileId,
        telegram_user_id: toNullableStr(raw.telegram_user_id),
        amount,
        bonus_percentage: toNum(raw.bonus_percentage, CONFIG.DEFAULT_BONUS_PERCENT),
        bonus_amount: bonus,
        total_amount: toNum(raw.total_amount, amount + bonus),
        crypto_type: toStr(raw.crypto_type),
        currency: toStr(raw.currency, "USD"),
        status: raw.status === "booked" ? "booked" : "unpaid",
        created_at: toStr(raw.created_at),
        expires_at: toStr(raw.expires_at),
        booked_at: toNullableStr(raw.booked_at),
    };
}

function parseComment(input: unknown): Comment | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    const profileId = toNum(raw.profile_id, NaN);
    if (!Number.isInteger(id) || !Number.isInteger(profileId)) return null;
    return {
        id,
        profile_id: profileId,
        user_name: toStr(raw.user_name, "Anonymous"),
        telegram_username: toStr(raw.telegram_username),
        telegram_user_id: toNullableStr(raw.telegram_user_id),
        promo_code: toNullableStr(raw.promo_code),
        text: toStr(raw.text),
        created_at: toStr(raw.created_at),
    };
}

function parsePromocode(input: unknown): Promocode | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const id = toNum(raw.id, NaN);
    if (!Number.isInteger(id)) return null;
    return {
        id,
        code: toStr(raw.code).toUpperCase(),
        discount: toNum(raw.discount),
        is_active: toBool(raw.is_active, true),
    };
}

function parseReplyRoute(input: unknown): ReplyRoute | null {
    const raw = asRecord(input);
    if (!raw) return null;
    const adminChatId = toNum(raw.admin_chat_id, NaN);
    const messageId = toNum(raw.message_id, NaN);
    const profileId = toNum(raw.profile_id, NaN);
    if (![adminChatId, messageId, profileId].every(Number.isInteger)) return null;
    return {
        admin_chat_id: adminChatId,
        message_id: messageId,
        profile_id: profileId,
        telegram_user_id: toNullableStr(raw.telegram_user_id),
        created_at: toStr(raw.created_at),
    };
}

function parseSettings(input: unknown): Settings {
    const defaults = createDefaultSettings();
    const raw = asRecord(input);
    if (!raw) return defaults;

    const wallets = asRecord(raw.crypto_wallets);
    const banner = asRecord(raw.banner);
    return {
        crypto_wallets: wallets
            ? Object.fromEntries(Object.entries(wallets).map(([type, address]) => [type, toStr(address)]))
            : defaults.crypto_wallets,
        bonus_percentage: toNum(raw.bonus_percentage, defaults.bonus_percentage),
        banner: banner
            ? {
                text: toStr(banner.text),
                link: toStr(banner.link),
                link_text: toStr(banner.link_text),
                visible: toBool(banner.visible, false),
            }
            : defaults.banner,
        vip_catalogs: asRecord(raw.vip_catalogs) ?? defaults.vip_catalogs,
    };
}

function parseList<T>(input: unknown, parse: (item: unknown) => T | null): T[] {
    const out: T[] = [];
    for (const item of asArray(input)) {
        const parsed = parse(item);
        if (parsed) out.push(parsed);
    }
    return out;
}

/**
 * Turns whatever was read from disk into a typed document. Missing sections
 * are back-filled with defaults and malformed records are dropped.
 */
export function normalizeDocument(input: unknown): AppDocument {
    const raw = asRecord(input);
    if (!raw) return createEmptyDocument();

    const version = toNum(raw.version);
    return {
        version: Number.isInteger(version) && version >= 0 ? version : 0,
        profiles: parseList(raw.profiles, parseProfile),
        chats: parseList(raw.chats, parseChat),
        messages: parseList(raw.messages, parseMessage),
        orders: parseList(raw.orders, parseOrder),
        comments: parseList(raw.comments, parseComment),
        promocodes: parseList(raw.promocodes, parsePromocode),
        settings: parseSettings(raw.settings),
        reply_routes: parseList(raw.reply_routes, parseReplyRoute),
    };
}

export function nextId(items: ReadonlyArray<{ id: number }>): number {
    return items.reduce((max, item) => Math.max(max, item.id), 0) + 1;
}
