import { InlineKeyboard } from "grammy";
import type { Chat, Order } from "./document";
import type { RouteTarget } from "./reply_routes";

export type ChatAction = "reply" | "payment";

export type ChatCallback = RouteTarget & { action: ChatAction };

const NO_USER = "none";
const CALLBACK_RE = /^(reply|payment)_(\d+)_(.+)$/;
export const CHAT_LIST_LIMIT = 10;

export function encodeUser(telegramUserId: string | null): string {
    return telegramUserId ?? NO_USER;
}

export function chatCallbackData(action: ChatAction, target: RouteTarget): string {
    return `${action}_${target.profileId}_${encodeUser(target.telegramUserId)}`;
}

export function parseChatCallback(data: string): ChatCallback | null {
    const match = CALLBACK_RE.exec(data);
    if (!match) return null;
    const [, action, profileId, user] = match;
    if (action !== "reply" && action !== "payment") return null;
    return {
        action,
        profileId: Number.parseInt(profileId, 10),
        telegramUserId: user === NO_USER ? null : user,
    };
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;");
}

export function buildNotificationKeyboard(target: RouteTarget): InlineKeyboard {
    return new InlineKeyboard()
        .text("✉️ Ответить", chatCallbackData("reply", target))
        .text("✅ Payment OK", chatCallbackData("payment", target))
        .row()
        .text("📋 Все чаты", "list_chats");
}

export function buildHelpText(): string {
    return [
        "🤖 <b>Бот для ответов в чатах</b>",
        "",
        "Ответьте (reply) на уведомление или нажмите «✉️ Ответить», чтобы написать пользователю.",
        "Сообщение со словами «payment successful» подтверждает оплату.",
        "",
        "/chats — последние чаты",
        "/cancel — выйти из режима ответа",
        "/help — эта справка",
    ].join("\n");
}

function userLabel(telegramUserId: string | null): string {
    return telegramUserId ? `<code>${escapeHtml(telegramUserId)}</code>` : "—";
}

export function buildMessageNotification(chat: Pick<Chat, "profile_id" | "profile_name" | "telegram_user_id">, text: string, fileName?: string): string {
    const lines = [
        "📨 <b>Новое сообщение</b>",
        `👤 Анкета: <b>${escapeHtml(chat.profile_name)}</b> (#${chat.profile_id})`,
        `🆔 Пользователь: ${userLabel(chat.telegram_user_id)}`,
        "",
    ];
    if (text) lines.push(escapeHtml(text));
    if (fileName) lines.push(`📎 ${escapeHtml(fileName)}`);
    return lines.join("\n");
}

export function buildOrderNotification(order: Order, profileName: string, created: boolean): string {
    return [
        created ? "💰 <b>Новый заказ</b>" : "💰 <b>Заказ обновлен</b>",
        `🧾 Номер: <code>${order.order_number}</code>`,
        `👤 Анкета: <b>${escapeHtml(profileName)}</b> (#${order.profile_id})`,
        `🆔 Пользователь: ${userLabel(order.telegram_user_id)}`,
        `💵 Сумма: ${order.amount} ${escapeHtml(order.currency)} + бонус ${order.bonus_amount} = <b>${order.total_amount}</b>`,
        `🪙 Кошелек: ${escapeHtml(order.crypto_type)}`,
    ].join("\n");
}

export function buildChatList(chats: Chat[]): { text: string; keyboard: InlineKeyboard } {
    const keyboard = new InlineKeyboard();
    if (chats.length === 0) {
        return { text: "📭 Чатов пока нет", keyboard };
    }

    const recent = chats.slice(-CHAT_LIST_LIMIT).reverse();
    const lines = ["💬 <b>Последние чаты</b>", ""];
    recent.forEach((chat, index) => {
        lines.push(`${index + 1}. ${escapeHtml(chat.profile_name)} (#${chat.profile_id}) — ${userLabel(chat.telegram_user_id)}`);
        const target = { profileId: chat.profile_id, telegramUserId: chat.telegram_user_id };
        if (index > 0) keyboard.row();
        keyboard.text(`✉️ ${chat.profile_name}`, chatCallbackData("reply", target));
    });
    lines.push("", `📊 Всего чатов: ${chats.length}`);
    return { text: lines.join("\n"), keyboard };
}

/** Which chat each operator is currently answering with free text. */
export class ReplyModes {
    private readonly modes = new Map<number, RouteTarget>();

    enter(adminId: number, target: RouteTarget): void {
        this.modes.set(adminId, target);
    }

    get(adminId: number): RouteTarget | null {
        return this.modes.get(adminId) ?? null;
    }

    /** Returns whether the operator was in reply mode. */
    cancel(adminId: number): boolean {
        return this.modes.delete(adminId);
    }
}
