import type { Api, InlineKeyboard } from "grammy";
import type { DocumentStore } from "./db";
import type { Chat, Message, Order } from "./document";
import type { RouteTarget } from "./reply_routes";
import { ReplyRoutes } from "./reply_routes";
import {
    buildMessageNotification,
    buildNotificationKeyboard,
    buildOrderNotification,
} from "./bridge_helpers";

type Delivered = { adminChatId: number; messageId: number };

/**
 * Pushes chat and order events to every operator. Each delivered message is
 * recorded as a reply route so a Telegram reply lands in the right chat.
 * Never throws: a failed delivery is only logged.
 */
export class AdminNotifier {
    constructor(
        private readonly api: Api | null,
        private readonly adminIds: number[],
        private readonly store: DocumentStore,
    ) {}

    get enabled(): boolean {
        return this.api !== null && this.adminIds.length > 0;
    }

    async notifyMessage(chat: Chat, message: Message): Promise<number> {
        const target = { profileId: chat.profile_id, telegramUserId: chat.telegram_user_id };
        const text = buildMessageNotification(chat, message.text, message.file_name);
        return this.broadcast(text, target);
    }

    async notifyOrder(order: Order, profileName: string, created: boolean): Promise<number> {
        const target = { profileId: order.profile_id, telegramUserId: order.telegram_user_id };
        return this.broadcast(buildOrderNotification(order, profileName, created), target);
    }

    private async broadcast(text: string, target: RouteTarget): Promise<number> {
        const api = this.api;
        if (!api || this.adminIds.length === 0) return 0;

        const keyboard: InlineKeyboard = buildNotificationKeyboard(target);
        const delivered: Delivered[] = [];
        for (const adminId of this.adminIds) {
            try {
                const sent = await api.sendMessage(adminId, text, {
                    parse_mode: "HTML",
                    reply_markup: keyboard,
                });
                delivered.push({ adminChatId: sent.chat.id, messageId: sent.message_id });
            } catch (error) {
                console.error(`❌ Failed to notify admin ${adminId}`, error);
            }
        }

        if (delivered.length === 0) return 0;
        try {
            await this.store.update((document) => {
                for (const item of delivered) {
                    ReplyRoutes.record(document, item.adminChatId, item.messageId, target);
                }
            });
        } catch (error) {
            console.error("❌ Failed to record reply routes", error);
        }
        return delivered.length;
    }
}
