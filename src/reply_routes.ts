import type { AppDocument, ReplyRoute } from "./document";

export const MAX_REPLY_ROUTES = 500;

export type RouteTarget = {
    profileId: number;
    telegramUserId: string | null;
};

export const ReplyRoutes = {
    /** Remembers where a notification points to; only the newest routes are kept. */
    record: (document: AppDocument, adminChatId: number, messageId: number, target: RouteTarget, now: Date = new Date()): void => {
        document.reply_routes = document.reply_routes.filter(
            (r) => !(r.admin_chat_id === adminChatId && r.message_id === messageId),
        );
        document.reply_routes.push({
            admin_chat_id: adminChatId,
            message_id: messageId,
            profile_id: target.profileId,
            telegram_user_id: target.telegramUserId,
            created_at: now.toISOString(),
        });
        if (document.reply_routes.length > MAX_REPLY_ROUTES) {
            document.reply_routes = document.reply_routes.slice(-MAX_REPLY_ROUTES);
        }
    },

    lookup: (document: AppDocument, adminChatId: number, messageId: number): RouteTarget | null => {
        const route: ReplyRoute | undefined = document.reply_routes.find(
            (r) => r.admin_chat_id === adminChatId && r.message_id === messageId,
        );
        return route ? { profileId: route.profile_id, telegramUserId: route.telegram_user_id } : null;
    },
};
