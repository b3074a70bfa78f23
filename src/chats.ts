import { DomainError } from "./db";
import {
    nextId,
    type AppDocument,
    type Chat,
    type FileKind,
    type Message,
    type Order,
    type Sender,
} from "./document";
import { Orders } from "./orders";

export const PAYMENT_KEYWORD = "payment successful";
export const BOOKING_CONFIRMATION_TEXT = "Transaction successful, your booking has been confirmed";
const TRANSACTION_MARKER = "transaction successful";

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "bmp", "webp"]);
const VIDEO_EXTENSIONS = new Set(["mp4", "avi", "mov", "mkv", "webm"]);

export type AttachmentInput = {
    url: string;
    name: string;
};

export type AppendMessageInput = {
    chatId: number;
    sender: Sender;
    text: string;
    attachment?: AttachmentInput | null;
};

export type AppendResult = {
    message: Message;
    /** Set when an admin reply carried the payment keyword and an order was booked. */
    bookedOrder: Order | null;
    confirmation: Message | null;
};

export function fileKind(fileName: string): FileKind {
    const extension = fileName.toLowerCase().split(".").pop() ?? "";
    if (IMAGE_EXTENSIONS.has(extension)) return "image";
    if (VIDEO_EXTENSIONS.has(extension)) return "video";
    return "file";
}

export function isPaymentConfirmation(text: string): boolean {
    return text.toLowerCase().includes(PAYMENT_KEYWORD);
}

function previewText(message: Message): string {
    if (message.file_url) {
        if (message.file_type === "image") return "📷 Image";
        if (message.file_type === "video") return "🎥 Video";
        return "📎 File";
    }
    return message.text;
}

function pushMessage(document: AppDocument, chatId: number, sender: Sender, text: string, now: Date): Message {
    const message: Message = {
        id: nextId(document.messages),
        chat_id: chatId,
        sender,
        text,
        created_at: now.toISOString(),
        is_read: false,
    };
    document.messages.push(message);
    return message;
}

export const Chats = {
    /**
     * Chat for a (profile, user) pair. A null user id only reaches the
     * profile's legacy chat, the one stored without a user.
     */
    find: (document: AppDocument, profileId: number, telegramUserId: string | null): Chat | null => {
        return document.chats.find((c) =>
            c.profile_id === profileId && c.telegram_user_id === telegramUserId,
        ) ?? null;
    },

    findById: (document: AppDocument, chatId: number): Chat | null => {
        return document.chats.find((c) => c.id === chatId) ?? null;
    },

    findOrCreate: (document: AppDocument, profileId: number, telegramUserId: string | null, now: Date = new Date()): Chat => {
        const existing = Chats.find(document, profileId, telegramUserId);
        if (existing) return existing;

        const profile = document.profiles.find((p) => p.id === profileId);
        if (!profile) throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");

        const chat: Chat = {
            id: nextId(document.chats),
            profile_id: profileId,
            profile_name: profile.name,
            telegram_user_id: telegramUserId,
            created_at: now.toISOString(),
            last_read_message_id: 0,
        };
        document.chats.push(chat);
        return chat;
    },

    /**
     * Appends to a chat. An admin message containing the payment keyword books
     * the chat's latest unpaid order and records the confirmation.
     */
    appendMessage: (document: AppDocument, input: AppendMessageInput, now: Date = new Date()): AppendResult => {
        const chat = Chats.findById(document, input.chatId);
        if (!chat) throw new DomainError("CHAT_NOT_FOUND", "Chat not found");

        const text = input.text.trim();
        if (!text && !input.attachment) {
            throw new DomainError("EMPTY_MESSAGE", "Text or file is required");
        }

        const message = pushMessage(document, chat.id, input.sender, text, now);
        if (input.attachment) {
            message.file_url = input.attachment.url;
            message.file_type = fileKind(input.attachment.name);
            message.file_name = input.attachment.name;
        }

        if (input.sender !== "admin" || !isPaymentConfirmation(text)) {
            return { message, bookedOrder: null, confirmation: null };
        }

        const bookedOrder = Orders.book(document, chat.profile_id, chat.telegram_user_id, now);
        if (!bookedOrder) {
            console.warn(`⚠️ Payment confirmation for profile ${chat.profile_id} found no unpaid order`);
            return { message, bookedOrder: null, confirmation: null };
        }

        console.log(`✅ Order #${bookedOrder.id} booked for profile ${chat.profile_id}, user ${chat.telegram_user_id ?? "-"}`);
        const confirmation = Chats.recordConfirmation(document, chat.id, now);
        return { message, bookedOrder, confirmation };
    },

    recordConfirmation: (document: AppDocument, chatId: number, now: Date = new Date()): Message => {
        return pushMessage(document, chatId, "system", BOOKING_CONFIRMATION_TEXT, now);
    },

    messages: (document: AppDocument, chatId: number, afterId = 0): Message[] => {
        return document.messages.filter((m) => m.chat_id === chatId && m.id > afterId);
    },

    /** Admin side: every user message in the chat counts as read. */
    markRead: (document: AppDocument, chatId: number): number => {
        let marked = 0;
        for (const message of document.messages) {
            if (message.chat_id === chatId && message.sender === "user" && !message.is_read) {
                message.is_read = true;
                marked += 1;
            }
        }
        return marked;
    },

    unreadCount: (document: AppDocument, chatId: number): number => {
        return document.messages.filter(
            (m) => m.chat_id === chatId && m.sender === "user" && !m.is_read,
        ).length;
    },

    totalUnread: (document: AppDocument): number => {
        return document.messages.filter((m) => m.sender === "user" && !m.is_read).length;
    },

    /** User side: moves the read cursor to the newest message of the chat. */
    markSeenByUser: (document: AppDocument, chatId: number): number => {
        const chat = Chats.findById(document, chatId);
        if (!chat) throw new DomainError("CHAT_NOT_FOUND", "Chat not found");
        const latest = Chats.messages(document, chatId).reduce((max, m) => Math.max(max, m.id), 0);
        chat.last_read_message_id = Math.max(chat.last_read_message_id, latest);
        return chat.last_read_message_id;
    },

    userUnreadCount: (document: AppDocument, chat: Chat): number => {
        return Chats.messages(document, chat.id, chat.last_read_message_id).filter(
            (m) => m.sender === "admin",
        ).length;
    },

    hasCompletedTransaction: (document: AppDocument, chatId: number): boolean => {
        return Chats.messages(document, chatId).some(
            (m) => m.sender === "system" && m.text.toLowerCase().includes(TRANSACTION_MARKER),
        );
    },

    listForUser: (document: AppDocument, telegramUserId: string) => {
        return document.chats
            .filter((c) => c.telegram_user_id === telegramUserId)
            .flatMap((chat) => {
                const profile = document.profiles.find((p) => p.id === chat.profile_id);
                if (!profile) return [];

                const chatMessages = Chats.messages(document, chat.id);
                const last = chatMessages[chatMessages.length - 1];
                return [{
                    chat_id: chat.id,
                    profile_id: chat.profile_id,
                    profile_name: profile.name,
                    profile_photo: profile.photos[0] ?? null,
                    last_message: last ? previewText(last) : "No messages yet",
                    last_message_time: last ? last.created_at : chat.created_at,
                    unread_count: Chats.userUnreadCount(document, chat),
                }];
            })
            .sort((a, b) => b.last_message_time.localeCompare(a.last_message_time));
    },

    listForAdmin: (document: AppDocument) => {
        return document.chats.map((chat) => ({
            ...chat,
            unread_count: Chats.unreadCount(document, chat.id),
        }));
    },

    lastMessage: (document: AppDocument, chatId: number): Message | null => {
        const chatMessages = Chats.messages(document, chatId);
        return chatMessages[chatMessages.length - 1] ?? null;
    },
};
