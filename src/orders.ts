import { DomainError } from "./db";
import { nextId, type AppDocument, type Order, type OrderStatus } from "./document";
import { CONFIG } from "./config";

const ORDER_CODE_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const ORDER_CODE_LENGTH = 18;
export const MAX_ORDER_AMOUNT = 1_000_000;

export type QuoteInput = {
    profileId: number;
    telegramUserId: string | null;
    amount: number;
    wallet: string;
    currency: string;
};

export type QuoteResult = {
    order: Order;
    created: boolean;
    walletAddress: string;
};

export type OrderFilter = "all" | OrderStatus;

function roundMoney(value: number): number {
    return Math.round(value * 100) / 100;
}

/** Display label only; uniqueness is not checked. */
export function generateOrderCode(random: () => number = Math.random): string {
    let code = "";
    for (let i = 0; i < ORDER_CODE_LENGTH; i += 1) {
        code += ORDER_CODE_ALPHABET[Math.floor(random() * ORDER_CODE_ALPHABET.length)];
    }
    return code;
}

export function calcBonus(amount: number, bonusPercentage: number) {
    const bonus = roundMoney(amount * (bonusPercentage / 100));
    return { bonus, total: roundMoney(amount + bonus) };
}

function isUnpaidFor(order: Order, profileId: number, telegramUserId: string | null): boolean {
    return (
        order.status === "unpaid" &&
        order.profile_id === profileId &&
        order.telegram_user_id === telegramUserId
    );
}

export const Orders = {
    /**
     * Creates the unpaid order for a (profile, user) pair, or refreshes the
     * one already open: new amounts, wallet and a fresh one-hour window.
     */
    quote: (document: AppDocument, input: QuoteInput, now: Date = new Date(), random?: () => number): QuoteResult => {
        const amount = roundMoney(input.amount);
        if (!Number.isFinite(amount) || amount <= 0 || amount > MAX_ORDER_AMOUNT) {
            throw new DomainError("INVALID_AMOUNT", `Amount must be between 0.01 and ${MAX_ORDER_AMOUNT}`);
        }
        if (!document.profiles.some((p) => p.id === input.profileId)) {
            throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");
        }
        const wallets = document.settings.crypto_wallets;
        if (!Object.prototype.hasOwnProperty.call(wallets, input.wallet)) {
            throw new DomainError("UNKNOWN_WALLET", `Unknown wallet type: ${input.wallet}`);
        }

        const bonusPercentage = document.settings.bonus_percentage;
        const { bonus, total } = calcBonus(amount, bonusPercentage);
        if (!Number.isFinite(total) || total <= 0) {
            throw new DomainError("INVALID_AMOUNT", "Order total is out of range");
        }
        const expiresAt = new Date(now.getTime() + CONFIG.ORDER_TTL_MS).toISOString();

        const existing = document.orders.find((o) => isUnpaidFor(o, input.profileId, input.telegramUserId));
        if (existing) {
            existing.amount = amount;
            existing.bonus_percentage = bonusPercentage;
            existing.bonus_amount = bonus;
            existing.total_amount = total;
            existing.crypto_type = input.wallet;
            existing.currency = input.currency;
            existing.expires_at = expiresAt;
            return { order: existing, created: false, walletAddress: wallets[input.wallet] ?? "" };
        }

        const order: Order = {
            id: nextId(document.orders),
            order_number: generateOrderCode(random),
            profile_id: input.profileId,
            telegram_user_id: input.telegramUserId,
            amount,
            bonus_percentage: bonusPercentage,
            bonus_amount: bonus,
            total_amount: total,
            crypto_type: input.wallet,
            currency: input.currency,
            status: "unpaid",
            created_at: now.toISOString(),
            expires_at: expiresAt,
            booked_at: null,
        };
        document.orders.push(order);
        return { order, created: true, walletAddress: wallets[input.wallet] ?? "" };
    },

    /**
     * Books the most recent unpaid order of a profile. Without a user id any
     * user's order for that profile qualifies.
     */
    book: (document: AppDocument, profileId: number, telegramUserId: string | null, now: Date = new Date()): Order | null => {
        let latest: Order | null = null;
        for (const order of document.orders) {
            if (order.status !== "unpaid" || order.profile_id !== profileId) continue;
            if (telegramUserId !== null && order.telegram_user_id !== telegramUserId) continue;
            if (!latest || order.created_at >= latest.created_at) latest = order;
        }
        if (!latest) return null;

        latest.status = "booked";
        latest.booked_at = now.toISOString();
        return latest;
    },

    /** Admin confirmation of one specific order. Booked orders stay as they are. */
    confirm: (document: AppDocument, orderId: number, now: Date = new Date()): { order: Order; changed: boolean } => {
        const order = document.orders.find((o) => o.id === orderId);
        if (!order) throw new DomainError("ORDER_NOT_FOUND", "Order not found");
        if (order.status !== "unpaid") return { order, changed: false };
        order.status = "booked";
        order.booked_at = now.toISOString();
        return { order, changed: true };
    },

    /** Drops unpaid orders whose window closed before `now`. */
    sweep: (document: AppDocument, now: Date = new Date()): number => {
        const before = document.orders.length;
        const cutoff = now.getTime();
        document.orders = document.orders.filter((order) => {
            if (order.status !== "unpaid") return true;
            const expiresAt = Date.parse(order.expires_at);
            return !Number.isNaN(expiresAt) && expiresAt >= cutoff;
        });
        return before - document.orders.length;
    },

    listForUser: (document: AppDocument, telegramUserId: string, filter: OrderFilter = "all") => {
        return document.orders
            .filter((o) => o.telegram_user_id === telegramUserId)
            .filter((o) => filter === "all" || o.status === filter)
            .flatMap((order) => {
                const profile = document.profiles.find((p) => p.id === order.profile_id);
                if (!profile) return [];
                return [{
                    id: order.id,
                    order_number: order.order_number,
                    profile_id: order.profile_id,
                    profile_name: profile.name,
                    profile_photo: profile.photos[0] ?? null,
                    amount: order.total_amount,
                    currency: order.currency,
                    crypto_type: order.crypto_type,
                    status: order.status,
                    created_at: order.created_at,
                    booked_at: order.booked_at,
                    expires_at: order.expires_at,
                }];
            })
            .sort((a, b) => b.created_at.localeCompare(a.created_at));
    },

    removeForUser: (document: AppDocument, orderId: number, telegramUserId: string): boolean => {
        const before = document.orders.length;
        document.orders = document.orders.filter(
            (o) => !(o.id === orderId && o.telegram_user_id === telegramUserId),
        );
        return document.orders.length < before;
    },

    /** Admin view: unpaid first, newest first within each group. */
    listBookings: (document: AppDocument) => {
        return document.orders
            .map((order) => {
                const profile = document.profiles.find((p) => p.id === order.profile_id);
                return {
                    ...order,
                    profile_name: profile?.name ?? "Unknown",
                    profile_photo: profile?.photos[0] ?? null,
                    profile_city: profile?.city || "Unknown",
                };
            })
            .sort((a, b) => {
                const rank = (status: OrderStatus) => (status === "unpaid" ? 0 : 1);
                return rank(a.status) - rank(b.status) || b.created_at.localeCompare(a.created_at);
            });
    },
};
