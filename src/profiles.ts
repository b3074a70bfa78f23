import { DomainError } from "./db";
import { nextId, type AppDocument, type Comment, type Profile } from "./document";
import { Chats } from "./chats";

export const GENDERS = ["male", "female", "transgender"] as const;
export const DEFAULT_PAGE_SIZE = 12;
export const MAX_PAGE_SIZE = 50;
const MAX_COMMENT_LENGTH = 1000;

export type ProfileInput = {
    name: string;
    age?: number | null;
    gender?: string;
    nationality?: string;
    city?: string;
    travel_cities?: string[];
    description?: string;
    height?: number | null;
    weight?: number | null;
    chest?: number | null;
    photos?: string[];
};

type Range = { min?: number; max?: number };

export type ProfileFilters = {
    city?: string;
    nationality?: string;
    travelCity?: string;
    gender?: string;
    age?: Range;
    height?: Range;
    weight?: Range;
    chest?: Range;
    page?: number;
    limit?: number;
};

export type CommentInput = {
    profileId: number;
    telegramUserId: string;
    userName: string;
    telegramUsername: string;
    text: string;
    promoCode?: string | null;
};

function sameText(a: string, b: string): boolean {
    return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function inRange(value: number | null, range: Range | undefined): boolean {
    if (!range) return true;
    if (range.min === undefined && range.max === undefined) return true;
    if (value === null) return false;
    if (range.min !== undefined && value < range.min) return false;
    if (range.max !== undefined && value > range.max) return false;
    return true;
}

function matches(profile: Profile, filters: ProfileFilters): boolean {
    if (filters.city && !sameText(profile.city, filters.city)) return false;
    if (filters.nationality && !sameText(profile.nationality, filters.nationality)) return false;
    if (filters.gender && !sameText(profile.gender, filters.gender)) return false;
    if (filters.travelCity) {
        const wanted = filters.travelCity;
        if (!profile.travel_cities.some((city) => sameText(city, wanted))) return false;
    }
    return (
        inRange(profile.age, filters.age) &&
        inRange(profile.height, filters.height) &&
        inRange(profile.weight, filters.weight) &&
        inRange(profile.chest, filters.chest)
    );
}

function distinctSorted(values: string[]): string[] {
    return [...new Set(values.map((v) => v.trim()).filter(Boolean))].sort((a, b) => a.localeCompare(b));
}

function cleanList(values: string[] | undefined): string[] {
    return (values ?? []).map((v) => v.trim()).filter(Boolean);
}

export const Profiles = {
    get: (document: AppDocument, profileId: number): Profile | null => {
        return document.profiles.find((p) => p.id === profileId) ?? null;
    },

    create: (document: AppDocument, input: ProfileInput, now: Date = new Date()): Profile => {
        const name = input.name.trim();
        if (!name) throw new DomainError("INVALID_PROFILE", "Name is required");

        const profile: Profile = {
            id: nextId(document.profiles),
            name,
            age: input.age ?? null,
            gender: input.gender?.trim() ?? "",
            nationality: input.nationality?.trim() ?? "",
            city: input.city?.trim() ?? "",
            travel_cities: cleanList(input.travel_cities),
            description: input.description?.trim() ?? "",
            height: input.height ?? null,
            weight: input.weight ?? null,
            chest: input.chest ?? null,
            photos: cleanList(input.photos),
            visible: true,
            created_at: now.toISOString(),
        };
        document.profiles.push(profile);
        return profile;
    },

    setVisible: (document: AppDocument, profileId: number, visible: boolean): Profile => {
        const profile = Profiles.get(document, profileId);
        if (!profile) throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");
        profile.visible = visible;
        return profile;
    },

    /** Deletes a profile together with its chats, their messages and its comments. */
    remove: (document: AppDocument, profileId: number) => {
        if (!Profiles.get(document, profileId)) {
            throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");
        }

        const chatIds = new Set(document.chats.filter((c) => c.profile_id === profileId).map((c) => c.id));
        const messagesBefore = document.messages.length;
        const commentsBefore = document.comments.length;

        document.profiles = document.profiles.filter((p) => p.id !== profileId);
        document.chats = document.chats.filter((c) => c.profile_id !== profileId);
        document.messages = document.messages.filter((m) => !chatIds.has(m.chat_id));
        document.comments = document.comments.filter((c) => c.profile_id !== profileId);
        document.reply_routes = document.reply_routes.filter((r) => r.profile_id !== profileId);

        return {
            chats: chatIds.size,
            messages: messagesBefore - document.messages.length,
            comments: commentsBefore - document.comments.length,
        };
    },

    listVisible: (document: AppDocument, filters: ProfileFilters = {}) => {
        const limit = Math.min(Math.max(filters.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
        const page = Math.max(filters.page ?? 0, 0);
        const matching = document.profiles.filter((p) => p.visible && matches(p, filters));
        const start = page * limit;
        return {
            profiles: matching.slice(start, start + limit),
            has_more: start + limit < matching.length,
            total: matching.length,
        };
    },

    getVisibleWithComments: (document: AppDocument, profileId: number) => {
        const profile = Profiles.get(document, profileId);
        if (!profile || !profile.visible) throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");
        return { ...profile, comments: Profiles.comments(document, profileId) };
    },

    filterOptions: (document: AppDocument) => {
        const visible = document.profiles.filter((p) => p.visible);
        return {
            cities: distinctSorted(visible.map((p) => p.city)),
            nationalities: distinctSorted(visible.map((p) => p.nationality)),
            travel_cities: distinctSorted(visible.flatMap((p) => p.travel_cities)),
            genders: [...GENDERS],
        };
    },

    comments: (document: AppDocument, profileId: number): Comment[] => {
        return document.comments
            .filter((c) => c.profile_id === profileId)
            .sort((a, b) => b.created_at.localeCompare(a.created_at));
    },

    /** Only a user whose chat with the profile holds a completed transaction may comment. */
    addComment: (document: AppDocument, input: CommentInput, now: Date = new Date()): Comment => {
        if (!Profiles.get(document, input.profileId)) {
            throw new DomainError("PROFILE_NOT_FOUND", "Profile not found");
        }
        const text = input.text.trim();
        if (!text || text.length > MAX_COMMENT_LENGTH) {
            throw new DomainError("INVALID_COMMENT", `Comment must be 1-${MAX_COMMENT_LENGTH} characters`);
        }

        const chat = Chats.find(document, input.profileId, input.telegramUserId);
        if (!chat || !Chats.hasCompletedTransaction(document, chat.id)) {
            throw new DomainError("TRANSACTION_REQUIRED", "A completed booking is required to comment");
        }

        const comment: Comment = {
            id: nextId(document.comments),
            profile_id: input.profileId,
            user_name: input.userName.trim() || "Anonymous",
            telegram_username: input.telegramUsername.trim(),
            telegram_user_id: input.telegramUserId,
            promo_code: input.promoCode?.trim().toUpperCase() || null,
            text,
            created_at: now.toISOString(),
        };
        document.comments.push(comment);
        return comment;
    },
};
